// Canonical, provider-resolvable ticker (e.g. "AAPL", "BTC-USD").
export type TickerSymbol = string;
