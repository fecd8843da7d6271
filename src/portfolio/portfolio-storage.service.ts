import { Injectable } from '@nestjs/common';
import { HoldingsLedger } from './holdings-ledger';

// Holds the ledger for this application instance.
// Mutations go through PortfolioService, reads through PortfolioQueryService.
@Injectable()
export class PortfolioStorageService {
  private current = new HoldingsLedger();

  get ledger(): HoldingsLedger {
    return this.current;
  }

  /** Swaps in a ledger rebuilt from persisted state */
  replace(ledger: HoldingsLedger): void {
    this.current = ledger;
  }

  clearAllData(): void {
    this.current = new HoldingsLedger();
  }
}
