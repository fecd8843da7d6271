import { AnalyticsConfig, loadAnalyticsConfig } from '../config/analytics.config';

export function testConfig(overrides: Partial<AnalyticsConfig> = {}): AnalyticsConfig {
  return { ...loadAnalyticsConfig({}), ...overrides };
}
