import type { LookbackPeriod } from "@greeks-surface/core-types";

/** Source of raw quotes. Implementations throw MarketDataError on failure. */
export interface MarketDataProvider {
  latestClose(ticker: string): Promise<number>;
  closes(ticker: string, period: LookbackPeriod): Promise<number[]>;
  /** Trailing twelve-month distribution yield as a fraction, or null if the ticker pays none. */
  trailingYield(ticker: string): Promise<number | null>;
}

export interface MarketFallbacks {
  price: number;
  volatility: number;
  riskFreeRate: number;
}
