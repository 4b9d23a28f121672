import { InsufficientHistoryError } from "./errors";

/** Daily log returns ln(p_t / p_{t-1}); pairs with a non-positive or missing price are skipped. */
export function logReturns(closes: number[]): number[] {
  const out: number[] = [];
  for (let i = 1; i < closes.length; i++) {
    const prev = closes[i - 1];
    const cur = closes[i];
    if (prev > 0 && cur > 0 && Number.isFinite(prev) && Number.isFinite(cur)) {
      out.push(Math.log(cur / prev));
    }
  }
  return out;
}

/**
 * Annualized historical volatility: population standard deviation of daily
 * log returns scaled by √tradingDaysPerYear.
 */
export function historicalVolatility(closes: number[], tradingDaysPerYear = 252): number {
  const rets = logReturns(closes);
  if (rets.length < 2) throw new InsufficientHistoryError(rets.length);

  const mean = rets.reduce((s, x) => s + x, 0) / rets.length;
  const variance = rets.reduce((s, x) => s + (x - mean) * (x - mean), 0) / rets.length;
  return Math.sqrt(variance) * Math.sqrt(tradingDaysPerYear);
}
