import type { DayCount } from "@greeks-surface/core-types";

/** Convert calendar days to a year fraction given a convention. */
export function daysToYearFraction(days: number, conv: DayCount): number {
  switch (conv) {
    case 'ACT365':      return days / 365.0;
    case 'Y365_25':     return days / 365.25;
    case 'TRADING_252': return days / 252.0;
  }
}
