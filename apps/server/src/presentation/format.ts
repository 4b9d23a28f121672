import type { GreeksResult } from "@greeks-surface/core-types";

export type FormattedGreeks = Record<keyof GreeksResult, string>;

export const PRICE_DECIMALS = 2;
export const GREEK_DECIMALS = 4;

export function formatGreeks(g: GreeksResult): FormattedGreeks {
  return {
    price: g.price.toFixed(PRICE_DECIMALS),
    delta: g.delta.toFixed(GREEK_DECIMALS),
    gamma: g.gamma.toFixed(GREEK_DECIMALS),
    theta: g.theta.toFixed(GREEK_DECIMALS),
    vega: g.vega.toFixed(GREEK_DECIMALS),
    rho: g.rho.toFixed(GREEK_DECIMALS),
  };
}

export function formatPercent(x: number, decimals = 2): string {
  return `${(x * 100).toFixed(decimals)}%`;
}
