// Dashboard defaults and text layout around the engine.

import type {
  AxisRange,
  GreeksResult,
  GridResult,
  MarketInputs,
  OptionPair,
} from "@greeks-surface/core-types";
import { roundHalfEven } from "@greeks-surface/bs-core";
import { formatGreeks, formatPercent } from "./format";

export interface HeatmapRanges {
  spotRange: AxisRange;
  volatilityRange: AxisRange;
}

export interface RangeWidths {
  spotHalfWidth: number;
  volHalfWidth: number;
}

function clamp(x: number, lo: number, hi: number): number {
  return Math.max(lo, Math.min(hi, x));
}

/** Default purchase price: the model price rounded to a whole unit, ties to even. */
export function defaultPurchasePrice(price: number): number {
  return roundHalfEven(price);
}

/**
 * Spot ± spotHalfWidth within [0, price + 100] and vol ± volHalfWidth within [0, 1],
 * the bounds of the dashboard's range sliders.
 */
export function defaultHeatmapRanges(
  currentPrice: number,
  volatility: number,
  widths: RangeWidths = { spotHalfWidth: 10, volHalfWidth: 0.05 },
): HeatmapRanges {
  const spotCap = currentPrice + 100;
  return {
    spotRange: {
      min: clamp(currentPrice - widths.spotHalfWidth, 0, spotCap),
      max: clamp(currentPrice + widths.spotHalfWidth, 0, spotCap),
    },
    volatilityRange: {
      min: clamp(volatility - widths.volHalfWidth, 0, 1),
      max: clamp(volatility + widths.volHalfWidth, 0, 1),
    },
  };
}

function extent(m: number[][]): { min: number; max: number } {
  let min = Infinity;
  let max = -Infinity;
  for (const row of m) {
    for (const v of row) {
      if (!Number.isFinite(v)) continue;
      if (v < min) min = v;
      if (v > max) max = v;
    }
  }
  return { min, max };
}

export interface DashboardView {
  market: MarketInputs;
  strike: number;
  timeToExpiry: number;
  riskFreeRate: number;
  greeks: OptionPair<GreeksResult>;
  purchasePrices: OptionPair<number>;
  grids: GridResult;
}

/** Fixed-width text rendering for terminals. */
export function renderDashboardText(view: DashboardView): string {
  const { market, greeks } = view;
  const call = formatGreeks(greeks.call);
  const put = formatGreeks(greeks.put);
  const pad = (s: string) => s.padStart(12);

  const lines = [
    `${market.ticker} (${market.period})`,
    `  Current price:        $${market.currentPrice.toFixed(2)}${market.sources.currentPrice === "fallback" ? " (default)" : ""}`,
    `  Historical vol:       ${market.historicalVolatility.toFixed(2)}${market.sources.historicalVolatility === "fallback" ? " (default)" : ""}`,
    `  Treasury yield:       ${formatPercent(market.riskFreeRate)}${market.sources.riskFreeRate === "fallback" ? " (default)" : ""}`,
    "",
    `  K=${view.strike.toFixed(2)}  T=${view.timeToExpiry}  r=${view.riskFreeRate}  σ=${market.historicalVolatility.toFixed(4)}`,
    "",
    `  ${"".padEnd(8)}${pad("Call")}${pad("Put")}`,
    `  ${"Price".padEnd(8)}${pad(`$${call.price}`)}${pad(`$${put.price}`)}`,
    `  ${"Delta".padEnd(8)}${pad(call.delta)}${pad(put.delta)}`,
    `  ${"Gamma".padEnd(8)}${pad(call.gamma)}${pad(put.gamma)}`,
    `  ${"Theta".padEnd(8)}${pad(call.theta)}${pad(put.theta)}`,
    `  ${"Vega".padEnd(8)}${pad(call.vega)}${pad(put.vega)}`,
    `  ${"Rho".padEnd(8)}${pad(call.rho)}${pad(put.rho)}`,
    "",
  ];

  for (const grid of [view.grids.callGrid, view.grids.putGrid]) {
    const { min, max } = extent(grid.profitMatrix);
    const s = grid.spotAxis;
    const v = grid.volatilityAxis;
    lines.push(
      `  ${grid.variant === "call" ? "Call" : "Put"} P/L vs purchase $${grid.purchasePrice.toFixed(2)}: ` +
      `[${min.toFixed(2)}, ${max.toFixed(2)}] over S ${s[0].toFixed(2)}..${s[s.length - 1].toFixed(2)}, ` +
      `σ ${v[0].toFixed(2)}..${v[v.length - 1].toFixed(2)}`,
    );
  }

  for (const w of market.warnings) lines.push(`  ! ${w}`);
  return lines.join("\n");
}
