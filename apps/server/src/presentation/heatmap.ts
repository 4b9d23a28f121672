import type { SensitivityGrid } from "@greeks-surface/core-types";

export interface HeatmapPayload {
  title: string;
  xTitle: string;
  yTitle: string;
  /** volatility axis */
  x: number[];
  /** spot axis */
  y: number[];
  /** z[spotIndex][volIndex]; unpriced cells are null */
  z: (number | null)[][];
  zmid: number;
  colorscale: "RdYlGn";
  colorbarTitle: string;
}

function round2(x: number): number {
  return Math.round(x * 100) / 100;
}

/** Plot-ready diverging heatmap centred on break-even. */
export function toHeatmap(grid: SensitivityGrid, title?: string): HeatmapPayload {
  const label = grid.variant === "call" ? "Call" : "Put";
  return {
    title: title ?? `${label} Option Profitability`,
    xTitle: "Volatility (σ)",
    yTitle: "Stock Price (S)",
    x: grid.volatilityAxis.map(round2),
    y: grid.spotAxis.map(round2),
    z: grid.profitMatrix.map((row) => row.map((v) => (Number.isFinite(v) ? v : null))),
    zmid: 0,
    colorscale: "RdYlGn",
    colorbarTitle: "Profit/Loss",
  };
}
