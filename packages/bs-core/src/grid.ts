// Profit/loss sweep over spot × volatility.
//
// The sweep is a flat index range [0, n_s·n_v): cell k maps to
// (i, j) = (⌊k / n_v⌋, k mod n_v). Every cell reads only the precomputed axes
// and writes only its own slot, so any sub-range can run on its own worker.

import type {
  AxisRange,
  GridRequest,
  GridResult,
  MarketParameters,
  SensitivityGrid,
} from "@greeks-surface/core-types";
import { priceOption, validateParameters } from "./blackScholes";
import type { PricingOptions } from "./blackScholes";
import { DEFAULT_GRID_RESOLUTION, MAX_GRID_RESOLUTION } from "./constants";
import { InvalidGridError } from "./errors";

export interface GridOptions extends PricingOptions {
  maxResolution?: number;
}

export interface SweepPlan {
  strike: number;
  timeToExpiry: number;
  riskFreeRate: number;
  spotAxis: number[];
  volatilityAxis: number[];
  callPurchasePrice: number;
  putPurchasePrice: number;
  callMatrix: number[][];
  putMatrix: number[][];
  pricing: PricingOptions;
}

/** n evenly spaced points over [min, max], endpoints included. */
export function linspace(min: number, max: number, n: number): number[] {
  if (n === 1) return [min];
  const step = (max - min) / (n - 1);
  const out = new Array<number>(n);
  for (let i = 0; i < n; i++) out[i] = min + i * step;
  out[n - 1] = max;
  return out;
}

function checkRange(name: string, range: AxisRange): void {
  if (!Number.isFinite(range.min) || !Number.isFinite(range.max)) {
    throw new InvalidGridError(`${name} bounds must be finite, got [${range.min}, ${range.max}]`);
  }
  if (range.min > range.max) {
    throw new InvalidGridError(`${name} min ${range.min} exceeds max ${range.max}`);
  }
}

function checkResolution(n: number, maxResolution: number): void {
  if (!Number.isInteger(n) || n < 1 || n > maxResolution) {
    throw new InvalidGridError(`gridResolution must be an integer in [1, ${maxResolution}], got ${n}`);
  }
}

function nanMatrix(rows: number, cols: number): number[][] {
  return Array.from({ length: rows }, () => new Array<number>(cols).fill(Number.NaN));
}

/**
 * Validate the request and lay out axes and output matrices.
 * Fixed inputs (strike, time, rate) are checked here once; the per-cell
 * spot and volatility are not, see sweepCells.
 */
export function planSweep(request: GridRequest, options: GridOptions = {}): SweepPlan {
  const n = request.gridResolution ?? DEFAULT_GRID_RESOLUTION;
  checkResolution(n, options.maxResolution ?? MAX_GRID_RESOLUTION);
  checkRange("spotRange", request.spotRange);
  checkRange("volatilityRange", request.volatilityRange);
  if (!Number.isFinite(request.callPurchasePrice) || !Number.isFinite(request.putPurchasePrice)) {
    throw new InvalidGridError("purchase prices must be finite");
  }

  // spot/vol placeholders; only the fixed inputs matter here
  const fixed: MarketParameters = {
    spot: 1,
    volatility: 1,
    strike: request.strike,
    timeToExpiry: request.timeToExpiry,
    riskFreeRate: request.riskFreeRate,
  };
  validateParameters(fixed);

  const spotAxis = linspace(request.spotRange.min, request.spotRange.max, n);
  const volatilityAxis = linspace(request.volatilityRange.min, request.volatilityRange.max, n);

  return {
    strike: request.strike,
    timeToExpiry: request.timeToExpiry,
    riskFreeRate: request.riskFreeRate,
    spotAxis,
    volatilityAxis,
    callPurchasePrice: request.callPurchasePrice,
    putPurchasePrice: request.putPurchasePrice,
    callMatrix: nanMatrix(spotAxis.length, volatilityAxis.length),
    putMatrix: nanMatrix(spotAxis.length, volatilityAxis.length),
    pricing: { thetaMode: options.thetaMode },
  };
}

export function cellCount(plan: SweepPlan): number {
  return plan.spotAxis.length * plan.volatilityAxis.length;
}

/**
 * Fill cells [start, end) of the plan's matrices.
 * A cell whose spot or volatility is <= 0 is left as NaN in both matrices
 * instead of failing the whole sweep.
 */
export function sweepCells(plan: SweepPlan, start: number, end: number): void {
  const cols = plan.volatilityAxis.length;
  const stop = Math.min(end, cellCount(plan));

  for (let k = Math.max(0, start); k < stop; k++) {
    const i = Math.floor(k / cols);
    const j = k % cols;
    const spot = plan.spotAxis[i];
    const volatility = plan.volatilityAxis[j];
    if (!(spot > 0) || !(volatility > 0)) continue;

    const base = {
      spot,
      strike: plan.strike,
      timeToExpiry: plan.timeToExpiry,
      riskFreeRate: plan.riskFreeRate,
      volatility,
    };
    const call = priceOption({ ...base, variant: "call" }, plan.pricing).price;
    const put = priceOption({ ...base, variant: "put" }, plan.pricing).price;
    plan.callMatrix[i][j] = call - plan.callPurchasePrice;
    plan.putMatrix[i][j] = put - plan.putPurchasePrice;
  }
}

export function collectGrids(plan: SweepPlan): GridResult {
  const callGrid: SensitivityGrid = {
    variant: "call",
    purchasePrice: plan.callPurchasePrice,
    spotAxis: plan.spotAxis,
    volatilityAxis: plan.volatilityAxis,
    profitMatrix: plan.callMatrix,
  };
  const putGrid: SensitivityGrid = {
    variant: "put",
    purchasePrice: plan.putPurchasePrice,
    spotAxis: plan.spotAxis,
    volatilityAxis: plan.volatilityAxis,
    profitMatrix: plan.putMatrix,
  };
  return { callGrid, putGrid };
}

/** Build the call and put profit/loss grids; 2·n² engine calls, O(n²). */
export function buildGrid(request: GridRequest, options: GridOptions = {}): GridResult {
  const plan = planSweep(request, options);
  sweepCells(plan, 0, cellCount(plan));
  return collectGrids(plan);
}
