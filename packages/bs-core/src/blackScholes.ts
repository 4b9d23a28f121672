/**
 * Black-Scholes Pricing Engine
 * European call/put price and Greeks in closed form.
 * Conventions:
 *  - Vega: per absolute vol unit (1.0 = 100% vol)
 *  - Theta: per year (no /365 here; divide at display time if needed)
 *  - Rho: per absolute rate unit (no /100)
 */

import type {
  GreeksResult,
  MarketParameters,
  OptionPair,
  OptionParameters,
} from "@greeks-surface/core-types";
import { InvalidVariantError } from "./errors";
import { normCdf, normPdf } from "./normal";
import { assertFinite, assertPositive } from "./utils";

/**
 * Which discounting term theta uses.
 *  - "per-variant": Φ(d2) for calls, Φ(-d2) for puts.
 *  - "put-branch": Φ(-d2) for both, as the legacy dashboard computed it
 *    (its variant comparison never matched, so every option took the put term).
 */
export type ThetaMode = "per-variant" | "put-branch";

export interface PricingOptions {
  thetaMode?: ThetaMode;
}

/** Throws DegenerateInputError for anything that would produce NaN/Inf. */
export function validateParameters(p: MarketParameters): void {
  assertPositive(p.spot, "spot");
  assertPositive(p.strike, "strike");
  assertPositive(p.timeToExpiry, "timeToExpiry");
  assertPositive(p.volatility, "volatility");
  assertFinite(p.riskFreeRate, "riskFreeRate");
}

export function priceOption(params: OptionParameters, options: PricingOptions = {}): GreeksResult {
  const { spot, strike, timeToExpiry: T, riskFreeRate: r, volatility: vol, variant } = params;

  // variant may come from untyped callers
  if (variant !== "call" && variant !== "put") {
    throw new InvalidVariantError(variant);
  }
  validateParameters(params);

  const isCall = variant === "call";
  const thetaMode = options.thetaMode ?? "per-variant";

  const sqrtT = Math.sqrt(T);
  const d1 = (Math.log(spot / strike) + (r + 0.5 * vol * vol) * T) / (vol * sqrtT);
  const d2 = d1 - vol * sqrtT;

  const Nd1 = normCdf(d1);
  const Nd2 = normCdf(d2);
  const Nmd1 = normCdf(-d1);
  const Nmd2 = normCdf(-d2);

  const df = Math.exp(-r * T);

  let price: number;
  let delta: number;
  let rho: number;

  if (isCall) {
    price = spot * Nd1 - strike * df * Nd2;
    delta = Nd1;
    rho = strike * T * df * Nd2;
  } else {
    price = strike * df * Nmd2 - spot * Nmd1;
    delta = -Nmd1;
    rho = -strike * T * df * Nmd2;
  }

  const nd1 = normPdf(d1);
  const gamma = nd1 / (spot * vol * sqrtT);
  const vega = spot * nd1 * sqrtT;

  const thetaTerm = isCall && thetaMode === "per-variant" ? Nd2 : Nmd2;
  const theta = -spot * nd1 * vol / (2 * sqrtT) - r * strike * df * thetaTerm;

  return { price, delta, gamma, theta, vega, rho };
}

/** Price the call and the put on the same market parameters. */
export function priceBoth(params: MarketParameters, options: PricingOptions = {}): OptionPair<GreeksResult> {
  return {
    call: priceOption({ ...params, variant: "call" }, options),
    put: priceOption({ ...params, variant: "put" }, options),
  };
}
