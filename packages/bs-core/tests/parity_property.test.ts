import { describe, it } from "vitest";
import fc from "fast-check";
import { priceBoth } from "../src/blackScholes";

const arb = fc.record({
  spot: fc.double({ min: 1, max: 1000, noNaN: true }),
  k: fc.double({ min: -1, max: 1, noNaN: true }), // log-moneyness
  timeToExpiry: fc.double({ min: 1 / 365, max: 5, noNaN: true }),
  riskFreeRate: fc.double({ min: 0, max: 0.1, noNaN: true }),
  volatility: fc.double({ min: 0.01, max: 2, noNaN: true }),
});

describe("Black-Scholes properties under random inputs", () => {
  it("put-call parity: C - P = S - K e^{-rT}", () => {
    fc.assert(fc.property(arb, ({ spot, k, timeToExpiry, riskFreeRate, volatility }) => {
      const strike = spot * Math.exp(k);
      const { call, put } = priceBoth({ spot, strike, timeToExpiry, riskFreeRate, volatility });
      const rhs = spot - strike * Math.exp(-riskFreeRate * timeToExpiry);
      return Math.abs(call.price - put.price - rhs) <= 1e-6;
    }), { numRuns: 300 });
  });

  it("call delta - put delta = 1", () => {
    fc.assert(fc.property(arb, ({ spot, k, timeToExpiry, riskFreeRate, volatility }) => {
      const { call, put } = priceBoth({ spot, strike: spot * Math.exp(k), timeToExpiry, riskFreeRate, volatility });
      return Math.abs(call.delta - put.delta - 1) <= 1e-12;
    }), { numRuns: 300 });
  });

  it("gamma and vega do not depend on the variant", () => {
    fc.assert(fc.property(arb, ({ spot, k, timeToExpiry, riskFreeRate, volatility }) => {
      const { call, put } = priceBoth({ spot, strike: spot * Math.exp(k), timeToExpiry, riskFreeRate, volatility });
      return call.gamma === put.gamma && call.vega === put.vega;
    }), { numRuns: 200 });
  });

  it("prices are non-negative and bounded by spot/strike", () => {
    fc.assert(fc.property(arb, ({ spot, k, timeToExpiry, riskFreeRate, volatility }) => {
      const strike = spot * Math.exp(k);
      const { call, put } = priceBoth({ spot, strike, timeToExpiry, riskFreeRate, volatility });
      const eps = 1e-9 * (1 + spot + strike);
      return call.price >= -eps && call.price <= spot + eps && put.price >= -eps && put.price <= strike + eps;
    }), { numRuns: 200 });
  });
});
