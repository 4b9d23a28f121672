import { describe, it, expect } from "vitest";
import type { MarketInputs } from "@greeks-surface/core-types";
import { buildGrid, priceBoth } from "@greeks-surface/bs-core";
import { formatGreeks, formatPercent } from "../../src/presentation/format";
import { toHeatmap } from "../../src/presentation/heatmap";
import {
  defaultHeatmapRanges,
  defaultPurchasePrice,
  renderDashboardText,
} from "../../src/presentation/dashboard";

const ATM = { spot: 100, strike: 100, timeToExpiry: 1, riskFreeRate: 0.05, volatility: 0.2 };

describe("formatGreeks", () => {
  it("prices to 2 dp, greeks to 4 dp", () => {
    const { call, put } = priceBoth(ATM);
    expect(formatGreeks(call)).toEqual({
      price: "10.45",
      delta: "0.6368",
      gamma: "0.0188",
      theta: "-6.4140",
      vega: "37.5240",
      rho: "53.2325",
    });
    expect(formatGreeks(put).price).toBe("5.57");
    expect(formatGreeks(put).delta).toBe("-0.3632");
  });

  it("formats percentages", () => {
    expect(formatPercent(0.0425)).toBe("4.25%");
  });
});

describe("defaultPurchasePrice", () => {
  it("rounds model prices to whole units", () => {
    expect(defaultPurchasePrice(10.450583572185565)).toBe(10);
    expect(defaultPurchasePrice(5.573526022256971)).toBe(6);
    expect(defaultPurchasePrice(2.5)).toBe(2);
  });
});

describe("defaultHeatmapRanges", () => {
  it("centres on spot and vol", () => {
    const r = defaultHeatmapRanges(100, 0.2);
    expect(r.spotRange).toEqual({ min: 90, max: 110 });
    expect(r.volatilityRange.min).toBeCloseTo(0.15, 12);
    expect(r.volatilityRange.max).toBeCloseTo(0.25, 12);
  });

  it("clamps to the slider bounds", () => {
    const low = defaultHeatmapRanges(5, 0.02);
    expect(low.spotRange).toEqual({ min: 0, max: 15 });
    expect(low.volatilityRange.min).toBe(0);

    const high = defaultHeatmapRanges(100, 0.98);
    expect(high.volatilityRange.max).toBe(1);
  });

  it("takes configured widths", () => {
    const r = defaultHeatmapRanges(200, 0.3, { spotHalfWidth: 50, volHalfWidth: 0.1 });
    expect(r.spotRange).toEqual({ min: 150, max: 250 });
    expect(r.volatilityRange.max).toBeCloseTo(0.4, 12);
  });
});

describe("toHeatmap", () => {
  it("rounds axes and nulls unpriced cells", () => {
    const { callGrid, putGrid } = buildGrid({
      strike: 100,
      timeToExpiry: 1,
      riskFreeRate: 0.05,
      spotRange: { min: 0, max: 100 },
      volatilityRange: { min: 0.12, max: 0.46 },
      gridResolution: 3,
      callPurchasePrice: 10,
      putPurchasePrice: 6,
    });
    const h = toHeatmap(callGrid);
    expect(h.title).toBe("Call Option Profitability");
    expect(h.x).toEqual([0.12, 0.29, 0.46]);
    expect(h.y).toEqual([0, 50, 100]);
    expect(h.z[0]).toEqual([null, null, null]);
    expect(h.z[2][0]).toBe(callGrid.profitMatrix[2][0]);
    expect(h.zmid).toBe(0);
    expect(h.colorscale).toBe("RdYlGn");
    expect(toHeatmap(putGrid, "Puts").title).toBe("Puts");
  });
});

describe("renderDashboardText", () => {
  it("lays out market inputs, greeks and grid extents", () => {
    const market: MarketInputs = {
      ticker: "AAPL",
      period: "1y",
      currentPrice: 100,
      historicalVolatility: 0.2,
      riskFreeRate: 0.01,
      sources: { currentPrice: "fallback", historicalVolatility: "fallback", riskFreeRate: "fallback" },
      warnings: ["Could not fetch price for AAPL: offline; using default 100"],
    };
    const grids = buildGrid({
      strike: 100,
      timeToExpiry: 1,
      riskFreeRate: 0.05,
      spotRange: { min: 90, max: 110 },
      volatilityRange: { min: 0.15, max: 0.25 },
      gridResolution: 3,
      callPurchasePrice: 10,
      putPurchasePrice: 6,
    });
    const text = renderDashboardText({
      market,
      strike: 100,
      timeToExpiry: 1,
      riskFreeRate: 0.05,
      greeks: priceBoth(ATM),
      purchasePrices: { call: 10, put: 6 },
      grids,
    });
    const lines = text.split("\n");

    expect(lines[0]).toBe("AAPL (1y)");
    expect(lines).toContain("  Current price:        $100.00 (default)");
    expect(lines).toContain("  Historical vol:       0.20 (default)");
    expect(lines).toContain("  Treasury yield:       1.00% (default)");
    expect(lines).toContain("                  Call         Put");
    expect(lines).toContain("  Price         $10.45       $5.57");
    expect(lines).toContain("  Delta         0.6368     -0.3632");
    expect(text).toMatch(/^ {2}Call P\/L vs purchase \$10\.00: \[-?\d+\.\d{2}, -?\d+\.\d{2}\] over S 90\.00\.\.110\.00, σ 0\.15\.\.0\.25$/m);
    expect(text).toMatch(/^ {2}Put P\/L vs purchase \$6\.00: /m);
    expect(lines[lines.length - 1]).toBe("  ! Could not fetch price for AAPL: offline; using default 100");
  });
});
