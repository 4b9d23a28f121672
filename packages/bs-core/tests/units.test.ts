import { describe, it, expect } from "vitest";
import { daysToYearFraction } from "../src/units";
import { roundHalfEven } from "../src/utils";

describe("day counts", () => {
  it("converts days to years per convention", () => {
    expect(daysToYearFraction(73, "ACT365")).toBeCloseTo(0.2, 12);
    expect(daysToYearFraction(90, "Y365_25")).toBeCloseTo(90 / 365.25, 12);
    expect(daysToYearFraction(126, "TRADING_252")).toBeCloseTo(0.5, 12);
  });
});

describe("roundHalfEven", () => {
  it("rounds ties to even", () => {
    expect(roundHalfEven(10.5)).toBe(10);
    expect(roundHalfEven(11.5)).toBe(12);
    expect(roundHalfEven(-2.5)).toBe(-2);
  });

  it("rounds non-ties normally", () => {
    expect(roundHalfEven(10.450583572185565)).toBe(10);
    expect(roundHalfEven(5.573526022256971)).toBe(6);
    expect(roundHalfEven(1.2345, 2)).toBe(1.23);
  });

  it("only treats exact halves as ties", () => {
    expect(roundHalfEven(11.4999999995)).toBe(11);
    expect(roundHalfEven(12.5000000005)).toBe(13);
  });
});
