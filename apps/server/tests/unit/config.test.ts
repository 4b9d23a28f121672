import { afterEach, describe, it, expect } from "vitest";
import { ZodError } from "zod";
import { loadConfig, parseConfig, resetConfigCache } from "../../src/config/configManager";
import { TEST_CONFIG_DOC } from "../helpers/fakes";

describe("config manager", () => {
  afterEach(() => resetConfigCache());

  it("loads, validates and freezes the default file", () => {
    const cfg = loadConfig();
    expect(Object.isFrozen(cfg)).toBe(true);
    expect(Object.isFrozen(cfg.marketData.fallbacks)).toBe(true);
    expect(cfg.grid.resolution).toBe(50);
    expect(cfg.marketData.fallbacks).toEqual({ price: 100, volatility: 0.2, riskFreeRate: 0.01 });
    expect(cfg.pricing.thetaMode).toBe("per-variant");
  });

  it("caches until reset", () => {
    const a = loadConfig();
    expect(loadConfig()).toBe(a);
    resetConfigCache();
    expect(loadConfig()).not.toBe(a);
  });

  it("falls back to the repository default when the path is missing", () => {
    const cfg = loadConfig("does/not/exist.yaml");
    expect(cfg.marketData.treasuryTicker).toBe("SHY");
  });
});

describe("parseConfig", () => {
  it("applies env overrides", () => {
    const cfg = parseConfig(TEST_CONFIG_DOC, { PORT: "8080", HOST: "localhost", LOG_LEVEL: "DEBUG" });
    expect(cfg.server).toEqual({ host: "localhost", port: 8080 });
    expect(cfg.logging.level).toBe("debug");
  });

  it("ignores an unknown log level", () => {
    const cfg = parseConfig(TEST_CONFIG_DOC, { LOG_LEVEL: "chatty" });
    expect(cfg.logging.level).toBe("error");
  });

  it("rejects a non-numeric port", () => {
    expect(() => parseConfig(TEST_CONFIG_DOC, { PORT: "abc" })).toThrow(ZodError);
  });

  it("rejects a resolution above the cap", () => {
    const doc = { ...TEST_CONFIG_DOC, grid: { ...TEST_CONFIG_DOC.grid, resolution: 500 } };
    expect(() => parseConfig(doc)).toThrow(/maxResolution/);
  });

  it("rejects an unknown theta mode", () => {
    const doc = { ...TEST_CONFIG_DOC, pricing: { thetaMode: "lowercase-call" } };
    expect(() => parseConfig(doc)).toThrow(ZodError);
  });
});
