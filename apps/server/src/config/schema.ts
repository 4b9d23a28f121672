import { z } from "zod";

export const LogLevelSchema = z.enum(["debug", "info", "warn", "error"]);

export const LookbackPeriodSchema = z.enum(["6mo", "1y", "2y", "5y", "10y", "ytd"]);

export const ServerSchema = z.object({
  host: z.string().min(1),
  port: z.number().int().min(0).max(65535),
});

export const LoggingSchema = z.object({
  level: LogLevelSchema,
});

export const PricingSchema = z.object({
  // "put-branch" reproduces the legacy dashboard's theta for calls
  thetaMode: z.enum(["per-variant", "put-branch"]),
});

export const GridSchema = z.object({
  resolution: z.number().int().positive(),
  maxResolution: z.number().int().positive(),
  spotHalfWidth: z.number().positive(),
  volHalfWidth: z.number().positive(),
}).refine((g) => g.resolution <= g.maxResolution, {
  message: "grid.resolution must not exceed grid.maxResolution",
  path: ["resolution"],
});

export const MarketDataSchema = z.object({
  baseUrl: z.string().url(),
  timeoutMs: z.number().int().positive(),
  treasuryTicker: z.string().min(1),
  tradingDaysPerYear: z.number().positive(),
  defaultPeriod: LookbackPeriodSchema,
  fallbacks: z.object({
    price: z.number().positive(),
    volatility: z.number().positive(),
    riskFreeRate: z.number().nonnegative(),
  }),
});

export const DefaultsSchema = z.object({
  timeToExpiry: z.number().positive(),
  riskFreeRate: z.number(),
});

export const AppConfigSchema = z.object({
  server: ServerSchema,
  logging: LoggingSchema,
  pricing: PricingSchema,
  grid: GridSchema,
  marketData: MarketDataSchema,
  defaults: DefaultsSchema,
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type LogLevel = z.infer<typeof LogLevelSchema>;
