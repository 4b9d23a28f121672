import { z } from "zod";
import { parseVariant } from "@greeks-surface/bs-core";
import { LookbackPeriodSchema } from "../config/schema";

const positive = z.number().finite().positive();

// accepts "Call", "C", "put", "P", ...
export const VariantSchema = z.string().transform((raw, ctx) => {
  const parsed = parseVariant(raw);
  if (parsed.ok) return parsed.value;
  ctx.addIssue({ code: z.ZodIssueCode.custom, message: parsed.error.message });
  return z.NEVER;
});

export const DayCountSchema = z.enum(["ACT365", "Y365_25", "TRADING_252"]);

export const PriceRequestSchema = z.object({
  spot: positive,
  strike: positive,
  timeToExpiry: positive.optional(),
  daysToExpiry: positive.optional(),
  dayCount: DayCountSchema.default("ACT365"),
  riskFreeRate: z.number().finite(),
  volatility: positive,
  variant: VariantSchema.optional(),
}).refine((b) => (b.timeToExpiry === undefined) !== (b.daysToExpiry === undefined), {
  message: "exactly one of timeToExpiry or daysToExpiry is required",
  path: ["timeToExpiry"],
});

export type PriceRequest = z.infer<typeof PriceRequestSchema>;

const RangeSchema = z.object({
  min: z.number().finite(),
  max: z.number().finite(),
});

export const GridRequestSchema = z.object({
  strike: positive,
  timeToExpiry: positive,
  riskFreeRate: z.number().finite(),
  spotRange: RangeSchema,
  volatilityRange: RangeSchema,
  gridResolution: z.number().int().positive().optional(),
  callPurchasePrice: z.number().finite().nonnegative(),
  putPurchasePrice: z.number().finite().nonnegative(),
});

export const TickerParamsSchema = z.object({
  ticker: z.string().trim().min(1).max(16).regex(/^[A-Za-z0-9.^=-]+$/, "invalid ticker"),
});

export const MarketQuerySchema = z.object({
  period: LookbackPeriodSchema.optional(),
});

// Query strings arrive as text
const queryNumber = z.coerce.number().finite();

export const DashboardQuerySchema = z.object({
  period: LookbackPeriodSchema.optional(),
  strike: queryNumber.positive().optional(),
  timeToExpiry: queryNumber.positive().optional(),
  riskFreeRate: queryNumber.optional(),
  volatility: queryNumber.positive().optional(),
  callPurchasePrice: queryNumber.nonnegative().optional(),
  putPurchasePrice: queryNumber.nonnegative().optional(),
  gridResolution: queryNumber.int().positive().optional(),
});
