import type { FastifyInstance } from "fastify";
import { daysToYearFraction } from "@greeks-surface/bs-core";
import type { PricingService } from "../../services/pricingService";
import { formatGreeks } from "../../presentation/format";
import { toHeatmap } from "../../presentation/heatmap";
import { GridRequestSchema, PriceRequestSchema } from "../schemas";

export function pricingRoutes(service: PricingService) {
  return async (f: FastifyInstance) => {
    f.post("/price", async (req) => {
      const body = PriceRequestSchema.parse(req.body);
      const timeToExpiry = body.timeToExpiry ?? daysToYearFraction(body.daysToExpiry ?? 0, body.dayCount);
      const params = {
        spot: body.spot,
        strike: body.strike,
        timeToExpiry,
        riskFreeRate: body.riskFreeRate,
        volatility: body.volatility,
      };

      if (body.variant) {
        const result = service.price(params, body.variant);
        return { params: { ...params, variant: body.variant }, result, formatted: formatGreeks(result) };
      }

      const { call, put } = service.priceBoth(params);
      return {
        params,
        call,
        put,
        formatted: { call: formatGreeks(call), put: formatGreeks(put) },
      };
    });

    f.post("/grid", async (req) => {
      const body = GridRequestSchema.parse(req.body);
      const { callGrid, putGrid } = service.grid(body);
      return {
        callGrid,
        putGrid,
        callHeatmap: toHeatmap(callGrid),
        putHeatmap: toHeatmap(putGrid),
      };
    });
  };
}
