import type { FastifyInstance } from "fastify";
import type { LookbackPeriod } from "@greeks-surface/core-types";
import type { MarketDataService } from "../../marketData/marketDataService";
import type { PricingService } from "../../services/pricingService";
import { formatGreeks } from "../../presentation/format";
import { toHeatmap } from "../../presentation/heatmap";
import { DashboardQuerySchema, MarketQuerySchema, TickerParamsSchema } from "../schemas";

export interface MarketRouteDeps {
  market: MarketDataService;
  pricing: PricingService;
  defaultPeriod: LookbackPeriod;
}

export function marketRoutes(deps: MarketRouteDeps) {
  return async (f: FastifyInstance) => {
    f.get("/market/:ticker", async (req) => {
      const { ticker } = TickerParamsSchema.parse(req.params);
      const { period } = MarketQuerySchema.parse(req.query);
      return deps.market.fetchInputs(ticker, period ?? deps.defaultPeriod);
    });

    f.get("/dashboard/:ticker", async (req) => {
      const { ticker } = TickerParamsSchema.parse(req.params);
      const { period, ...overrides } = DashboardQuerySchema.parse(req.query);
      const view = await deps.pricing.dashboard(ticker, period ?? deps.defaultPeriod, overrides);

      return {
        market: view.market,
        params: {
          spot: view.market.currentPrice,
          strike: view.strike,
          timeToExpiry: view.timeToExpiry,
          riskFreeRate: view.riskFreeRate,
          volatility: view.volatility,
        },
        greeks: view.greeks,
        formatted: { call: formatGreeks(view.greeks.call), put: formatGreeks(view.greeks.put) },
        purchasePrices: view.purchasePrices,
        ranges: view.ranges,
        callHeatmap: toHeatmap(view.grids.callGrid),
        putHeatmap: toHeatmap(view.grids.putGrid),
      };
    });
  };
}
