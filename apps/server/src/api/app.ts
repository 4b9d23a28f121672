import Fastify from "fastify";
import type { FastifyInstance } from "fastify";
import cors from "@fastify/cors";
import type { AppConfig } from "../config/schema";
import { MarketDataService } from "../marketData/marketDataService";
import type { MarketDataProvider } from "../marketData/types";
import { PricingService } from "../services/pricingService";
import { errorHandler } from "./errors";
import { marketRoutes } from "./routes/market";
import { pricingRoutes } from "./routes/pricing";

export interface AppDeps {
  config: AppConfig;
  provider: MarketDataProvider;
}

export function createServices(deps: AppDeps) {
  const { config, provider } = deps;
  const market = new MarketDataService(provider, {
    fallbacks: config.marketData.fallbacks,
    treasuryTicker: config.marketData.treasuryTicker,
    tradingDaysPerYear: config.marketData.tradingDaysPerYear,
  });
  const pricing = new PricingService(
    {
      thetaMode: config.pricing.thetaMode,
      gridResolution: config.grid.resolution,
      maxGridResolution: config.grid.maxResolution,
      rangeWidths: { spotHalfWidth: config.grid.spotHalfWidth, volHalfWidth: config.grid.volHalfWidth },
      defaults: config.defaults,
    },
    market,
  );
  return { market, pricing };
}

/** Build the HTTP app without listening; tests drive it with inject(). */
export async function buildApp(deps: AppDeps): Promise<FastifyInstance> {
  const app = Fastify({ logger: false }); // tagged console logger instead
  await app.register(cors, { origin: true });
  app.setErrorHandler(errorHandler);

  const { market, pricing } = createServices(deps);

  app.get("/health", async () => ({ ok: true, ts: Date.now() }));
  await app.register(pricingRoutes(pricing));
  await app.register(marketRoutes({ market, pricing, defaultPeriod: deps.config.marketData.defaultPeriod }));

  return app;
}
