import type { InputSource, LookbackPeriod, MarketInputs } from "@greeks-surface/core-types";
import { createLogger } from "../utils/logger";
import { historicalVolatility } from "./historicalVolatility";
import type { MarketDataProvider, MarketFallbacks } from "./types";

const log = createLogger("market");

export interface MarketDataServiceOptions {
  fallbacks: MarketFallbacks;
  treasuryTicker: string;
  tradingDaysPerYear: number;
}

interface Resolved {
  value: number;
  source: InputSource;
}

const isPositive = (x: number) => Number.isFinite(x) && x > 0;

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Resolves the three market inputs the pricer needs. Each one falls back to
 * its configured default independently, with a warning, when retrieval fails.
 */
export class MarketDataService {
  constructor(
    private readonly provider: MarketDataProvider,
    private readonly opts: MarketDataServiceOptions,
  ) {}

  async fetchInputs(ticker: string, period: LookbackPeriod): Promise<MarketInputs> {
    const symbol = ticker.trim().toUpperCase();
    const warnings: string[] = [];

    const resolve = async (
      label: string,
      fallback: number,
      fetcher: () => Promise<number | null>,
      usable: (x: number) => boolean = Number.isFinite,
    ): Promise<Resolved> => {
      let message: string;
      try {
        const value = await fetcher();
        if (value !== null && usable(value)) {
          return { value, source: "market" };
        }
        message = `${label} unavailable; using default ${fallback}`;
      } catch (err) {
        message = `Could not fetch ${label}: ${errorMessage(err)}; using default ${fallback}`;
      }
      warnings.push(message);
      log.warn(message);
      return { value: fallback, source: "fallback" };
    };

    const [price, vol, rate] = await Promise.all([
      resolve(`price for ${symbol}`, this.opts.fallbacks.price, () =>
        this.provider.latestClose(symbol), isPositive),
      // flat history gives zero volatility, which the engine cannot price
      resolve(`volatility for ${symbol}`, this.opts.fallbacks.volatility, async () =>
        historicalVolatility(await this.provider.closes(symbol, period), this.opts.tradingDaysPerYear), isPositive),
      resolve("risk-free rate", this.opts.fallbacks.riskFreeRate, () =>
        this.provider.trailingYield(this.opts.treasuryTicker)),
    ]);

    log.debug(`${symbol} price=${price.value} vol=${vol.value} rate=${rate.value}`);

    return {
      ticker: symbol,
      period,
      currentPrice: price.value,
      historicalVolatility: vol.value,
      riskFreeRate: rate.value,
      sources: {
        currentPrice: price.source,
        historicalVolatility: vol.source,
        riskFreeRate: rate.source,
      },
      warnings,
    };
  }
}
