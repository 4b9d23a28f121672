import type {
  GreeksResult,
  GridRequest,
  GridResult,
  LookbackPeriod,
  MarketParameters,
  OptionPair,
  OptionVariant,
} from "@greeks-surface/core-types";
import { buildGrid, priceBoth, priceOption } from "@greeks-surface/bs-core";
import type { ThetaMode } from "@greeks-surface/bs-core";
import type { MarketDataService } from "../marketData/marketDataService";
import { defaultHeatmapRanges, defaultPurchasePrice } from "../presentation/dashboard";
import type { DashboardView, HeatmapRanges, RangeWidths } from "../presentation/dashboard";
import { createLogger } from "../utils/logger";

const log = createLogger("pricing");

export interface PricingServiceOptions {
  thetaMode: ThetaMode;
  gridResolution: number;
  maxGridResolution: number;
  rangeWidths: RangeWidths;
  defaults: { timeToExpiry: number; riskFreeRate: number };
}

export interface DashboardOverrides {
  strike?: number;
  timeToExpiry?: number;
  riskFreeRate?: number;
  volatility?: number;
  callPurchasePrice?: number;
  putPurchasePrice?: number;
  gridResolution?: number;
}

export interface DashboardResult extends DashboardView {
  volatility: number;
  ranges: HeatmapRanges;
}

/** Binds the engine to configured conventions and the market-data collaborator. */
export class PricingService {
  constructor(
    private readonly opts: PricingServiceOptions,
    private readonly market: MarketDataService,
  ) {}

  price(params: MarketParameters, variant: OptionVariant): GreeksResult {
    return priceOption({ ...params, variant }, { thetaMode: this.opts.thetaMode });
  }

  priceBoth(params: MarketParameters): OptionPair<GreeksResult> {
    return priceBoth(params, { thetaMode: this.opts.thetaMode });
  }

  grid(request: GridRequest): GridResult {
    const resolution = request.gridResolution ?? this.opts.gridResolution;
    const started = performance.now();
    const out = buildGrid(
      { ...request, gridResolution: resolution },
      { thetaMode: this.opts.thetaMode, maxResolution: this.opts.maxGridResolution },
    );
    log.debug(`grid ${resolution}x${resolution} in ${(performance.now() - started).toFixed(1)}ms`);
    return out;
  }

  /**
   * Everything the dashboard shows for a ticker: market inputs (with fallbacks),
   * call/put Greeks at spot = strike unless overridden, default purchase prices
   * and the two P/L grids over the default ranges.
   */
  async dashboard(ticker: string, period: LookbackPeriod, overrides: DashboardOverrides = {}): Promise<DashboardResult> {
    const market = await this.market.fetchInputs(ticker, period);
    const spot = market.currentPrice;
    const volatility = overrides.volatility ?? market.historicalVolatility;
    const strike = overrides.strike ?? spot;
    const timeToExpiry = overrides.timeToExpiry ?? this.opts.defaults.timeToExpiry;
    const riskFreeRate = overrides.riskFreeRate ?? this.opts.defaults.riskFreeRate;

    const greeks = this.priceBoth({ spot, strike, timeToExpiry, riskFreeRate, volatility });
    const purchasePrices = {
      call: overrides.callPurchasePrice ?? defaultPurchasePrice(greeks.call.price),
      put: overrides.putPurchasePrice ?? defaultPurchasePrice(greeks.put.price),
    };
    // ranges follow the fetched volatility even when σ is overridden
    const ranges = defaultHeatmapRanges(spot, market.historicalVolatility, this.opts.rangeWidths);

    const grids = this.grid({
      strike,
      timeToExpiry,
      riskFreeRate,
      spotRange: ranges.spotRange,
      volatilityRange: ranges.volatilityRange,
      gridResolution: overrides.gridResolution,
      callPurchasePrice: purchasePrices.call,
      putPurchasePrice: purchasePrices.put,
    });

    return { market, strike, timeToExpiry, riskFreeRate, volatility, greeks, purchasePrices, ranges, grids };
  }
}
