import axios from "axios";
import type { AxiosInstance } from "axios";
import { z } from "zod";
import type { LookbackPeriod } from "@greeks-surface/core-types";
import { createLogger } from "../utils/logger";
import { MarketDataError } from "./errors";
import type { MarketDataProvider } from "./types";

const log = createLogger("market");

const YEAR_SEC = 365 * 24 * 3600;

const ChartResultSchema = z.object({
  meta: z.object({
    symbol: z.string(),
    regularMarketPrice: z.number().optional(),
  }),
  timestamp: z.array(z.number()).optional(),
  indicators: z.object({
    quote: z.array(z.object({
      close: z.array(z.number().nullable()).optional(),
    })),
  }),
  events: z.object({
    dividends: z.record(z.object({ amount: z.number(), date: z.number() })).optional(),
  }).optional(),
});

const ChartResponseSchema = z.object({
  chart: z.object({
    result: z.array(ChartResultSchema).nullable(),
    error: z.object({ code: z.string(), description: z.string() }).nullable().optional(),
  }),
});

export type ChartResult = z.infer<typeof ChartResultSchema>;

export interface YahooChartProviderOptions {
  baseUrl: string;
  timeoutMs: number;
}

/** Daily bars from the Yahoo Finance chart endpoint. */
export class YahooChartProvider implements MarketDataProvider {
  private readonly http: AxiosInstance;

  constructor(opts: YahooChartProviderOptions, http?: AxiosInstance) {
    this.http = http ?? axios.create({ baseURL: opts.baseUrl, timeout: opts.timeoutMs });
  }

  async chart(ticker: string, range: string, withDividends = false): Promise<ChartResult> {
    const url = `/v8/finance/chart/${encodeURIComponent(ticker)}`;
    const params: Record<string, string> = { range, interval: "1d" };
    if (withDividends) params.events = "div";

    let data: unknown;
    try {
      const res = await this.http.get<unknown>(url, { params });
      data = res.data;
    } catch (err) {
      const status = axios.isAxiosError(err) ? err.response?.status : undefined;
      log.debug(`chart ${ticker} ${range} failed`, status ?? err);
      throw new MarketDataError(
        status ? `chart request for ${ticker} failed with HTTP ${status}` : `chart request for ${ticker} failed`,
        ticker,
        { cause: err },
      );
    }

    const parsed = ChartResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new MarketDataError(`unexpected chart payload for ${ticker}`, ticker, { cause: parsed.error });
    }
    const { result, error } = parsed.data.chart;
    if (error) {
      throw new MarketDataError(`${error.code}: ${error.description}`, ticker);
    }
    if (!result || result.length === 0) {
      throw new MarketDataError(`no chart data for ${ticker}`, ticker);
    }
    return result[0];
  }

  async closes(ticker: string, period: LookbackPeriod): Promise<number[]> {
    const res = await this.chart(ticker, period);
    return closeSeries(res);
  }

  async latestClose(ticker: string): Promise<number> {
    const res = await this.chart(ticker, "5d");
    const series = closeSeries(res);
    const last = series.length > 0 ? series[series.length - 1] : res.meta.regularMarketPrice;
    if (last === undefined || !(last > 0)) {
      throw new MarketDataError(`no closing price for ${ticker}`, ticker);
    }
    return last;
  }

  async trailingYield(ticker: string): Promise<number | null> {
    const res = await this.chart(ticker, "1y", true);
    const series = closeSeries(res);
    const price = series.length > 0 ? series[series.length - 1] : res.meta.regularMarketPrice;
    if (price === undefined || !(price > 0)) {
      throw new MarketDataError(`no closing price for ${ticker}`, ticker);
    }
    return trailingYieldFrom(res, price);
  }
}

/** Non-null closes in bar order. */
export function closeSeries(res: ChartResult): number[] {
  const raw = res.indicators.quote[0]?.close ?? [];
  return raw.filter((x): x is number => x !== null && Number.isFinite(x));
}

/** Dividends paid in the year before the last bar, over price; null when there are none. */
export function trailingYieldFrom(res: ChartResult, price: number): number | null {
  const dividends = Object.values(res.events?.dividends ?? {});
  if (dividends.length === 0) return null;

  const stamps = res.timestamp ?? [];
  const asOf = stamps.length > 0 ? stamps[stamps.length - 1] : Math.max(...dividends.map((d) => d.date));
  const paid = dividends
    .filter((d) => d.date > asOf - YEAR_SEC && d.date <= asOf)
    .reduce((s, d) => s + d.amount, 0);

  return paid > 0 ? paid / price : null;
}
