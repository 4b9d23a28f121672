#!/usr/bin/env tsx
/**
 * Terminal dashboard: market inputs, call/put Greeks and P/L grid extents for a ticker.
 *
 * Usage:
 *   npm run dashboard -- <ticker> [period] [strike] [T]
 *   npm run dashboard -- AAPL 1y 190 0.5
 */

import "dotenv/config";
import { LookbackPeriodSchema } from "../config/schema";
import { loadConfig } from "../config/configManager";
import { createServices } from "../api/app";
import { YahooChartProvider } from "../marketData/yahooChartProvider";
import { renderDashboardText } from "../presentation/dashboard";
import { createLogger, setLogLevel } from "../utils/logger";

const log = createLogger("dashboard");

function optionalNumber(raw: string | undefined, name: string): number | undefined {
  if (raw === undefined) return undefined;
  const x = Number(raw);
  if (!Number.isFinite(x) || x <= 0) {
    throw new Error(`${name} must be a positive number, got "${raw}"`);
  }
  return x;
}

async function main() {
  const [ticker = "AAPL", periodArg, strikeArg, tArg] = process.argv.slice(2);
  const config = loadConfig();
  setLogLevel(config.logging.level);

  const period = LookbackPeriodSchema.parse(periodArg ?? config.marketData.defaultPeriod);
  const provider = new YahooChartProvider({
    baseUrl: config.marketData.baseUrl,
    timeoutMs: config.marketData.timeoutMs,
  });
  const { pricing } = createServices({ config, provider });

  const view = await pricing.dashboard(ticker, period, {
    strike: optionalNumber(strikeArg, "strike"),
    timeToExpiry: optionalNumber(tArg, "T"),
  });

  console.log("=".repeat(60));
  console.log(renderDashboardText(view));
  console.log("=".repeat(60));
}

main().catch((err: unknown) => {
  log.error("failed:", err);
  process.exit(1);
});
