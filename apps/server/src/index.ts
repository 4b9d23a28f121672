import "dotenv/config";
import { fileURLToPath } from "url";
import { loadConfig } from "./config/configManager";
import { buildApp } from "./api/app";
import { YahooChartProvider } from "./marketData/yahooChartProvider";
import { createLogger, setLogLevel } from "./utils/logger";

const log = createLogger("server");

export async function startServer() {
  const config = loadConfig();
  setLogLevel(config.logging.level);
  log.info(`thetaMode=${config.pricing.thetaMode} grid=${config.grid.resolution} log=${config.logging.level}`);

  const provider = new YahooChartProvider({
    baseUrl: config.marketData.baseUrl,
    timeoutMs: config.marketData.timeoutMs,
  });
  const app = await buildApp({ config, provider });

  const { host, port } = config.server;
  await app.listen({ port, host });
  log.info(`server up http://localhost:${port}`);

  const shutdown = (signal: string) => {
    log.info(`${signal} received, closing`);
    app.close().then(
      () => process.exit(0),
      (err: unknown) => {
        log.error("close failed:", err);
        process.exit(1);
      },
    );
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));

  return app;
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  startServer().catch((err: unknown) => {
    log.error("FATAL:", err);
    process.exit(1);
  });
}
