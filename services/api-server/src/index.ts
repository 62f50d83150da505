import { createApp } from "./app.js";
import { ConfigError, loadConfig } from "./config.js";
import type { AppConfig } from "./config.js";
import { createLogger } from "./logger.js";
import { createHttpServer } from "./server.js";

function readConfig(): AppConfig {
  try {
    return loadConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(`[ERROR] ${error.message}`);
      process.exit(1);
    }
    throw error;
  }
}

function main(): void {
  const config = readConfig();
  const logger = createLogger(config.logLevel);
  const app = createApp({ config, logger });
  const server = createHttpServer(app, config, logger);

  server.listen(config.port, () => {
    logger.info(`PropYield API listening on http://localhost:${config.port}${config.apiPrefix}`, {
      cors_origin: config.corsOrigin,
      log_level: config.logLevel,
    });
  });

  const shutdown = (signal: string) => {
    logger.info("Shutting down", { signal });
    server.close(() => process.exit(0));
  };
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

main();
