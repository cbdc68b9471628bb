// src/index.ts
import { createApp } from "./app";
import { loadConfig } from "./lib/config";
import { logger } from "./lib/logger";

process.on("unhandledRejection", (reason: unknown) => {
  logger.error({ err: reason }, "unhandledRejection");
});

try {
  const config = loadConfig();
  logger.level = config.LOG_LEVEL;

  const app = createApp(config);
  app.listen(config.PORT, config.HOST, () => {
    logger.info(
      { port: config.PORT, host: config.HOST, templates: config.TEMPLATES_DIR, version: config.version },
      "[AKTIVE-API] listening"
    );
  });
} catch (e) {
  logger.fatal({ err: e }, "Startup error");
  process.exit(1);
}
