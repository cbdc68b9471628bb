// src/app.ts
import express from "express";
import helmet from "helmet";
import compression from "compression";
import morgan from "morgan";
import type { Config } from "./lib/config";
import { requestId } from "./middleware/requestId";
import { accessLog } from "./middleware/logger";
import { rateLimiter } from "./middleware/rateLimit";
import { errorHandler, notFound } from "./middleware/errorHandler";
import { createAktiveRouter } from "./routes/aktive";

export function createApp(config: Config) {
  const app = express();

  /* ======================= Core Middleware ======================= */
  app.set("trust proxy", 1);
  app.disable("x-powered-by");

  app.use(helmet());
  app.use(compression());
  app.use(requestId);
  app.use(accessLog);
  if (config.NODE_ENV !== "test") app.use(morgan("combined"));
  app.use(rateLimiter(config));

  /* ======================= Health ======================= */
  app.get("/api/health", (_req, res) => {
    res.json({ ok: true, service: "aktive-api", version: config.version, ts: Date.now() });
  });

  /* ======================= Routes ======================= */
  app.use(createAktiveRouter(config));

  /* ======================= 404 & Error Handler ======================= */
  app.use(notFound);
  app.use(errorHandler);

  return app;
}
