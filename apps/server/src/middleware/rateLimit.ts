import rateLimit from "express-rate-limit";
import type { Config } from "../lib/config";

export function rateLimiter(config: Pick<Config, "RATE_LIMIT_WINDOW_MS" | "RATE_LIMIT_MAX">) {
  return rateLimit({
    windowMs: config.RATE_LIMIT_WINDOW_MS,
    max: config.RATE_LIMIT_MAX,
    standardHeaders: true,
    legacyHeaders: false,
  });
}
