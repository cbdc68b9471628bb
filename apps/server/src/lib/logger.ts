// src/lib/logger.ts
import pino from "pino";

const level =
  process.env.LOG_LEVEL || (process.env.NODE_ENV === "test" ? "silent" : "info");

export const logger = pino({
  name: "aktive-api",
  level,
  redact: ["req.headers.authorization", "iban"],
});
