// src/lib/config.ts
import "dotenv/config";
import path from "path";
import { z } from "zod";

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(5000),
  HOST: z.string().default("0.0.0.0"),
  TEMPLATES_DIR: z.string().default(path.resolve(__dirname, "..", "..", "templates")),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().default(60_000),
  RATE_LIMIT_MAX: z.coerce.number().int().positive().default(600),
  NODE_ENV: z.string().default("development"),
});

export type Config = z.infer<typeof EnvSchema> & {
  version: string;
  aktiveHtml: string;
  aktiveCss: string;
  formHtml: string;
};

export const APP_VERSION = "1.2.0";

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new Error(
      "Ungültige Konfiguration: " +
        parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ")
    );
  }
  const dir = parsed.data.TEMPLATES_DIR;
  return {
    ...parsed.data,
    version: APP_VERSION,
    aktiveHtml: path.join(dir, "documents", "aktive_template.html"),
    aktiveCss: path.join(dir, "documents", "aktive_template.css"),
    formHtml: path.join(dir, "form_aktive.html"),
  };
}
