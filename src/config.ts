import "dotenv/config";
import { z } from "zod";

export const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 " +
  "(KHTML, like Gecko) Chrome/122.0 Safari/537.36";

const ConfigSchema = z.object({
  baseUrl: z
    .string()
    .url()
    .transform((url) => url.replace(/\/+$/, ""))
    .default("https://www.basketball-reference.com"),
  userAgent: z.string().min(1).default(DEFAULT_USER_AGENT),
  requestTimeoutMs: z.coerce.number().int().positive().default(30_000),
  outputDir: z.string().min(1).default("."),
  logLevel: z.enum(["ERROR", "WARN", "INFO", "DEBUG"]).default("INFO"),
  logDir: z.string().min(1).optional(),
});

export type Config = z.infer<typeof ConfigSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  return ConfigSchema.parse({
    baseUrl: env.SITE_URL || undefined,
    userAgent: env.USER_AGENT || undefined,
    requestTimeoutMs: env.REQUEST_TIMEOUT_MS || undefined,
    outputDir: env.OUTPUT_DIR || undefined,
    logLevel: env.LOG_LEVEL?.toUpperCase() || undefined,
    logDir: env.LOG_DIR || undefined,
  });
}

export const config: Readonly<Config> = Object.freeze(loadConfig());
