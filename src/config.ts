import { existsSync, readFileSync } from "fs";
import { join } from "path";
import { z } from "zod";
import { ValidationError } from "./pipeline/errors";

/**
 * Runtime configuration, read from process.env.
 *
 * Every key has a default except the two credentials; a missing
 * credential only matters once the collaborator that needs it is used.
 */

const optionalString = z
  .string()
  .optional()
  .transform((v) => (v && v.trim() ? v.trim() : undefined));

const ConfigSchema = z.object({
  ANALYSIS_API_KEY: optionalString,
  ANALYSIS_API_URL: z.string().url().default("https://openrouter.ai/api/v1"),
  ANALYSIS_MODEL: z.string().min(1).default("deepseek/deepseek-r1:nitro"),
  ANALYSIS_REFERER: z.string().default("http://localhost:3000"),
  ANALYSIS_TITLE: z.string().default("Cashtag Pulse"),
  ANALYSIS_CONCURRENCY: z.coerce.number().int().min(1).max(16).default(3),
  ANALYSIS_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),

  X_BEARER_TOKEN: optionalString,
  X_API_URL: z.string().url().default("https://api.x.com/2"),

  QUEUE_MIN_DELAY_MS: z.coerce.number().nonnegative().default(1500),
  QUEUE_MAX_DELAY_MS: z.coerce.number().nonnegative().default(3500),
  QUEUE_BACKOFF_BASE_MS: z.coerce.number().nonnegative().default(1000),

  PORT: z.coerce.number().int().positive().default(3000),
  WATCHLIST: z.string().default(""),
  CRON_SCHEDULE: z.string().default("*/30 * * * *"),
  DISABLE_CRON: z.enum(["true", "false"]).default("false"),
  DEFAULT_HOURS_BACK: z.coerce.number().int().min(1).default(24),
  DEFAULT_MAX_ITEMS: z.coerce.number().int().min(10).max(100).default(50),
});

export interface AppConfig {
  analysis: {
    apiKey?: string;
    apiUrl: string;
    model: string;
    referer: string;
    title: string;
    concurrency: number;
    timeoutMs: number;
  };
  x: {
    bearerToken?: string;
    apiUrl: string;
  };
  queue: {
    minDelayMs: number;
    maxDelayMs: number;
    backoffBaseMs: number;
  };
  server: {
    port: number;
    watchlist: string[];
    cronSchedule: string;
    cronEnabled: boolean;
  };
  defaults: {
    hoursBack: number;
    maxItems: number;
  };
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = ConfigSchema.safeParse(env);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join("; ");
    throw new ValidationError(`Invalid configuration: ${detail}`, parsed.error.issues);
  }

  const c = parsed.data;
  if (c.QUEUE_MAX_DELAY_MS < c.QUEUE_MIN_DELAY_MS) {
    throw new ValidationError("Invalid configuration: QUEUE_MAX_DELAY_MS is below QUEUE_MIN_DELAY_MS");
  }

  return {
    analysis: {
      apiKey: c.ANALYSIS_API_KEY,
      apiUrl: c.ANALYSIS_API_URL.replace(/\/+$/, ""),
      model: c.ANALYSIS_MODEL,
      referer: c.ANALYSIS_REFERER,
      title: c.ANALYSIS_TITLE,
      concurrency: c.ANALYSIS_CONCURRENCY,
      timeoutMs: c.ANALYSIS_TIMEOUT_MS,
    },
    x: {
      bearerToken: c.X_BEARER_TOKEN,
      apiUrl: c.X_API_URL.replace(/\/+$/, ""),
    },
    queue: {
      minDelayMs: c.QUEUE_MIN_DELAY_MS,
      maxDelayMs: c.QUEUE_MAX_DELAY_MS,
      backoffBaseMs: c.QUEUE_BACKOFF_BASE_MS,
    },
    server: {
      port: c.PORT,
      watchlist: parseWatchlist(c.WATCHLIST),
      cronSchedule: c.CRON_SCHEDULE,
      cronEnabled: c.DISABLE_CRON !== "true",
    },
    defaults: {
      hoursBack: c.DEFAULT_HOURS_BACK,
      maxItems: c.DEFAULT_MAX_ITEMS,
    },
  };
}

export function parseWatchlist(raw: string): string[] {
  const tickers = raw
    .split(",")
    .map((t) => t.trim())
    .filter(Boolean);
  return [...new Set(tickers)];
}

/**
 * Seed process.env from a .env file in the working directory.
 * Variables that are already set win over the file.
 */
export function loadEnvFile(path = join(process.cwd(), ".env")): void {
  if (!existsSync(path)) return;
  for (const line of readFileSync(path, "utf-8").split("\n")) {
    const m = line.match(/^([A-Z_][A-Z0-9_]*)=(.*)$/);
    if (m && !process.env[m[1]]) {
      process.env[m[1]] = m[2].replace(/^["']|["']$/g, "");
    }
  }
}
