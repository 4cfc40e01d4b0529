import { z } from "zod";
import type { LogLevel } from "./logging.js";

export const MAX_LONG_POLL_SECONDS = 60;

export interface AppConfig {
  port: number;
  dataFile: string;
  apiTokens: Map<string, string>;
  longPollTimeoutSeconds: number;
  finishLockTtlSeconds: number;
  tickCacheTtlSeconds: number;
  rateLimitTokens: number;
  rateLimitPeriodSeconds: number;
  corsOrigin: string;
  logLevel: LogLevel;
}

/** Parses `token:owner` pairs separated by commas. */
export function parseApiTokens(raw: string): Map<string, string> {
  const tokens = new Map<string, string>();
  for (const entry of raw.split(",")) {
    const trimmed = entry.trim();
    if (!trimmed) {
      continue;
    }
    const separator = trimmed.lastIndexOf(":");
    if (separator <= 0 || separator === trimmed.length - 1) {
      throw new Error(`API_TOKENS entry "${trimmed}" must look like token:owner.`);
    }
    tokens.set(trimmed.slice(0, separator), trimmed.slice(separator + 1));
  }
  return tokens;
}

const envSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(2091),
  DATA_FILE: z.string().min(1).default("data/timers.json"),
  API_TOKENS: z.string().default(""),
  LONG_POLL_TIMEOUT: z.coerce.number().positive().max(MAX_LONG_POLL_SECONDS).default(30),
  FINISH_LOCK_TTL: z.coerce.number().positive().default(5),
  TICK_CACHE_TTL: z.coerce.number().positive().default(30),
  RATE_LIMIT_TOKENS: z.coerce.number().int().positive().default(240),
  RATE_LIMIT_PERIOD: z.coerce.number().int().positive().default(60),
  CORS_ORIGIN: z.string().default("*"),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error", "silent"]).default("info")
});

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join(".")}: ${issue.message}`).join("; ");
    throw new Error(`Invalid configuration: ${issues}`);
  }

  const values = parsed.data;
  return {
    port: values.PORT,
    dataFile: values.DATA_FILE,
    apiTokens: parseApiTokens(values.API_TOKENS),
    longPollTimeoutSeconds: values.LONG_POLL_TIMEOUT,
    finishLockTtlSeconds: values.FINISH_LOCK_TTL,
    tickCacheTtlSeconds: values.TICK_CACHE_TTL,
    rateLimitTokens: values.RATE_LIMIT_TOKENS,
    rateLimitPeriodSeconds: values.RATE_LIMIT_PERIOD,
    corsOrigin: values.CORS_ORIGIN,
    logLevel: values.LOG_LEVEL
  };
}
