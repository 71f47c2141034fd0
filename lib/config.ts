import { z } from "zod";
import { ValidationError } from "@/lib/errors";
import type { LogLevel } from "@/lib/log";

export const DEFAULT_STATS_BASE_URL = "https://stats.nba.com/stats";
export const DEFAULT_TIMEOUT_MS = 30_000;
export const DEFAULT_DELAY_MS = 600;
export const DEFAULT_MAX_ATTEMPTS = 3;

const intFromEnv = (fallback: number, min: number) =>
  z
    .string()
    .optional()
    .transform((v) => (v === undefined || v.trim() === "" ? String(fallback) : v.trim()))
    .pipe(z.coerce.number().int().min(min));

const EnvSchema = z.object({
  NBA_STATS_BASE_URL: z
    .string()
    .optional()
    .transform((v) => (v && v.trim() !== "" ? v.trim() : DEFAULT_STATS_BASE_URL))
    .pipe(z.string().url()),
  NBA_STATS_TIMEOUT_MS: intFromEnv(DEFAULT_TIMEOUT_MS, 1),
  NBA_STATS_DELAY_MS: intFromEnv(DEFAULT_DELAY_MS, 0),
  NBA_STATS_MAX_ATTEMPTS: intFromEnv(DEFAULT_MAX_ATTEMPTS, 1),
  LOG_LEVEL: z
    .string()
    .optional()
    .transform((v) => (v ?? "info").trim().toLowerCase())
    .pipe(z.enum(["debug", "info", "warn", "error", "silent"])),
});

export type AppConfig = {
  statsBaseUrl: string;
  timeoutMs: number;
  delayMs: number;
  maxAttempts: number;
  logLevel: LogLevel;
};

export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const msg = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new ValidationError(`Invalid configuration: ${msg}`);
  }
  const e = parsed.data;
  return {
    statsBaseUrl: e.NBA_STATS_BASE_URL.replace(/\/+$/, ""),
    timeoutMs: e.NBA_STATS_TIMEOUT_MS,
    delayMs: e.NBA_STATS_DELAY_MS,
    maxAttempts: e.NBA_STATS_MAX_ATTEMPTS,
    logLevel: e.LOG_LEVEL,
  };
}
