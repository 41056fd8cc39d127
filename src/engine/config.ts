import { config as loadEnv } from "dotenv";
import { randomUUID } from "node:crypto";

loadEnv();

export type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace" | "silent";

const LOG_LEVELS: ReadonlyArray<LogLevel> = ["fatal", "error", "warn", "info", "debug", "trace", "silent"];

interface NumberOptions {
  readonly min?: number;
  readonly max?: number;
  readonly integer?: boolean;
}

const DEFAULT_LOG_LEVEL: LogLevel = "info";

const DEFAULTS = {
  REDIS_URL: "redis://localhost:6379",
  CONCURRENCY_LIMIT: 5,
  CLASSIFY_CONCURRENCY: 8,
  HTTP_PORT: 9000,
  PROMETHEUS_PORT: 9001,
  MAX_RETRIES: 3,
  RETRY_BACKOFF_BASE: 2,
  SCHEDULE_INTERVAL_MS: 30_000,
  BATCH_FETCH_TIMEOUT_SEC: 30,
  PRODUCT_LIST_KEY: "products:set",
  TTL_SNAPSHOT_SECONDS: 30 * 60,
  ANALYSIS_WINDOW_DAYS: 30,
  LLM_MODEL: "gpt-4o-mini",
  LLM_TIMEOUT_MS: 8_000,
  NODE_ENV: "development",
};

const warnings: string[] = [];

function warn(message: string): void {
  warnings.push(message);
}

function readString(key: string, fallback: string, { allowEmpty = false }: { allowEmpty?: boolean } = {}): string {
  const raw = process.env[key];
  if (raw === undefined || (!allowEmpty && raw.trim().length === 0)) {
    warn(`${key} is not set; using fallback value.`);
    return fallback;
  }
  return raw;
}

function readOptionalSecret(key: string): string | undefined {
  const raw = process.env[key];
  if (raw === undefined || raw.trim().length === 0) {
    return undefined;
  }
  return raw.trim();
}

function readUrl(key: string, fallback: string): string {
  const raw = process.env[key];
  if (!raw) {
    warn(`${key} is not set; defaulting to ${fallback}.`);
    return fallback;
  }
  try {
    // eslint-disable-next-line no-new
    new URL(raw);
    return raw;
  } catch {
    warn(`${key} is invalid (${raw}); defaulting to ${fallback}.`);
    return fallback;
  }
}

function readNumber(key: string, fallback: number, options: NumberOptions = {}): number {
  const raw = process.env[key];
  if (raw === undefined) {
    warn(`${key} is not set; using fallback value ${fallback}.`);
    return fallback;
  }

  const value = Number(raw);
  if (!Number.isFinite(value)) {
    warn(`${key} must be numeric; received "${raw}". Falling back to ${fallback}.`);
    return fallback;
  }

  if (options.integer && !Number.isInteger(value)) {
    warn(`${key} must be an integer; received ${value}. Falling back to ${fallback}.`);
    return fallback;
  }

  if (options.min !== undefined && value < options.min) {
    warn(`${key} must be >= ${options.min}; received ${value}. Falling back to ${fallback}.`);
    return fallback;
  }

  if (options.max !== undefined && value > options.max) {
    warn(`${key} must be <= ${options.max}; received ${value}. Falling back to ${fallback}.`);
    return fallback;
  }

  return value;
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function readLogLevel(key: string, fallback: LogLevel): LogLevel {
  const raw = process.env[key];
  if (!raw) {
    warn(`${key} is not set; defaulting to ${fallback}.`);
    return fallback;
  }
  const normalised = raw.toLowerCase();
  if (!isLogLevel(normalised)) {
    warn(`${key} must be one of ${LOG_LEVELS.join(", ")}; received "${raw}". Falling back to ${fallback}.`);
    return fallback;
  }
  return normalised;
}

const engineId = (() => {
  const raw = process.env.ENGINE_ID;
  if (!raw) {
    const fallback = `engine-${randomUUID().slice(0, 8)}`;
    warn(`ENGINE_ID is not set; generated fallback ${fallback}.`);
    return fallback;
  }
  return raw;
})();

const openAiApiKey = readOptionalSecret("OPENAI_API_KEY");
if (!openAiApiKey) {
  warn("OPENAI_API_KEY is not set; sentiment scoring uses the local lexicon strategy only.");
}

export interface EngineConfig {
  readonly REDIS_URL: string;
  readonly ENGINE_ID: string;
  readonly CONCURRENCY_LIMIT: number;
  readonly CLASSIFY_CONCURRENCY: number;
  readonly HTTP_PORT: number;
  readonly PROMETHEUS_PORT: number;
  readonly MAX_RETRIES: number;
  readonly RETRY_BACKOFF_BASE: number;
  readonly LOG_LEVEL: LogLevel;
  readonly SCHEDULE_INTERVAL_MS: number;
  readonly BATCH_FETCH_TIMEOUT_SEC: number;
  readonly PRODUCT_LIST_KEY: string;
  readonly TTL_SNAPSHOT_SECONDS: number;
  readonly ANALYSIS_WINDOW_DAYS: number;
  readonly OPENAI_API_KEY: string | undefined;
  readonly LLM_MODEL: string;
  readonly LLM_TIMEOUT_MS: number;
  readonly NODE_ENV: string;
  readonly warnings: readonly string[];
}

export const config: EngineConfig = {
  REDIS_URL: readUrl("REDIS_URL", DEFAULTS.REDIS_URL),
  ENGINE_ID: engineId,
  CONCURRENCY_LIMIT: readNumber("CONCURRENCY_LIMIT", DEFAULTS.CONCURRENCY_LIMIT, { integer: true, min: 1 }),
  CLASSIFY_CONCURRENCY: readNumber("CLASSIFY_CONCURRENCY", DEFAULTS.CLASSIFY_CONCURRENCY, { integer: true, min: 1 }),
  HTTP_PORT: readNumber("HTTP_PORT", DEFAULTS.HTTP_PORT, { integer: true, min: 1 }),
  PROMETHEUS_PORT: readNumber("PROMETHEUS_PORT", DEFAULTS.PROMETHEUS_PORT, { integer: true, min: 1 }),
  MAX_RETRIES: readNumber("MAX_RETRIES", DEFAULTS.MAX_RETRIES, { integer: true, min: 1 }),
  RETRY_BACKOFF_BASE: readNumber("RETRY_BACKOFF_BASE", DEFAULTS.RETRY_BACKOFF_BASE, { min: 0.1 }),
  LOG_LEVEL: readLogLevel("LOG_LEVEL", DEFAULT_LOG_LEVEL),
  SCHEDULE_INTERVAL_MS: readNumber("SCHEDULE_INTERVAL_MS", DEFAULTS.SCHEDULE_INTERVAL_MS, { integer: true, min: 100 }),
  BATCH_FETCH_TIMEOUT_SEC: readNumber("BATCH_FETCH_TIMEOUT_SEC", DEFAULTS.BATCH_FETCH_TIMEOUT_SEC, {
    integer: true,
    min: 1,
  }),
  PRODUCT_LIST_KEY: readString("PRODUCT_LIST_KEY", DEFAULTS.PRODUCT_LIST_KEY),
  TTL_SNAPSHOT_SECONDS: readNumber("TTL_SNAPSHOT_SECONDS", DEFAULTS.TTL_SNAPSHOT_SECONDS, {
    integer: true,
    min: 60,
  }),
  ANALYSIS_WINDOW_DAYS: readNumber("ANALYSIS_WINDOW_DAYS", DEFAULTS.ANALYSIS_WINDOW_DAYS, { integer: true, min: 1 }),
  OPENAI_API_KEY: openAiApiKey,
  LLM_MODEL: readString("LLM_MODEL", DEFAULTS.LLM_MODEL),
  LLM_TIMEOUT_MS: readNumber("LLM_TIMEOUT_MS", DEFAULTS.LLM_TIMEOUT_MS, { integer: true, min: 100, max: 120_000 }),
  NODE_ENV: readString("NODE_ENV", DEFAULTS.NODE_ENV),
  warnings,
};
