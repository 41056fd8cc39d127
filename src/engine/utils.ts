import { performance } from "node:perf_hooks";
import { config } from "./config.js";

export function safeJsonParse(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return null;
  }
}

export function buildProductListKey(): string {
  return config.PRODUCT_LIST_KEY;
}

export function buildIngestKey(product: string): string {
  return `ingest:product:${product}:mentions`;
}

export function buildFailedKey(product: string): string {
  return `failed:product:${product}`;
}

export function buildMentionStoreKey(product: string): string {
  return `mentions:product:${product}`;
}

export function buildSerpKey(product: string): string {
  return `serp:product:${product}`;
}

export function buildSnapshotKey(product: string): string {
  return `snapshot:product:${product}`;
}

export function clamp(value: number, min: number, max: number): number {
  if (Number.isNaN(value)) {
    return min;
  }
  return Math.min(max, Math.max(min, value));
}

export function round1(value: number): number {
  return Math.round(value * 10) / 10;
}

export function truncate(text: string, maxLength: number, ellipsis = "..."): string {
  if (text.length <= maxLength) {
    return text;
  }
  return `${text.slice(0, Math.max(0, maxLength - ellipsis.length))}${ellipsis}`;
}

export function containsAny(haystack: string, needles: readonly string[]): boolean {
  return needles.some((needle) => haystack.includes(needle));
}

export interface TimedResult<T> {
  result: T;
  durationMs: number;
}

export async function measureAsync<T>(fn: () => Promise<T>): Promise<TimedResult<T>> {
  const start = performance.now();
  const result = await fn();
  const durationMs = performance.now() - start;
  return { result, durationMs };
}

export class TimeoutError extends Error {
  constructor(readonly timeoutMs: number) {
    super(`Operation timed out after ${timeoutMs}ms`);
    this.name = "TimeoutError";
  }
}

/**
 * Runs `operation` with an abort signal that fires after `timeoutMs`. The returned promise
 * settles no later than the deadline even if the operation ignores the signal.
 */
export async function withTimeout<T>(operation: (signal: AbortSignal) => Promise<T>, timeoutMs: number): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const deadline = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new TimeoutError(timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([operation(controller.signal), deadline]);
  } finally {
    clearTimeout(timer);
  }
}

export async function sleep(seconds: number): Promise<void> {
  await new Promise((resolve) => setTimeout(resolve, seconds * 1000));
}

export async function exponentialBackoff<T>(
  operation: () => Promise<T>,
  options: { retries?: number; baseDelaySeconds?: number } = {}
): Promise<T> {
  const { retries = config.MAX_RETRIES, baseDelaySeconds = config.RETRY_BACKOFF_BASE } = options;
  let attempt = 0;
  // eslint-disable-next-line no-constant-condition
  while (true) {
    try {
      return await operation();
    } catch (error) {
      attempt += 1;
      if (attempt > retries) {
        throw error;
      }
      const delay = baseDelaySeconds * 2 ** (attempt - 1);
      await sleep(delay);
    }
  }
}
