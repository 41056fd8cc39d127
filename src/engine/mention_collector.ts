import type { Redis } from "ioredis";
import { performance } from "node:perf_hooks";

import { config } from "./config.js";
import { componentLogger } from "./logger.js";
import { redisReadLatencySeconds } from "./metrics.js";
import { normalizeRawMention } from "./normalizer.js";
import type { Mention } from "./types.js";
import { buildFailedKey, buildIngestKey, safeJsonParse } from "./utils.js";

const logger = componentLogger("collector");

export interface MentionBatch {
  mentions: Mention[];
  rejected: number;
  ioMs: number;
}

export interface CollectOptions {
  timeoutSec?: number;
  now?: Date;
}

/**
 * Drains the product's ingest queue: blocks for the first payload, then pops whatever else is
 * already queued. Payloads that fail validation are parked on the product's failed list.
 */
export async function fetchMentionBatch(redis: Redis, product: string, options: CollectOptions = {}): Promise<MentionBatch> {
  const queueKey = buildIngestKey(product);
  const failedKey = buildFailedKey(product);
  const now = options.now ?? new Date();
  const mentions: Mention[] = [];
  let rejected = 0;
  let ioMs = 0;

  const waitStart = performance.now();
  const popped = await redis.blpop(queueKey, options.timeoutSec ?? config.BATCH_FETCH_TIMEOUT_SEC);
  const firstLatencyMs = performance.now() - waitStart;
  ioMs += firstLatencyMs;
  redisReadLatencySeconds.observe(firstLatencyMs / 1000);

  if (!popped) {
    return { mentions, rejected, ioMs };
  }

  const payloads: string[] = [popped[1]];

  while (true) {
    const start = performance.now();
    const next = await redis.lpop(queueKey);
    const latencyMs = performance.now() - start;
    ioMs += latencyMs;
    if (next === null) {
      break;
    }
    redisReadLatencySeconds.observe(latencyMs / 1000);
    payloads.push(next);
  }

  for (const payload of payloads) {
    const parsed = safeJsonParse(payload);
    const outcome = parsed === null ? { ok: false as const, reason: "payload is not valid JSON" } : normalizeRawMention(parsed, now);
    if (!outcome.ok) {
      rejected += 1;
      await redis.rpush(
        failedKey,
        JSON.stringify({
          product,
          receivedAt: now.toISOString(),
          error: "invalid_mention_payload",
          reason: outcome.reason,
          payload,
        })
      );
      logger.warn({ product, reason: outcome.reason }, "Discarded invalid mention payload");
      continue;
    }

    mentions.push(outcome.mention);
  }

  return { mentions, rejected, ioMs };
}
