import type { Redis } from "ioredis";
import { z } from "zod";

import { suggestResponse } from "./classifier.js";
import { componentLogger } from "./logger.js";
import { redisReadLatencySeconds, redisWriteLatencySeconds } from "./metrics.js";
import type { ReputationReport } from "./report.js";
import { INTENTS, MENTION_PLATFORMS, PRIORITIES, RESPONSE_TYPES, SENTIMENT_LABELS, TOPICS } from "./types.js";
import type { ClassifiedMention, SerpResult } from "./types.js";
import {
  buildMentionStoreKey,
  buildSerpKey,
  buildSnapshotKey,
  exponentialBackoff,
  measureAsync,
  safeJsonParse,
} from "./utils.js";

const logger = componentLogger("store");

const responseSuggestionSchema = z.object({
  shouldRespond: z.boolean(),
  urgency: z.enum(PRIORITIES),
  recommendedStyle: z.enum(["official", "friendly"]),
  responseType: z.enum(RESPONSE_TYPES),
  keyPoints: z.array(z.string()),
});

// Records written before suggestions were stored get one derived on read.
const classificationSchema = z
  .object({
    sentimentLabel: z.enum(SENTIMENT_LABELS),
    sentimentPolarity: z.number().min(-1).max(1),
    intent: z.enum(INTENTS),
    priority: z.enum(PRIORITIES),
    confidenceScore: z.number().min(0).max(1),
    keywordsMatched: z.array(z.string()),
    topics: z.array(z.enum(TOPICS)),
    method: z.string(),
    responseSuggested: responseSuggestionSchema.optional(),
  })
  .transform(({ responseSuggested, ...classification }) => ({
    ...classification,
    responseSuggested: responseSuggested ?? suggestResponse(classification),
  }));

const storedMentionSchema = z.object({
  externalId: z.string().min(1),
  platform: z.enum(MENTION_PLATFORMS),
  text: z.string(),
  title: z.string().optional(),
  rating: z.number().optional(),
  authorName: z.string(),
  sourceUrl: z.string().optional(),
  originalDate: z.coerce.date(),
  isMarked: z.boolean(),
  classification: classificationSchema,
});

const serpResultSchema = z.object({
  query: z.string(),
  title: z.string(),
  snippet: z.string().default(""),
  source: z.string().default(""),
  link: z.string().default(""),
  position: z.number().int().nonnegative().default(0),
});

export function mentionField(mention: Pick<ClassifiedMention, "platform" | "externalId">): string {
  return `${mention.platform}:${mention.externalId}`;
}

export function parseStoredMention(raw: string): ClassifiedMention | null {
  const parsed = storedMentionSchema.safeParse(safeJsonParse(raw));
  return parsed.success ? parsed.data : null;
}

/**
 * Writes classified mentions into the product hash keyed by `platform:externalId`, so a mention
 * seen twice overwrites its earlier record. A reviewer's `isMarked` flag survives the overwrite.
 */
export async function upsertMentions(
  redis: Redis,
  product: string,
  mentions: readonly ClassifiedMention[]
): Promise<number> {
  if (mentions.length === 0) {
    return 0;
  }

  const key = buildMentionStoreKey(product);
  const fields = mentions.map(mentionField);
  const existing = await redis.hmget(key, ...fields);

  const record: Record<string, string> = {};
  mentions.forEach((mention, index) => {
    const previous = existing[index];
    const wasMarked = previous ? parseStoredMention(previous)?.isMarked === true : false;
    record[fields[index] ?? mentionField(mention)] = JSON.stringify({ ...mention, isMarked: mention.isMarked || wasMarked });
  });

  const { durationMs } = await measureAsync(() => exponentialBackoff(() => redis.hset(key, record)));
  redisWriteLatencySeconds.observe(durationMs / 1000);

  return Object.keys(record).length;
}

export interface MentionWindows {
  current: ClassifiedMention[];
  previous: ClassifiedMention[];
  discarded: number;
}

/**
 * Loads the stored mentions of a product and splits them into the current window
 * `[now - windowDays, now]` and the one before it. Older mentions are ignored.
 */
export async function loadMentionWindows(
  redis: Redis,
  product: string,
  windowDays: number,
  now: Date = new Date()
): Promise<MentionWindows> {
  const { result: values, durationMs } = await measureAsync(() => redis.hvals(buildMentionStoreKey(product)));
  redisReadLatencySeconds.observe(durationMs / 1000);

  const windowMs = windowDays * 24 * 60 * 60 * 1000;
  const currentStart = now.getTime() - windowMs;
  const previousStart = currentStart - windowMs;

  const windows: MentionWindows = { current: [], previous: [], discarded: 0 };

  for (const value of values) {
    const mention = parseStoredMention(value);
    if (!mention) {
      windows.discarded += 1;
      continue;
    }
    const timestamp = mention.originalDate.getTime();
    if (timestamp >= currentStart && timestamp <= now.getTime()) {
      windows.current.push(mention);
    } else if (timestamp >= previousStart && timestamp < currentStart) {
      windows.previous.push(mention);
    }
  }

  if (windows.discarded > 0) {
    logger.warn({ product, discarded: windows.discarded }, "Skipped unreadable stored mentions");
  }

  return windows;
}

/** Search results for a product, stored by the ingestion side as a list of JSON entries. */
export async function loadSerpResults(redis: Redis, product: string): Promise<SerpResult[]> {
  const { result: entries, durationMs } = await measureAsync(() => redis.lrange(buildSerpKey(product), 0, -1));
  redisReadLatencySeconds.observe(durationMs / 1000);

  const results: SerpResult[] = [];
  for (const entry of entries) {
    const parsed = serpResultSchema.safeParse(safeJsonParse(entry));
    if (parsed.success) {
      results.push(parsed.data);
    } else {
      logger.warn({ product, error: parsed.error.message }, "Skipped malformed search result");
    }
  }
  return results;
}

export async function hasSnapshot(redis: Redis, product: string): Promise<boolean> {
  return (await redis.exists(buildSnapshotKey(product))) > 0;
}

export async function saveSnapshot(
  redis: Redis,
  product: string,
  report: ReputationReport,
  ttlSeconds: number
): Promise<number> {
  const { durationMs } = await measureAsync(() =>
    exponentialBackoff(() => redis.set(buildSnapshotKey(product), JSON.stringify(report), "EX", ttlSeconds))
  );
  redisWriteLatencySeconds.observe(durationMs / 1000);
  return durationMs;
}
