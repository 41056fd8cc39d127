import type { Redis } from "ioredis";
import { describe, expect, it, vi } from "vitest";

import { EngineApp } from "../src/engine/app.js";
import { config } from "../src/engine/config.js";
import { SentimentScorer } from "../src/engine/sentiment.js";
import { flatEstimator } from "./helpers.js";

const now = new Date("2024-06-30T12:00:00.000Z");

function createRedisMock() {
  const hash = new Map<string, string>();
  return {
    blpop: vi.fn<[string, number?], Promise<[string, string] | null>>(),
    lpop: vi.fn<[string], Promise<string | null>>().mockResolvedValue(null),
    rpush: vi.fn<[string, ...string[]], Promise<number>>(),
    hmget: vi.fn(async (_key: string, ...fields: string[]) => fields.map((field) => hash.get(field) ?? null)),
    hset: vi.fn(async (_key: string, record: Record<string, string>) => {
      for (const [field, value] of Object.entries(record)) {
        hash.set(field, value);
      }
      return Object.keys(record).length;
    }),
    hvals: vi.fn(async (_key: string) => Array.from(hash.values())),
    lrange: vi.fn<[string, number, number], Promise<string[]>>().mockResolvedValue([]),
    set: vi.fn<[string, string, "EX", number], Promise<"OK">>().mockResolvedValue("OK"),
    exists: vi.fn<[string], Promise<number>>(),
  };
}

function createEngine(redis: ReturnType<typeof createRedisMock>): EngineApp {
  return new EngineApp({
    redis: redis as unknown as Redis,
    scorer: new SentimentScorer({ estimator: flatEstimator }),
    now: () => now,
  });
}

describe("EngineApp.processProduct", () => {
  it("classifies new mentions, stores them and writes a snapshot", async () => {
    const redis = createRedisMock();
    redis.blpop.mockResolvedValueOnce([
      "ingest:product:acme:mentions",
      JSON.stringify({ platform: "trustpilot", content: "App crashed and charged me twice, terrible, want refund now", id: "t1" }),
    ]);
    const engine = createEngine(redis);

    const outcome = await engine.processProduct("acme");

    expect(outcome).toEqual({
      status: "completed",
      ingested: 1,
      rejected: 0,
      classified: 1,
      skipped: 0,
      failed: 0,
      overallScore: 20,
    });
    expect(redis.exists).not.toHaveBeenCalled();
    expect(redis.hset).toHaveBeenCalledTimes(1);

    const [key, body, mode, ttl] = redis.set.mock.calls[0] ?? [];
    expect([key, mode, ttl]).toEqual(["snapshot:product:acme", "EX", config.TTL_SNAPSHOT_SECONDS]);
    const written = JSON.parse(body ?? "{}");
    expect(written.snapshot.crisisAnalysis.categoryBreakdown).toEqual({ technical: 1, payment: 1 });
    expect(written.snapshot.intentBreakdown).toEqual({ complaint: 1 });

    const health = engine.getHealth();
    expect(health.engineId).toBe("engine-test");
    expect(health.processedProducts).toBe(1);
    expect(health.successfulProducts).toEqual(["acme"]);
    expect(health.activeProducts).toEqual([]);
    expect(health.lastBatch).toEqual({ product: "acme", classified: 1, skipped: 0, failed: 0 });
  });

  it("leaves a fresh snapshot alone when nothing new arrived", async () => {
    const redis = createRedisMock();
    redis.blpop.mockResolvedValueOnce(null);
    redis.exists.mockResolvedValueOnce(1);
    const engine = createEngine(redis);

    await expect(engine.processProduct("acme")).resolves.toEqual({ status: "skipped", reason: "no_new_mentions" });
    expect(redis.hset).not.toHaveBeenCalled();
    expect(redis.set).not.toHaveBeenCalled();
  });

  it("rebuilds an expired snapshot from stored mentions", async () => {
    const redis = createRedisMock();
    redis.blpop.mockResolvedValueOnce(null);
    redis.exists.mockResolvedValueOnce(0);
    const engine = createEngine(redis);

    const outcome = await engine.processProduct("acme");

    expect(outcome).toMatchObject({ status: "completed", ingested: 0, classified: 0, overallScore: 50 });
    expect(redis.hmget).not.toHaveBeenCalled();
    expect(redis.set).toHaveBeenCalledTimes(1);
  });
});
