import Fastify, { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import cors from "@fastify/cors";
import helmet from "@fastify/helmet";
import type { Redis } from "ioredis";
import pLimit from "p-limit";
import closeWithGrace from "close-with-grace";
import { performance } from "node:perf_hooks";

import { classifyBatch } from "./classifier.js";
import { config } from "./config.js";
import { logger } from "./logger.js";
import { getRedisClient, disconnectRedis } from "./redis_client.js";
import { fetchMentionBatch } from "./mention_collector.js";
import { hasSnapshot, loadMentionWindows, loadSerpResults, saveSnapshot, upsertMentions } from "./mention_store.js";
import { loadRegisteredProducts } from "./product_registry.js";
import { buildReputationReport } from "./report.js";
import { SentimentScorer } from "./sentiment.js";
import { createExternalStrategy } from "./llm_strategy.js";
import {
  classificationTimeSeconds,
  productsProcessedTotal,
  processingTimeSeconds,
  memoryUsageBytes,
  cpuUserTimeSeconds,
  cpuSystemTimeSeconds,
  registry,
} from "./metrics.js";
import { measureAsync, sleep } from "./utils.js";
import {
  buildHealthPayload,
  createHealthSnapshot,
  recordBatch,
  updateHealthOnStart,
  updateHealthOnFinish,
} from "./health.js";
import type { HealthPayload } from "./health.js";
import { logFatalError, logRecoverableError } from "./error_utils.js";
import { getLexicon } from "./lexicon.js";
import { getResponseTemplates } from "./responses.js";

export interface EngineDeps {
  redis?: Redis;
  scorer?: SentimentScorer;
  now?: () => Date;
}

export type ProductRunOutcome =
  | { status: "skipped"; reason: "no_new_mentions" }
  | {
      status: "completed";
      ingested: number;
      rejected: number;
      classified: number;
      skipped: number;
      failed: number;
      overallScore: number;
    };

export class EngineApp {
  private readonly redis: Redis;
  private readonly scorer: SentimentScorer;
  private readonly now: () => Date;
  private readonly limiter = pLimit(config.CONCURRENCY_LIMIT);
  private running = false;
  private loopPromise: Promise<void> | null = null;
  private httpServer: FastifyInstance | null = null;
  private metricsServer: FastifyInstance | null = null;
  private readonly health = createHealthSnapshot();

  constructor(deps: EngineDeps = {}) {
    this.redis = deps.redis ?? getRedisClient();
    this.scorer =
      deps.scorer ?? new SentimentScorer({ external: createExternalStrategy(), timeoutMs: config.LLM_TIMEOUT_MS, logger });
    this.now = deps.now ?? (() => new Date());
  }

  async start(): Promise<void> {
    if (this.running) {
      return;
    }
    this.running = true;

    if (config.warnings.length > 0) {
      config.warnings.forEach((warning) => {
        logger.warn({ warning }, "Configuration warning");
      });
    }

    try {
      getLexicon();
      getResponseTemplates();
    } catch (error) {
      this.running = false;
      logFatalError(logger, error, { location: "start" }, "Unable to load lexicon tables");
    }

    await Promise.all([this.startHttpServer(), this.startMetricsServer()]);
    this.loopPromise = this.runLoop().catch((error) => {
      logRecoverableError(logger, error, { location: "runLoop" }, "Engine loop crashed");
      process.exitCode = 1;
    });

    closeWithGrace({ delay: 500 }, async ({ signal, err }: { signal?: string | number; err?: unknown; manual?: boolean }) => {
      if (err) {
        logger.error({ err, signal }, "Graceful shutdown due to error");
      } else {
        logger.info({ signal }, "Graceful shutdown initiated");
      }
      await this.stop();
    });
  }

  async stop(): Promise<void> {
    if (!this.running) {
      return;
    }
    this.running = false;

    if (this.loopPromise) {
      await this.loopPromise;
      this.loopPromise = null;
    }

    await Promise.all([this.stopHttpServer(), this.stopMetricsServer()]);
    await disconnectRedis();
    logger.info("Engine stopped");
  }

  private async startHttpServer(): Promise<void> {
    if (this.httpServer) return;

    const server = Fastify({ logger: false });
    await server.register(cors, { origin: true, credentials: true });
    await server.register(helmet, { global: true });

    server.get("/health", async () => this.getHealth());

    await server.listen({ port: config.HTTP_PORT, host: "0.0.0.0" });
    logger.info({ port: config.HTTP_PORT }, "HTTP health server listening");
    this.httpServer = server;
  }

  private async stopHttpServer(): Promise<void> {
    if (!this.httpServer) return;
    await this.httpServer.close();
    this.httpServer = null;
  }

  private async startMetricsServer(): Promise<void> {
    if (this.metricsServer) return;

    const server = Fastify({ logger: false });

    server.get("/metrics", async (_request: FastifyRequest, reply: FastifyReply) => {
      const body = await registry.metrics();
      reply.header("Content-Type", registry.contentType);
      return reply.send(body);
    });

    await server.listen({ port: config.PROMETHEUS_PORT, host: "0.0.0.0" });
    logger.info({ port: config.PROMETHEUS_PORT }, "Metrics server listening");
    this.metricsServer = server;
  }

  private async stopMetricsServer(): Promise<void> {
    if (!this.metricsServer) return;
    await this.metricsServer.close();
    this.metricsServer = null;
  }

  private async runLoop(): Promise<void> {
    while (this.running) {
      try {
        const products = await loadRegisteredProducts(this.redis);
        if (products.length === 0) {
          logger.debug("No products registered; sleeping");
          await sleep(config.SCHEDULE_INTERVAL_MS / 1000);
          continue;
        }

        await Promise.all(
          products.map((product) =>
            this.limiter(() =>
              this.processProduct(product).catch((error) => {
                updateHealthOnFinish(this.health, product, false);
                logRecoverableError(logger, error, { location: "processProduct", product }, "Failed to process product");
              })
            )
          )
        );
      } catch (error) {
        logRecoverableError(logger, error, { location: "runLoop" }, "Error in engine loop; backing off");
        await sleep(config.RETRY_BACKOFF_BASE);
      }

      await sleep(config.SCHEDULE_INTERVAL_MS / 1000);
    }
  }

  /**
   * One analysis run for a product: drain and classify new mentions, persist them, then rebuild
   * the reputation snapshot over the current and previous windows. A run with nothing new only
   * rebuilds when the stored snapshot has expired.
   */
  async processProduct(product: string): Promise<ProductRunOutcome> {
    updateHealthOnStart(this.health, product);
    const totalStart = performance.now();
    const now = this.now();

    const batch = await fetchMentionBatch(this.redis, product, { now });

    if (batch.mentions.length === 0 && (await hasSnapshot(this.redis, product))) {
      logger.debug({ product, rejected: batch.rejected }, "No new mentions; snapshot still fresh");
      updateHealthOnFinish(this.health, product, true);
      return { status: "skipped", reason: "no_new_mentions" };
    }

    const { result: outcome, durationMs: classifyMs } = await measureAsync(() =>
      classifyBatch(batch.mentions, { scorer: this.scorer, logger }, { concurrency: config.CLASSIFY_CONCURRENCY, product })
    );
    classificationTimeSeconds.observe(classifyMs / 1000);
    recordBatch(this.health, {
      product,
      classified: outcome.classified.length,
      skipped: outcome.skipped,
      failed: outcome.failed,
    });

    await upsertMentions(this.redis, product, outcome.classified);

    const [windows, serpResults] = await Promise.all([
      loadMentionWindows(this.redis, product, config.ANALYSIS_WINDOW_DAYS, now),
      loadSerpResults(this.redis, product),
    ]);

    const report = buildReputationReport({
      product,
      current: windows.current,
      previous: windows.previous,
      serpResults,
      now,
      polarityOf: (text) => this.scorer.scoreLocal(text).polarity,
    });

    const writeDurationMs = await saveSnapshot(this.redis, product, report, config.TTL_SNAPSHOT_SECONDS);

    productsProcessedTotal.inc();
    const totalDurationMs = performance.now() - totalStart;
    processingTimeSeconds.observe(totalDurationMs / 1000);

    const memory = process.memoryUsage();
    memoryUsageBytes.set(memory.rss);
    const usage = process.resourceUsage();
    const userCpuSeconds = usage.userCPUTime / 1_000_000;
    const systemCpuSeconds = usage.systemCPUTime / 1_000_000;
    cpuUserTimeSeconds.set(userCpuSeconds);
    cpuSystemTimeSeconds.set(systemCpuSeconds);

    logger.info(
      {
        product,
        ingested: batch.mentions.length,
        rejected: batch.rejected,
        classified: outcome.classified.length,
        skipped: outcome.skipped,
        failed: outcome.failed,
        currentWindow: windows.current.length,
        previousWindow: windows.previous.length,
        serpResults: serpResults.length,
        overallScore: report.snapshot.overallScore,
        crisisLevel: report.snapshot.crisisAnalysis.crisisLevel,
        ioMs: Number(batch.ioMs.toFixed(2)),
        classifyMs: Number(classifyMs.toFixed(2)),
        processedMs: Number(totalDurationMs.toFixed(2)),
        redisWriteMs: Number(writeDurationMs.toFixed(2)),
        memoryRssBytes: memory.rss,
        cpuUserSeconds: Number(userCpuSeconds.toFixed(3)),
        cpuSystemSeconds: Number(systemCpuSeconds.toFixed(3)),
      },
      "Reputation snapshot generated"
    );

    updateHealthOnFinish(this.health, product, true);

    return {
      status: "completed",
      ingested: batch.mentions.length,
      rejected: batch.rejected,
      classified: outcome.classified.length,
      skipped: outcome.skipped,
      failed: outcome.failed,
      overallScore: report.snapshot.overallScore,
    };
  }

  getHealth(): HealthPayload {
    return buildHealthPayload(this.health, config.ENGINE_ID);
  }
}
