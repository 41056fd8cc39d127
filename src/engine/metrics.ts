import { Counter, Gauge, Histogram, Registry } from "prom-client";

export const registry = new Registry();
registry.setDefaultLabels({ service: "reputation-engine" });

export const productsProcessedTotal = new Counter({
  name: "engine_products_processed_total",
  help: "Total number of product analysis runs completed",
  registers: [registry],
});

export const mentionsClassifiedTotal = new Counter({
  name: "engine_mentions_classified_total",
  help: "Mentions classified, by sentiment method",
  labelNames: ["method"] as const,
  registers: [registry],
});

export const mentionsSkippedTotal = new Counter({
  name: "engine_mentions_skipped_total",
  help: "Mentions skipped because they carried no text",
  registers: [registry],
});

export const mentionsFailedTotal = new Counter({
  name: "engine_mentions_failed_total",
  help: "Mentions whose classification raised an error",
  registers: [registry],
});

export const sentimentFallbackTotal = new Counter({
  name: "engine_sentiment_fallback_total",
  help: "External sentiment calls that fell back to the local lexicon scorer",
  labelNames: ["strategy"] as const,
  registers: [registry],
});

export const processingTimeSeconds = new Histogram({
  name: "engine_processing_time_seconds",
  help: "Total processing time per product",
  buckets: [0.5, 1, 2, 5, 10, 30, 60, 120, 300],
  registers: [registry],
});

export const classificationTimeSeconds = new Histogram({
  name: "engine_classification_time_seconds",
  help: "Time spent classifying one ingested batch",
  buckets: [0.01, 0.05, 0.1, 0.5, 1, 2, 5, 10, 30],
  registers: [registry],
});

export const redisReadLatencySeconds = new Histogram({
  name: "engine_redis_read_latency_seconds",
  help: "Latency of Redis read operations",
  buckets: [0.01, 0.05, 0.1, 0.2, 0.5, 1, 2, 5],
  registers: [registry],
});

export const redisWriteLatencySeconds = new Histogram({
  name: "engine_redis_write_latency_seconds",
  help: "Latency of Redis write operations",
  buckets: [0.005, 0.01, 0.05, 0.1, 0.2, 0.5, 1, 2],
  registers: [registry],
});

export const memoryUsageBytes = new Gauge({
  name: "engine_memory_usage_bytes",
  help: "Resident set size (RSS) memory usage of the engine",
  registers: [registry],
});

export const cpuUserTimeSeconds = new Gauge({
  name: "engine_cpu_user_time_seconds",
  help: "Total user CPU time consumed by the engine process",
  registers: [registry],
});

export const cpuSystemTimeSeconds = new Gauge({
  name: "engine_cpu_system_time_seconds",
  help: "Total system CPU time consumed by the engine process",
  registers: [registry],
});
