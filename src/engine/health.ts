export interface HealthSnapshot {
  processedProductsTotal: number;
  lastProcessedAt: Map<string, number>;
  activeProducts: Set<string>;
  startTime: number;
  successfulProducts: Set<string>;
  failedProducts: Set<string>;
  lastBatch: BatchCounters | null;
}

export interface BatchCounters {
  product: string;
  classified: number;
  skipped: number;
  failed: number;
}

export function createHealthSnapshot(): HealthSnapshot {
  return {
    processedProductsTotal: 0,
    lastProcessedAt: new Map(),
    activeProducts: new Set(),
    startTime: Date.now(),
    successfulProducts: new Set(),
    failedProducts: new Set(),
    lastBatch: null,
  };
}

export function updateHealthOnStart(snapshot: HealthSnapshot, product: string): void {
  snapshot.activeProducts.add(product);
}

export function updateHealthOnFinish(snapshot: HealthSnapshot, product: string, success: boolean): void {
  snapshot.activeProducts.delete(product);
  snapshot.lastProcessedAt.set(product, Date.now());
  snapshot.processedProductsTotal += 1;
  if (success) {
    snapshot.successfulProducts.add(product);
    snapshot.failedProducts.delete(product);
  } else {
    snapshot.failedProducts.add(product);
  }
}

export function recordBatch(snapshot: HealthSnapshot, counters: BatchCounters): void {
  snapshot.lastBatch = { ...counters };
}

export interface HealthPayload {
  status: "ok";
  engineId: string;
  uptimeSeconds: number;
  processedProducts: number;
  activeProducts: string[];
  lastProcessedAt: string | null;
  successfulProducts: string[];
  failedProducts: string[];
  lastBatch: BatchCounters | null;
}

export function buildHealthPayload(snapshot: HealthSnapshot, engineId: string): HealthPayload {
  const uptimeSeconds = Math.round((Date.now() - snapshot.startTime) / 1000);
  const lastProcessedAt = Array.from(snapshot.lastProcessedAt.values());
  const latestProcessed = lastProcessedAt.length > 0 ? new Date(Math.max(...lastProcessedAt)).toISOString() : null;

  return {
    status: "ok",
    engineId,
    uptimeSeconds,
    processedProducts: snapshot.processedProductsTotal,
    activeProducts: Array.from(snapshot.activeProducts),
    lastProcessedAt: latestProcessed,
    successfulProducts: Array.from(snapshot.successfulProducts),
    failedProducts: Array.from(snapshot.failedProducts),
    lastBatch: snapshot.lastBatch,
  };
}
