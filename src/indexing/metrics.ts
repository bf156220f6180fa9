/**
 * Observability metrics for sync, indexing and retrieval.
 * In-memory counters and last latencies; no persistence.
 */

export interface IndexingMetrics {
  lastSyncStartTime: number | null;
  lastSyncEndTime: number | null;
  lastEmbedLatencyMs: number | null;
  indexSuccessTotal: number;
  indexFailureTotal: number;
  lastQueryLatencyMs: number | null;
  queryCount: number;
  citationsDropped: number;
}

function emptyMetrics(): IndexingMetrics {
  return {
    lastSyncStartTime: null,
    lastSyncEndTime: null,
    lastEmbedLatencyMs: null,
    indexSuccessTotal: 0,
    indexFailureTotal: 0,
    lastQueryLatencyMs: null,
    queryCount: 0,
    citationsDropped: 0,
  };
}

const metrics: IndexingMetrics = emptyMetrics();

export function getMetrics(): IndexingMetrics {
  return { ...metrics };
}

export function resetMetrics(): void {
  Object.assign(metrics, emptyMetrics());
}

export function recordSyncStart(): void {
  metrics.lastSyncStartTime = Date.now();
}

export function recordSyncEnd(): void {
  metrics.lastSyncEndTime = Date.now();
}

export function recordEmbedLatencyMs(ms: number): void {
  metrics.lastEmbedLatencyMs = ms;
}

export function recordIndexSuccess(count: number): void {
  metrics.indexSuccessTotal += count;
}

export function recordIndexFailure(count: number): void {
  metrics.indexFailureTotal += count;
}

export function recordQueryLatencyMs(ms: number): void {
  metrics.queryCount++;
  metrics.lastQueryLatencyMs = ms;
}

/** Model cited an id outside the retrieved candidate set. */
export function recordCitationsDropped(count: number): void {
  metrics.citationsDropped += count;
}
