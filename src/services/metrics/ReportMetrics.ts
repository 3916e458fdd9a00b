// src/services/metrics/ReportMetrics.ts

/**
 * Metrics sink for the report pipeline. Implementations must tolerate
 * interleaved calls from concurrent report generations.
 */
export interface ReportMetrics {
  recordInference(task: string, latencyMs: number, success: boolean): void;
  recordCacheHit(cache: string): void;
  recordCacheMiss(cache: string): void;
  recordRetrieval(latencyMs: number, chunkCount: number, rerankerApplied: boolean): void;
  recordRerank(latencyMs: number, success: boolean): void;
  recordIndex(documentId: string, chunkCount: number, latencyMs: number, success: boolean): void;
  recordReportQuality(task: string, score: number): void;
}

export class NoopReportMetrics implements ReportMetrics {
  recordInference(): void {}
  recordCacheHit(): void {}
  recordCacheMiss(): void {}
  recordRetrieval(): void {}
  recordRerank(): void {}
  recordIndex(): void {}
  recordReportQuality(): void {}
}

export interface InferenceStats {
  count: number;
  failures: number;
  totalLatencyMs: number;
}

export interface MetricsSnapshot {
  inference: Record<string, InferenceStats>;
  cacheHits: Record<string, number>;
  cacheMisses: Record<string, number>;
  retrievals: number;
  retrievedChunks: number;
  rerankerApplied: number;
  rerankCalls: number;
  rerankFailures: number;
  documentsIndexed: number;
  indexFailures: number;
  chunksIndexed: number;
  qualityScores: Record<string, number[]>;
}

/**
 * Counters kept in process memory. Every update is synchronous so
 * concurrent async callers never observe a torn counter.
 */
export class InMemoryReportMetrics implements ReportMetrics {
  private inference = new Map<string, InferenceStats>();
  private cacheHits = new Map<string, number>();
  private cacheMisses = new Map<string, number>();
  private qualityScores = new Map<string, number[]>();
  private retrievals = 0;
  private retrievedChunks = 0;
  private rerankerApplied = 0;
  private rerankCalls = 0;
  private rerankFailures = 0;
  private documentsIndexed = 0;
  private indexFailures = 0;
  private chunksIndexed = 0;

  recordInference(task: string, latencyMs: number, success: boolean): void {
    const stats = this.inference.get(task) ?? { count: 0, failures: 0, totalLatencyMs: 0 };
    stats.count++;
    stats.totalLatencyMs += latencyMs;
    if (!success) {
      stats.failures++;
    }
    this.inference.set(task, stats);
  }

  recordCacheHit(cache: string): void {
    this.cacheHits.set(cache, (this.cacheHits.get(cache) ?? 0) + 1);
  }

  recordCacheMiss(cache: string): void {
    this.cacheMisses.set(cache, (this.cacheMisses.get(cache) ?? 0) + 1);
  }

  recordRetrieval(_latencyMs: number, chunkCount: number, rerankerApplied: boolean): void {
    this.retrievals++;
    this.retrievedChunks += chunkCount;
    if (rerankerApplied) {
      this.rerankerApplied++;
    }
  }

  recordRerank(_latencyMs: number, success: boolean): void {
    this.rerankCalls++;
    if (!success) {
      this.rerankFailures++;
    }
  }

  recordIndex(_documentId: string, chunkCount: number, _latencyMs: number, success: boolean): void {
    if (success) {
      this.documentsIndexed++;
      this.chunksIndexed += chunkCount;
    } else {
      this.indexFailures++;
    }
  }

  recordReportQuality(task: string, score: number): void {
    const scores = this.qualityScores.get(task) ?? [];
    scores.push(score);
    this.qualityScores.set(task, scores);
  }

  snapshot(): MetricsSnapshot {
    const inference: Record<string, InferenceStats> = {};
    for (const [task, stats] of this.inference) {
      inference[task] = { ...stats };
    }
    const qualityScores: Record<string, number[]> = {};
    for (const [task, scores] of this.qualityScores) {
      qualityScores[task] = [...scores];
    }

    return {
      inference,
      cacheHits: Object.fromEntries(this.cacheHits),
      cacheMisses: Object.fromEntries(this.cacheMisses),
      retrievals: this.retrievals,
      retrievedChunks: this.retrievedChunks,
      rerankerApplied: this.rerankerApplied,
      rerankCalls: this.rerankCalls,
      rerankFailures: this.rerankFailures,
      documentsIndexed: this.documentsIndexed,
      indexFailures: this.indexFailures,
      chunksIndexed: this.chunksIndexed,
      qualityScores
    };
  }

  reset(): void {
    this.inference.clear();
    this.cacheHits.clear();
    this.cacheMisses.clear();
    this.qualityScores.clear();
    this.retrievals = 0;
    this.retrievedChunks = 0;
    this.rerankerApplied = 0;
    this.rerankCalls = 0;
    this.rerankFailures = 0;
    this.documentsIndexed = 0;
    this.indexFailures = 0;
    this.chunksIndexed = 0;
  }
}
