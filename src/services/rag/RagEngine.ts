// src/services/rag/RagEngine.ts
import { ReportConfig, ReportConfigOverrides, resolveReportConfig } from '../../config/reportConfig';
import {
  Document,
  DocumentChunkerLike,
  RAGChunk,
  RAGQuery,
  RAGResult,
  Reranker,
  RerankResult,
  TextEmbedder,
  VectorFilters,
  VectorInsertItem,
  VectorSearchHit,
  VectorStore
} from '../../types/rag.types';
import { BatchFailure, BatchIndexError, InvalidInputError, toError } from '../../utils/errors';
import { Logger, describeError } from '../../utils/logger';
import { Semaphore } from '../../utils/channel';
import { estimateTokens } from '../../utils/tokenEstimator';
import { NoopReportMetrics, ReportMetrics } from '../metrics/ReportMetrics';
import { buildContext } from './ContextBuilder';
import { DocumentChunker } from './DocumentChunker';

export interface RagEngineOptions {
  vectorStore: VectorStore;
  embedder: TextEmbedder;
  /** Defaults to a DocumentChunker sized from `chunkSize` and `chunkOverlap`. */
  chunker?: DocumentChunkerLike;
  reranker?: Reranker;
  metrics?: ReportMetrics;
  logger?: Logger;
  config?: ReportConfigOverrides;
  /** Query embeddings kept for reuse; 0 disables the cache. */
  queryCacheSize?: number;
}

const DEFAULT_RERANKER_MULTIPLIER = 3;
const DEFAULT_QUERY_CACHE_SIZE = 128;
export const QUERY_EMBEDDING_CACHE = 'query_embedding';

function emptyResult(): RAGResult {
  return { chunks: [], totalFound: 0, searchLatencyMs: 0, rerankerApplied: false };
}

function wrap(message: string, error: unknown): Error {
  return new Error(`${message}: ${describeError(error)}`, { cause: error });
}

/**
 * Retrieval engine over a vector store: query embedding, filtered search,
 * optional cross-encoder reranking, context packing and document indexing.
 */
export class RagEngine {
  private vectorStore: VectorStore;
  private embedder: TextEmbedder;
  private chunker: DocumentChunkerLike;
  private reranker?: Reranker;
  private metrics: ReportMetrics;
  private logger: Logger;
  private config: ReportConfig;
  private queryCache = new Map<string, number[]>();
  private queryCacheSize: number;

  constructor(options: RagEngineOptions) {
    if (!options.vectorStore) {
      throw new InvalidInputError('vectorStore is required');
    }
    if (!options.embedder) {
      throw new InvalidInputError('embedder is required');
    }
    this.vectorStore = options.vectorStore;
    this.embedder = options.embedder;
    this.reranker = options.reranker;
    this.metrics = options.metrics ?? new NoopReportMetrics();
    this.logger = options.logger ?? new Logger('RagEngine');
    this.config = resolveReportConfig(options.config);
    this.chunker = options.chunker ?? new DocumentChunker(this.config);
    this.queryCacheSize = Math.max(0, options.queryCacheSize ?? DEFAULT_QUERY_CACHE_SIZE);
  }

  get hasReranker(): boolean {
    return this.reranker !== undefined;
  }

  async retrieve(query: RAGQuery | undefined, signal?: AbortSignal): Promise<RAGResult> {
    if (!query || (!query.queryText && !query.queryEmbedding?.length)) {
      return emptyResult();
    }
    const result = await this.search(query, signal);
    this.metrics.recordRetrieval(result.searchLatencyMs, result.chunks.length, false);
    return result;
  }

  /**
   * Over-fetches candidates and reorders them with the reranker. A missing
   * or failing reranker leaves vector order, cut to the requested topK.
   */
  async retrieveAndRerank(query: RAGQuery | undefined, signal?: AbortSignal): Promise<RAGResult> {
    if (!query || (!query.queryText && !query.queryEmbedding?.length)) {
      return emptyResult();
    }
    const result = await this.searchAndRerank(query, signal);
    this.metrics.recordRetrieval(result.searchLatencyMs, result.chunks.length, result.rerankerApplied);
    return result;
  }

  private async search(query: RAGQuery, signal?: AbortSignal): Promise<RAGResult> {
    const start = Date.now();

    let embedding = query.queryEmbedding;
    if (!embedding || embedding.length === 0) {
      embedding = await this.embedQuery(query.queryText, signal);
    }

    const filters = buildVectorFilters(query);
    const topK = query.topK && query.topK > 0 ? query.topK : this.config.ragTopK;
    const threshold =
      query.similarityThreshold !== undefined && query.similarityThreshold > 0
        ? query.similarityThreshold
        : this.config.similarityThreshold;

    let hits: VectorSearchHit[];
    try {
      hits = await this.vectorStore.search(embedding, topK, filters, signal);
    } catch (error) {
      throw wrap('vector search', error);
    }

    const sourceTypes = query.sourceTypes ?? [];
    const chunks: RAGChunk[] = [];
    for (const hit of hits) {
      if (hit.score < threshold) {
        continue;
      }
      const source = hit.metadata.source ?? '';
      if (sourceTypes.length > 0 && !sourceTypes.some(type => type === source)) {
        continue;
      }
      const content = hit.metadata.content ?? '';
      chunks.push({
        chunkId: hit.id,
        documentId: hit.metadata.document_id ?? '',
        content,
        score: hit.score,
        source,
        metadata: { ...hit.metadata },
        tokenCount: estimateTokens(content)
      });
    }

    const elapsed = Date.now() - start;
    this.logger.debug(`retrieved ${chunks.length}/${hits.length} chunks in ${elapsed}ms`);

    return {
      chunks,
      totalFound: hits.length,
      searchLatencyMs: elapsed,
      rerankerApplied: false
    };
  }

  private async embedQuery(text: string, signal?: AbortSignal): Promise<number[]> {
    const cached = this.queryCache.get(text);
    if (cached) {
      this.metrics.recordCacheHit(QUERY_EMBEDDING_CACHE);
      // refresh recency
      this.queryCache.delete(text);
      this.queryCache.set(text, cached);
      return cached;
    }
    this.metrics.recordCacheMiss(QUERY_EMBEDDING_CACHE);

    let embedding: number[];
    try {
      embedding = await this.embedder.embed(text, signal);
    } catch (error) {
      throw wrap('embedding query', error);
    }

    if (this.queryCacheSize > 0) {
      this.queryCache.set(text, embedding);
      if (this.queryCache.size > this.queryCacheSize) {
        const oldest = this.queryCache.keys().next();
        if (!oldest.done) {
          this.queryCache.delete(oldest.value);
        }
      }
    }
    return embedding;
  }

  private async searchAndRerank(query: RAGQuery, signal?: AbortSignal): Promise<RAGResult> {
    const multiplier = this.config.rerankerMultiplier > 0 ? this.config.rerankerMultiplier : DEFAULT_RERANKER_MULTIPLIER;
    const originalTopK = query.topK && query.topK > 0 ? query.topK : this.config.ragTopK;

    const candidates = await this.search({ ...query, topK: originalTopK * multiplier }, signal);
    if (candidates.chunks.length === 0) {
      return candidates;
    }

    if (!this.reranker) {
      this.logger.warn('reranker not configured, returning raw retrieval results');
      return { ...candidates, chunks: candidates.chunks.slice(0, originalTopK) };
    }

    const rerankerTopK = this.config.rerankerTopK > 0 ? this.config.rerankerTopK : originalTopK;
    const documents = candidates.chunks.map(chunk => chunk.content);
    const rerankStart = Date.now();

    let ranked: RerankResult[];
    try {
      ranked = await this.reranker.rerank(query.queryText, documents, rerankerTopK, signal);
    } catch (error) {
      this.metrics.recordRerank(Date.now() - rerankStart, false);
      this.logger.warn(`reranker unavailable, degrading to raw scores: ${describeError(error)}`);
      return {
        ...candidates,
        chunks: candidates.chunks.slice(0, originalTopK),
        rerankerApplied: false
      };
    }

    const rerankElapsed = Date.now() - rerankStart;
    this.metrics.recordRerank(rerankElapsed, true);

    const reranked: RAGChunk[] = [];
    for (const { index, score } of ranked) {
      if (!Number.isInteger(index) || index < 0 || index >= candidates.chunks.length) {
        continue;
      }
      reranked.push({ ...candidates.chunks[index], rerankerScore: score });
    }
    reranked.sort((a, b) => (b.rerankerScore ?? 0) - (a.rerankerScore ?? 0));

    const chunks = reranked.slice(0, rerankerTopK);
    return {
      chunks,
      totalFound: candidates.totalFound,
      searchLatencyMs: candidates.searchLatencyMs + rerankElapsed,
      rerankerApplied: true
    };
  }

  buildContext(result: RAGResult | undefined, budget: number = this.config.contextTokenBudget): string {
    return buildContext(result, budget);
  }

  async indexDocument(doc: Document | undefined, signal?: AbortSignal): Promise<void> {
    if (!doc || !doc.documentId) {
      throw new InvalidInputError('document with ID is required');
    }
    if (!doc.content) {
      throw new InvalidInputError('document content is required');
    }

    const start = Date.now();
    const chunks = this.chunker.chunk(doc);
    if (chunks.length === 0) {
      return;
    }

    let embeddings: number[][];
    try {
      embeddings = await this.embedder.batchEmbed(chunks.map(chunk => chunk.content), signal);
    } catch (error) {
      throw wrap(`embedding chunks for document ${doc.documentId}`, error);
    }
    if (embeddings.length !== chunks.length) {
      throw new Error(`embedding count mismatch: got ${embeddings.length}, expected ${chunks.length}`);
    }

    const items: VectorInsertItem[] = chunks.map((chunk, i) => ({
      id: chunk.chunkId,
      vector: embeddings[i],
      metadata: {
        document_id: chunk.documentId,
        source: chunk.source,
        content: chunk.content,
        chunk_index: String(chunk.index),
        ...chunk.metadata
      }
    }));

    try {
      await this.vectorStore.batchInsert(items, signal);
    } catch (error) {
      throw wrap(`inserting chunks for document ${doc.documentId}`, error);
    }

    const elapsed = Date.now() - start;
    this.metrics.recordIndex(doc.documentId, chunks.length, elapsed, true);
    this.logger.info(`indexed document ${doc.documentId} (${chunks.length} chunks, ${elapsed}ms)`);
  }

  /**
   * Indexes every document with bounded concurrency. Failures are collected
   * into one BatchIndexError after all documents have been attempted.
   */
  async indexBatch(docs: Document[], signal?: AbortSignal): Promise<void> {
    if (docs.length === 0) {
      return;
    }

    const semaphore = new Semaphore(this.config.indexConcurrency);
    const failures: BatchFailure[] = [];

    await Promise.all(
      docs.map(doc =>
        semaphore.run(async () => {
          try {
            await this.indexDocument(doc, signal);
          } catch (error) {
            const documentId = doc?.documentId || '(missing id)';
            this.metrics.recordIndex(documentId, 0, 0, false);
            failures.push({ documentId, error: toError(error) });
          }
        })
      )
    );

    if (failures.length > 0) {
      const batchError = new BatchIndexError(failures, docs.length);
      this.logger.error('batch indexing finished with failures', batchError);
      throw batchError;
    }
  }

  async deleteDocument(documentId: string, signal?: AbortSignal): Promise<void> {
    if (!documentId) {
      throw new InvalidInputError('docID is required');
    }
    try {
      await this.vectorStore.delete(documentId, signal);
    } catch (error) {
      throw wrap(`deleting document ${documentId}`, error);
    }
    this.logger.info(`deleted document index ${documentId}`);
  }
}

export function buildVectorFilters(query: RAGQuery): VectorFilters {
  const filters: VectorFilters = {};
  const f = query.filters;

  if (f?.dateRange) {
    filters.date_from = f.dateRange.from.toISOString();
    filters.date_to = f.dateRange.to.toISOString();
  }
  if (f?.jurisdictions?.length) {
    filters.jurisdictions = f.jurisdictions;
  }
  if (f?.patentClassifications?.length) {
    filters.patent_classifications = f.patentClassifications;
  }
  if (f?.documentTypes?.length) {
    filters.document_types = f.documentTypes;
  }
  if (f?.assignees?.length) {
    filters.assignees = f.assignees;
  }
  if (f?.excludeDocIds?.length) {
    filters.exclude_doc_ids = f.excludeDocIds;
  }
  if (query.sourceTypes?.length) {
    filters.source_types = [...query.sourceTypes];
  }
  return filters;
}
