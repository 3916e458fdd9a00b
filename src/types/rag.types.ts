// src/types/rag.types.ts

export type DocumentSourceType =
  | 'Patent'
  | 'CaseLaw'
  | 'ExaminationGuideline'
  | 'ScientificPaper'
  | 'Regulatory';

export const DOCUMENT_SOURCE_TYPES: readonly DocumentSourceType[] = [
  'Patent',
  'CaseLaw',
  'ExaminationGuideline',
  'ScientificPaper',
  'Regulatory'
];

export function isDocumentSourceType(value: unknown): value is DocumentSourceType {
  return typeof value === 'string' && DOCUMENT_SOURCE_TYPES.some(type => type === value);
}

/**
 * A caller-owned document. Treated as immutable once indexed.
 */
export interface Document {
  documentId: string;
  title: string;
  content: string;
  source: DocumentSourceType;
  metadata?: Record<string, string>;
  language?: string;
}

export interface DocumentChunk {
  chunkId: string;
  documentId: string;
  content: string;
  source: DocumentSourceType;
  metadata: Record<string, string>;
  tokenCount: number;
  index: number;
}

/**
 * A chunk as returned by one retrieval call.
 */
export interface RAGChunk {
  chunkId: string;
  documentId: string;
  content: string;
  score: number;
  rerankerScore?: number;
  source: DocumentSourceType | string;
  metadata: Record<string, string>;
  tokenCount: number;
}

export interface DateRange {
  from: Date;
  to: Date;
}

export interface RAGFilters {
  dateRange?: DateRange;
  jurisdictions?: string[];
  patentClassifications?: string[];
  documentTypes?: string[];
  assignees?: string[];
  excludeDocIds?: string[];
}

export interface RAGQuery {
  queryText: string;
  queryEmbedding?: number[];
  filters?: RAGFilters;
  topK?: number;
  similarityThreshold?: number;
  sourceTypes?: DocumentSourceType[];
}

export interface RAGResult {
  chunks: RAGChunk[];
  totalFound: number;
  searchLatencyMs: number;
  rerankerApplied: boolean;
}

// ---------------------------------------------------------------------------
// Collaborator contracts
// ---------------------------------------------------------------------------

export type VectorFilterValue = string | number | boolean | string[];
export type VectorFilters = Record<string, VectorFilterValue>;
export type VectorMetadata = Record<string, string>;

export interface VectorSearchHit {
  id: string;
  score: number;
  metadata: VectorMetadata;
}

export interface VectorInsertItem {
  id: string;
  vector: number[];
  metadata: VectorMetadata;
}

export interface VectorStore {
  search(vector: number[], topK: number, filters: VectorFilters, signal?: AbortSignal): Promise<VectorSearchHit[]>;
  insert(item: VectorInsertItem, signal?: AbortSignal): Promise<void>;
  /** Removes every entry whose id or `document_id` metadata equals `id`. */
  delete(id: string, signal?: AbortSignal): Promise<void>;
  batchInsert(items: VectorInsertItem[], signal?: AbortSignal): Promise<void>;
}

export interface TextEmbedder {
  embed(text: string, signal?: AbortSignal): Promise<number[]>;
  batchEmbed(texts: string[], signal?: AbortSignal): Promise<number[][]>;
}

export interface RerankResult {
  index: number;
  score: number;
}

export interface Reranker {
  rerank(query: string, documents: string[], topK: number, signal?: AbortSignal): Promise<RerankResult[]>;
}

export interface DocumentChunkerLike {
  chunk(doc: Document): DocumentChunk[];
}
