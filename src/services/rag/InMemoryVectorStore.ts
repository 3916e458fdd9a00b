// src/services/rag/InMemoryVectorStore.ts
import {
  VectorFilters,
  VectorInsertItem,
  VectorSearchHit,
  VectorStore
} from '../../types/rag.types';

// list filter -> metadata field it matches against
const LIST_FILTER_FIELDS: Record<string, string> = {
  source_types: 'source',
  jurisdictions: 'jurisdiction',
  document_types: 'document_type',
  assignees: 'assignee'
};

export function cosineSimilarity(a: number[], b: number[]): number {
  const length = Math.min(a.length, b.length);
  let dot = 0;
  let normA = 0;
  let normB = 0;

  for (let i = 0; i < length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

function asList(value: VectorFilters[string] | undefined): string[] {
  if (value === undefined) return [];
  return Array.isArray(value) ? value : [String(value)];
}

/**
 * Brute-force cosine search over vectors held in a Map. Used by tests and
 * local runs that have no vector database.
 */
export class InMemoryVectorStore implements VectorStore {
  private items = new Map<string, VectorInsertItem>();

  get size(): number {
    return this.items.size;
  }

  async search(vector: number[], topK: number, filters: VectorFilters = {}, signal?: AbortSignal): Promise<VectorSearchHit[]> {
    signal?.throwIfAborted();

    const hits: VectorSearchHit[] = [];
    for (const item of this.items.values()) {
      if (!this.matches(item, filters)) {
        continue;
      }
      hits.push({
        id: item.id,
        score: cosineSimilarity(vector, item.vector),
        metadata: { ...item.metadata }
      });
    }

    hits.sort((a, b) => b.score - a.score);
    return hits.slice(0, Math.max(0, topK));
  }

  async insert(item: VectorInsertItem, signal?: AbortSignal): Promise<void> {
    signal?.throwIfAborted();
    this.items.set(item.id, { ...item, vector: [...item.vector], metadata: { ...item.metadata } });
  }

  async batchInsert(items: VectorInsertItem[], signal?: AbortSignal): Promise<void> {
    for (const item of items) {
      await this.insert(item, signal);
    }
  }

  async delete(id: string, signal?: AbortSignal): Promise<void> {
    signal?.throwIfAborted();
    for (const [key, item] of this.items) {
      if (key === id || item.metadata.document_id === id) {
        this.items.delete(key);
      }
    }
  }

  ids(): string[] {
    return [...this.items.keys()];
  }

  private matches(item: VectorInsertItem, filters: VectorFilters): boolean {
    const meta = item.metadata;

    for (const [filterKey, field] of Object.entries(LIST_FILTER_FIELDS)) {
      const allowed = asList(filters[filterKey]);
      if (allowed.length > 0 && !allowed.includes(meta[field] ?? '')) {
        return false;
      }
    }

    const excluded = asList(filters.exclude_doc_ids);
    if (excluded.includes(meta.document_id ?? '')) {
      return false;
    }

    const classifications = asList(filters.patent_classifications);
    if (classifications.length > 0) {
      const classification = meta.classification ?? '';
      if (!classifications.some(prefix => classification.startsWith(prefix))) {
        return false;
      }
    }

    // ISO-8601 strings compare chronologically
    const date = meta.date;
    if (date) {
      const from = filters.date_from;
      const to = filters.date_to;
      if (typeof from === 'string' && date < from) return false;
      if (typeof to === 'string' && date > to) return false;
    }

    return true;
  }
}
