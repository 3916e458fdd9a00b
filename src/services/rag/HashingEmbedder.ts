// src/services/rag/HashingEmbedder.ts
import { TextEmbedder } from '../../types/rag.types';
import { isCJK } from '../../utils/tokenEstimator';

const DEFAULT_DIMENSIONS = 256;

/** 32-bit FNV-1a. */
function fnv1a(text: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < text.length; i++) {
    hash ^= text.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}

/**
 * Lowercased word terms; CJK characters count as one term each.
 */
export function tokenizeTerms(text: string): string[] {
  const terms: string[] = [];
  for (const word of text.toLowerCase().match(/[\p{L}\p{N}]+/gu) ?? []) {
    let latin = '';
    for (const ch of word) {
      if (isCJK(ch.codePointAt(0) ?? 0)) {
        if (latin) {
          terms.push(latin);
          latin = '';
        }
        terms.push(ch);
      } else {
        latin += ch;
      }
    }
    if (latin) {
      terms.push(latin);
    }
  }
  return terms;
}

/**
 * Deterministic bag-of-words embedder (feature hashing, L2-normalised).
 * Identical texts embed to identical vectors.
 */
export class HashingEmbedder implements TextEmbedder {
  readonly dimensions: number;

  constructor(dimensions = DEFAULT_DIMENSIONS) {
    this.dimensions = Math.max(8, Math.floor(dimensions));
  }

  async embed(text: string, signal?: AbortSignal): Promise<number[]> {
    signal?.throwIfAborted();
    return this.vectorize(text);
  }

  async batchEmbed(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    signal?.throwIfAborted();
    return texts.map(text => this.vectorize(text));
  }

  vectorize(text: string): number[] {
    const vector = new Array<number>(this.dimensions).fill(0);
    for (const term of tokenizeTerms(text)) {
      vector[fnv1a(term) % this.dimensions] += 1;
    }

    const norm = Math.sqrt(vector.reduce((sum, v) => sum + v * v, 0));
    return norm === 0 ? vector : vector.map(v => v / norm);
  }
}
