// src/services/rag/ContextBuilder.ts
import { RAGChunk, RAGResult } from '../../types/rag.types';
import { estimateTokens, truncateToTokens } from '../../utils/tokenEstimator';

const MIN_TRUNCATED_ENTRY_TOKENS = 20;
const TRUNCATION_MARKER = '...';

/** Reranker score when one is attached, similarity score otherwise. */
export function effectiveScore(chunk: RAGChunk): number {
  return chunk.rerankerScore !== undefined ? chunk.rerankerScore : chunk.score;
}

export function sortByEffectiveScore(chunks: RAGChunk[]): RAGChunk[] {
  return [...chunks].sort((a, b) => effectiveScore(b) - effectiveScore(a));
}

/**
 * Human-readable label for a chunk, e.g. "Patent US123, Claim 4".
 */
export function formatSourceAnnotation(chunk: RAGChunk): string {
  const meta = chunk.metadata ?? {};

  switch (chunk.source) {
    case 'Patent': {
      const patentNumber = meta.patent_number || chunk.documentId;
      if (meta.claim_number) {
        return `Patent ${patentNumber}, Claim ${meta.claim_number}`;
      }
      if (meta.section) {
        return `Patent ${patentNumber}, ${meta.section}`;
      }
      return `Patent ${patentNumber}`;
    }
    case 'CaseLaw':
      return `Case: ${meta.case_name || chunk.documentId}`;
    case 'ExaminationGuideline':
      return meta.section_ref ? `MPEP §${meta.section_ref}` : `Examination Guideline: ${chunk.documentId}`;
    case 'ScientificPaper':
      return `Paper: ${meta.title || chunk.documentId}`;
    case 'Regulatory':
      return meta.regulation_ref ? `Regulation: ${meta.regulation_ref}` : `Regulatory: ${chunk.documentId}`;
    default:
      return `Source: ${chunk.source} (${chunk.documentId})`;
  }
}

export function formatContextEntry(chunk: RAGChunk): string {
  return `[${formatSourceAnnotation(chunk)}]\n${chunk.content.trim()}\n\n`;
}

/**
 * Packs the highest-scoring chunks into a context string of at most
 * `budget` estimated tokens. The entry that would overflow is cut at a
 * sentence boundary and marked with "..." when enough budget remains.
 */
export function buildContext(result: RAGResult | undefined, budget: number): string {
  if (!result || result.chunks.length === 0 || budget <= 0) {
    return '';
  }

  let output = '';
  let used = 0;

  for (const chunk of sortByEffectiveScore(result.chunks)) {
    const entry = formatContextEntry(chunk);
    const entryTokens = estimateTokens(entry);

    if (used + entryTokens > budget) {
      const remaining = budget - used;
      if (remaining > MIN_TRUNCATED_ENTRY_TOKENS) {
        const markerTokens = estimateTokens(TRUNCATION_MARKER);
        const truncated = truncateToTokens(entry, remaining - markerTokens).trimEnd();
        if (truncated) {
          output += truncated + TRUNCATION_MARKER;
        }
      }
      break;
    }

    output += entry;
    used += entryTokens;
  }

  return output.trim();
}
