// src/services/rag/DocumentChunker.ts
import { Document, DocumentChunk, DocumentChunkerLike } from '../../types/rag.types';
import { estimateTokens, extractTailTokens } from '../../utils/tokenEstimator';

export interface ChunkerConfig {
  chunkSize?: number;
  chunkOverlap?: number;
}

const DEFAULT_CHUNK_SIZE = 512;

const CLAIMS_HEADING = /^[ \t]*(?:CLAIMS|Claims|What is claimed is|权利要求书?)/m;
const CLAIMS_MARKERS = ['Claims', 'CLAIMS', '权利要求书', '权利要求'];
const CLAIM_START = /^(\d{1,3})\s*[.、．)]/;
const SENTENCE_END = /[.。!?]/;

/**
 * Splits documents into indexable chunks. Patent documents get their claims
 * section split into one chunk per claim; everything else is packed by
 * paragraph, then by sentence, up to `chunkSize` estimated tokens.
 */
export class DocumentChunker implements DocumentChunkerLike {
  readonly chunkSize: number;
  readonly chunkOverlap: number;

  constructor(config: ChunkerConfig = {}) {
    const size = config.chunkSize && config.chunkSize > 0 ? Math.floor(config.chunkSize) : DEFAULT_CHUNK_SIZE;
    let overlap = Math.floor(config.chunkOverlap ?? 0);
    if (overlap < 0) {
      overlap = 0;
    }
    if (overlap >= size) {
      overlap = Math.floor(size / 4);
    }
    this.chunkSize = size;
    this.chunkOverlap = overlap;
  }

  chunk(doc: Document): DocumentChunk[] {
    if (!doc.content || !doc.content.trim()) {
      return [];
    }
    if (doc.source === 'Patent') {
      return this.chunkPatent(doc);
    }
    return this.chunkGeneric(doc);
  }

  private chunkPatent(doc: Document): DocumentChunk[] {
    const section = splitClaimsSection(doc.content);
    const chunks: DocumentChunk[] = [];

    const descriptionParts = this.packParagraphs(section.description);
    descriptionParts.forEach((content, i) => {
      chunks.push(this.toChunk(doc, `${doc.documentId}-desc-${i}`, content, i, { section: 'description' }));
    });

    if (section.claims) {
      const base = chunks.length;
      splitClaims(section.claims).forEach((claim, i) => {
        chunks.push(
          this.toChunk(doc, `${doc.documentId}-claim-${i + 1}`, claim.text, base + i, {
            section: 'claims',
            claim_number: String(claim.number ?? i + 1)
          })
        );
      });
    }

    return chunks;
  }

  private chunkGeneric(doc: Document): DocumentChunk[] {
    return this.packParagraphs(doc.content).map((content, i) =>
      this.toChunk(doc, `${doc.documentId}-chunk-${i}`, content, i, {})
    );
  }

  private toChunk(
    doc: Document,
    chunkId: string,
    content: string,
    index: number,
    extra: Record<string, string>
  ): DocumentChunk {
    return {
      chunkId,
      documentId: doc.documentId,
      content,
      source: doc.source,
      metadata: { ...(doc.metadata ?? {}), ...extra },
      tokenCount: estimateTokens(content),
      index
    };
  }

  /**
   * Paragraph packing. A paragraph larger than the chunk size is flushed on
   * its own through sentence packing.
   */
  private packParagraphs(text: string): string[] {
    const out: string[] = [];
    const acc = new Accumulator(this.chunkSize, this.chunkOverlap, '\n\n', out);

    for (const raw of text.split('\n\n')) {
      const para = raw.trim();
      if (!para) {
        continue;
      }
      if (estimateTokens(para) > this.chunkSize) {
        acc.flush();
        acc.reset();
        out.push(...this.packSentences(para));
        continue;
      }
      acc.add(para);
    }
    acc.finish();
    return out;
  }

  private packSentences(text: string): string[] {
    const out: string[] = [];
    const acc = new Accumulator(this.chunkSize, this.chunkOverlap, ' ', out);
    for (const raw of splitSentences(text)) {
      const sentence = raw.trim();
      if (sentence) {
        acc.add(sentence);
      }
    }
    acc.finish();
    return out;
  }
}

/**
 * Greedy accumulate/flush with an overlap seed carried into the next chunk.
 * A buffer holding nothing but the seed is never emitted.
 */
class Accumulator {
  private parts: string[] = [];
  private tokens = 0;
  private fresh = false;

  constructor(
    private readonly size: number,
    private readonly overlap: number,
    private readonly separator: string,
    private readonly out: string[]
  ) {}

  add(piece: string): void {
    const pieceTokens = estimateTokens(piece);
    if (this.fresh && this.tokens + pieceTokens > this.size) {
      this.flush();
    }
    this.parts.push(piece);
    this.tokens += pieceTokens;
    this.fresh = true;
  }

  flush(): void {
    if (!this.fresh) {
      return;
    }
    const content = this.parts.join(this.separator).trim();
    this.out.push(content);
    this.fresh = false;

    const seed = this.overlap > 0 ? extractTailTokens(content, this.overlap) : '';
    this.parts = seed ? [seed] : [];
    this.tokens = estimateTokens(seed);
  }

  reset(): void {
    this.parts = [];
    this.tokens = 0;
    this.fresh = false;
  }

  finish(): void {
    this.flush();
    this.reset();
  }
}

export interface ClaimsSplit {
  description: string;
  claims: string;
}

/**
 * Separates the description from the claims section. The heading marker is
 * dropped from the claims text; anything after it on the same line is kept.
 */
export function splitClaimsSection(content: string): ClaimsSplit {
  let start = -1;
  let markerLength = 0;
  const heading = CLAIMS_HEADING.exec(content);
  if (heading) {
    start = heading.index;
    markerLength = heading[0].length;
  } else {
    for (const marker of CLAIMS_MARKERS) {
      const idx = content.indexOf(marker);
      if (idx >= 0) {
        start = idx;
        markerLength = marker.length;
        break;
      }
    }
  }

  if (start < 0) {
    return { description: content, claims: '' };
  }

  const afterMarker = content.slice(start + markerLength);
  const lineEnd = afterMarker.indexOf('\n');
  const headingTail = (lineEnd >= 0 ? afterMarker.slice(0, lineEnd) : afterMarker).replace(/^[\s:：]+/, '');
  const body = lineEnd >= 0 ? afterMarker.slice(lineEnd + 1) : '';

  return {
    description: content.slice(0, start),
    claims: headingTail ? `${headingTail}\n${body}` : body
  };
}

export interface SplitClaim {
  number?: number;
  text: string;
}

/**
 * One entry per numbered claim ("1.", "2、", "3)"). Falls back to blank-line
 * separated blocks when no line starts with a claim number.
 */
export function splitClaims(claimsText: string): SplitClaim[] {
  const claims: SplitClaim[] = [];
  let current: string[] = [];
  let currentNumber: number | undefined;

  const push = () => {
    const text = current.join(' ').trim();
    if (text) {
      claims.push({ number: currentNumber, text });
    }
  };

  for (const line of claimsText.split('\n')) {
    const trimmed = line.trim();
    if (!trimmed) {
      continue;
    }
    const match = CLAIM_START.exec(trimmed);
    if (match) {
      push();
      current = [];
      currentNumber = Number(match[1]);
    }
    if (currentNumber !== undefined) {
      current.push(trimmed);
    }
  }
  push();

  if (claims.length > 0) {
    return claims;
  }

  return claimsText
    .split('\n\n')
    .map(part => part.trim())
    .filter(part => part.length > 0)
    .map(text => ({ text }));
}

/**
 * Sentence split on `.`, `。`, `!`, `?` followed by whitespace or end of text.
 * The punctuation stays with its sentence.
 */
export function splitSentences(text: string): string[] {
  const sentences: string[] = [];
  const chars = Array.from(text);
  let current = '';

  for (let i = 0; i < chars.length; i++) {
    current += chars[i];
    if (SENTENCE_END.test(chars[i])) {
      if (i + 1 >= chars.length || /[ \n\t]/.test(chars[i + 1])) {
        sentences.push(current);
        current = '';
      }
    }
  }
  if (current) {
    sentences.push(current);
  }
  return sentences;
}
