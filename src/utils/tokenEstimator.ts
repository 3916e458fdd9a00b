// src/utils/tokenEstimator.ts
//
// Every token budget in the pipeline (chunk sizes, context packing, prompt
// truncation) is computed with estimateTokens. Do not add a second estimator.

const CJK_TOKENS_PER_CHAR = 0.67;
const OTHER_TOKENS_PER_CHAR = 0.25;

const CJK_RANGES: Array<[number, number]> = [
  [0x3000, 0x303f], // CJK symbols and punctuation
  [0x3040, 0x309f], // Hiragana
  [0x30a0, 0x30ff], // Katakana
  [0x3400, 0x4dbf], // Extension A
  [0x4e00, 0x9fff], // Unified ideographs
  [0xac00, 0xd7af], // Hangul syllables
  [0xf900, 0xfaff], // Compatibility ideographs
  [0xfe30, 0xfe4f], // Compatibility forms
  [0xff00, 0xffef], // Halfwidth and fullwidth forms
  [0x20000, 0x2a6df], // Extension B
  [0x2a700, 0x2ebef], // Extensions C-F
  [0x2f800, 0x2fa1f], // Compatibility supplement
  [0x30000, 0x3134f] // Extension G
];

export function isCJK(codePoint: number): boolean {
  for (const [start, end] of CJK_RANGES) {
    if (codePoint >= start && codePoint <= end) {
      return true;
    }
  }
  return false;
}

/**
 * Estimated model tokens for a piece of text. 0 for the empty string,
 * at least 1 for anything else.
 */
export function estimateTokens(text: string): number {
  if (!text) {
    return 0;
  }

  let cjk = 0;
  let other = 0;
  for (const ch of text) {
    const cp = ch.codePointAt(0) ?? 0;
    if (isCJK(cp)) {
      cjk++;
    } else {
      other++;
    }
  }

  const estimate = Math.ceil(cjk * CJK_TOKENS_PER_CHAR + other * OTHER_TOKENS_PER_CHAR);
  return Math.max(1, estimate);
}

const SENTENCE_BOUNDARY = /[.。!?！？\n]/;

/**
 * Longest prefix of `text` whose estimate fits `maxTokens`, pulled back to
 * the last sentence or line boundary when that boundary lies past the
 * midpoint of the prefix.
 */
export function truncateToTokens(text: string, maxTokens: number): string {
  if (maxTokens <= 0) {
    return '';
  }
  if (estimateTokens(text) <= maxTokens) {
    return text;
  }

  const chars = Array.from(text);
  let low = 0;
  let high = chars.length;
  while (low < high) {
    const mid = Math.ceil((low + high) / 2);
    if (estimateTokens(chars.slice(0, mid).join('')) <= maxTokens) {
      low = mid;
    } else {
      high = mid - 1;
    }
  }

  const prefix = chars.slice(0, low);
  let boundary = -1;
  for (let i = prefix.length - 1; i >= 0; i--) {
    if (SENTENCE_BOUNDARY.test(prefix[i])) {
      boundary = i;
      break;
    }
  }
  if (boundary > prefix.length / 2) {
    return prefix.slice(0, boundary + 1).join('').trimEnd();
  }
  return prefix.join('');
}

/**
 * Tail of `text` worth roughly `tokenCount` tokens, started at a sentence
 * boundary when one falls in the first half of the tail.
 */
export function extractTailTokens(text: string, tokenCount: number): string {
  if (tokenCount <= 0) {
    return '';
  }
  if (estimateTokens(text) <= tokenCount) {
    return text;
  }

  const chars = Array.from(text);
  let low = 0;
  let high = chars.length;
  // smallest start index whose suffix fits
  while (low < high) {
    const mid = Math.floor((low + high) / 2);
    if (estimateTokens(chars.slice(mid).join('')) <= tokenCount) {
      high = mid;
    } else {
      low = mid + 1;
    }
  }

  const tail = chars.slice(low);
  for (let i = 0; i < tail.length / 2; i++) {
    if (/[.。!?！？]/.test(tail[i])) {
      return tail.slice(i + 1).join('').trim();
    }
  }
  return tail.join('').trim();
}
