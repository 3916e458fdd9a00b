// src/services/report/streaming.ts

export const DEFAULT_FLUSH_BYTES = 1024;

/** Flush on a paragraph boundary or once the buffer passes `maxBytes`. */
export function shouldFlush(buffer: string, maxBytes: number = DEFAULT_FLUSH_BYTES): boolean {
  if (!buffer) return false;
  return buffer.endsWith('\n\n') || Buffer.byteLength(buffer, 'utf-8') > maxBytes;
}

const HEADING_LINE = /^#{1,6}\s+(.+?)\s*#*\s*$/gm;

/** Text of the last Markdown heading in `text`, or '' when there is none. */
export function detectSectionHint(text: string): string {
  let hint = '';
  for (const match of text.matchAll(HEADING_LINE)) {
    hint = match[1].replace(/\*\*/g, '').trim();
  }
  return hint;
}
