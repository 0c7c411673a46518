export function simpleTokenCount(text: string): number {
  return text.trim().split(/\s+/).filter(Boolean).length;
}

const SENTENCE_BREAK = /[.!?\n]/;

function lastBreakBefore(text: string, start: number, end: number): number {
  for (let i = end - 1; i > start; i--) {
    if (SENTENCE_BREAK.test(text[i])) return i;
  }
  return -1;
}

/**
 * Splits text into overlapping character windows. A window ends at the last
 * sentence break in its second half when there is one, otherwise at `maxChars`.
 */
export function chunkText(text: string, maxChars = 1000, overlap = 200): string[] {
  const clean = text.replace(/\s+/g, ' ').trim();
  if (!clean) return [];
  if (overlap >= maxChars) throw new RangeError('overlap must be smaller than maxChars');

  const chunks: string[] = [];
  let start = 0;
  while (start < clean.length) {
    let end = Math.min(start + maxChars, clean.length);
    if (end < clean.length) {
      const brk = lastBreakBefore(clean, start, end);
      if (brk > start + Math.floor(maxChars / 2)) end = brk + 1;
    }

    const chunk = clean.slice(start, end).trim();
    if (chunk) chunks.push(chunk);
    if (end >= clean.length) break;
    start = Math.max(start + 1, end - overlap);
  }

  return chunks;
}
