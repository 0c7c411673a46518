import { describe, it, expect } from 'vitest';
import { chunkText, simpleTokenCount } from '../src/utils/chunking.js';
import { flattenMarkdown, normalizeText, queryTerms, tokenize, truncateExcerpt } from '../src/utils/text.js';

describe('chunkText', () => {
  it('creates overlapping chunks with bounded size', () => {
    const text = Array.from({ length: 600 }, (_, i) => `tok${i}`).join(' ');
    const chunks = chunkText(text, 200, 50);

    expect(chunks.length).toBeGreaterThan(5);
    for (const c of chunks) {
      expect(c.length).toBeLessThanOrEqual(200);
    }
    expect(chunks[0].startsWith('tok0 ')).toBe(true);
    expect(chunks[chunks.length - 1].endsWith('tok599')).toBe(true);
  });

  it('keeps short text as a single chunk', () => {
    expect(chunkText('The capital of France is Paris.')).toEqual(['The capital of France is Paris.']);
  });

  it('ends a window at a sentence break in its second half', () => {
    const first = 'a'.repeat(70) + '.';
    const text = `${first} ${'b'.repeat(60)}`;
    const chunks = chunkText(text, 100, 10);
    expect(chunks[0]).toBe(first);
  });

  it('returns nothing for blank text', () => {
    expect(chunkText('  \n\t ')).toEqual([]);
  });

  it('rejects an overlap as large as the window', () => {
    expect(() => chunkText('some text', 100, 100)).toThrow(RangeError);
  });

  it('counts whitespace separated tokens', () => {
    expect(simpleTokenCount('  one two\nthree  ')).toBe(3);
  });
});

describe('text utilities', () => {
  it('normalizes line endings, trailing spaces and blank runs', () => {
    expect(normalizeText('Title  \r\n\r\n\r\n\r\nBody\ttext  \r\nend')).toBe('Title\n\nBody text\nend');
  });

  it('flattens markdown to plain text', () => {
    const md = ['# Heading', '', '- **Bold** item with [a link](https://example.com)', '> quoted `code`', '```', 'snake_case_name'].join('\n');
    expect(normalizeText(flattenMarkdown(md))).toBe('Heading\n\nBold item with a link\nquoted code\n\nsnake_case_name');
  });

  it('extracts query terms without stop words or duplicates', () => {
    expect(queryTerms('What is the capital of France? The CAPITAL!')).toEqual(['capital', 'france']);
  });

  it('tokenizes unicode letters and digits', () => {
    expect(tokenize('Straße, 42 times')).toEqual(['straße', '42', 'times']);
  });

  it('truncates excerpts at a word boundary with an ellipsis', () => {
    expect(truncateExcerpt('alpha beta gamma delta', 100)).toBe('alpha beta gamma delta');
    expect(truncateExcerpt('alpha beta gamma delta', 15)).toBe('alpha beta…');
  });
});
