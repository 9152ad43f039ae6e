import { describe, it, expect } from 'vitest';
import {
  assembleChunked,
  assembleFlat,
  assembleTranscript,
  assembleVideo,
  CHUNK_SIZE,
} from '../src/pipeline/assemble';
import type { TranscriptFragment } from '../src/pipeline/types';

function frags(...texts: string[]): TranscriptFragment[] {
  return texts.map((text, i) => ({ text, startSec: i * 2, durationSec: 2 }));
}

function wordSet(text: string): Set<string> {
  return new Set(text.toLowerCase().match(/[a-z']+/g) ?? []);
}

describe('assembleFlat', () => {
  it('joins then normalizes once', () => {
    expect(assembleFlat(frags('hes', 'going', 'home.'))).toBe("he's going home.");
  });

  it('returns an empty string for no fragments', () => {
    expect(assembleFlat([])).toBe('');
  });
});

describe('assembleChunked', () => {
  it('groups every four fragments into a paragraph', () => {
    const out = assembleChunked(frags('a', 'b', 'c', 'd', 'e', 'f'));
    expect(out).toBe('a b c d\n\ne f');
  });

  it('produces ceil(n / 4) paragraphs', () => {
    for (const n of [1, 3, 4, 5, 8, 9, 13]) {
      const texts = Array.from({ length: n }, (_, i) => `word${i}`);
      const paragraphs = assembleChunked(frags(...texts)).split('\n\n');
      expect(paragraphs).toHaveLength(Math.ceil(n / CHUNK_SIZE));
    }
  });

  it('normalizes each fragment on its own', () => {
    expect(assembleChunked(frags('dont  go', 'there .'))).toBe("don't go there.");
  });

  it('returns an empty string for no fragments', () => {
    expect(assembleChunked([])).toBe('');
  });
});

describe('assembly modes', () => {
  it('agree on the words, differ only in structure', () => {
    const input = frags('hes going', 'home.', 'i think its fine', 'were done', 'see you soon');
    const flat = assembleFlat(input);
    const chunked = assembleChunked(input);
    expect(flat).not.toContain('\n');
    expect(chunked).toContain('\n\n');
    expect(wordSet(flat)).toEqual(wordSet(chunked));
  });

  it('dispatches on the mode', () => {
    const input = frags('a', 'b', 'c', 'd', 'e');
    expect(assembleTranscript(input, 'flat')).toBe('a b c d e');
    expect(assembleTranscript(input, 'chunked')).toBe('a b c d\n\ne');
    expect(assembleVideo('Talk', input, 'flat')).toEqual({ title: 'Talk', body: 'a b c d e' });
  });
});
