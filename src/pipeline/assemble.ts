import type { AssembledTranscript, TranscriptFragment } from './types';
import type { AssemblyMode } from './env';
import { normalizeText } from './normalize';

export const CHUNK_SIZE = 4;

/**
 * Chunked: every fragment is normalized on its own, then each run of
 * CHUNK_SIZE fragments becomes one paragraph.
 */
export function assembleChunked(
  fragments: readonly TranscriptFragment[],
  chunkSize = CHUNK_SIZE
): string {
  const cleaned = fragments.map((f) => normalizeText(f.text));
  const paragraphs: string[] = [];
  for (let i = 0; i < cleaned.length; i += chunkSize) {
    paragraphs.push(cleaned.slice(i, i + chunkSize).join(' '));
  }
  return paragraphs.join('\n\n');
}

/**
 * Flat: raw texts are joined first and normalized once, so contractions split
 * across fragment boundaries still get repaired.
 */
export function assembleFlat(fragments: readonly TranscriptFragment[]): string {
  return normalizeText(fragments.map((f) => f.text).join(' '));
}

export function assembleTranscript(
  fragments: readonly TranscriptFragment[],
  mode: AssemblyMode
): string {
  return mode === 'chunked' ? assembleChunked(fragments) : assembleFlat(fragments);
}

export function assembleVideo(
  title: string,
  fragments: readonly TranscriptFragment[],
  mode: AssemblyMode
): AssembledTranscript {
  return { title, body: assembleTranscript(fragments, mode) };
}
