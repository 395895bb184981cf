/**
 * Segmenter Tool - Sentence splitting and fixed-size chunking of transcripts
 */

import { ConfigurationError } from '../errors';
import type { Chunk } from '../types';

/**
 * Split raw transcript text into trimmed sentences.
 *
 * Breaks after `.`, `!` or `?` (plus any closing quotes or brackets) when
 * whitespace follows. Blank lines also end a sentence.
 */
export function splitSentences(text: string): string[] {
  const normalized = text.replace(/\r\n?/g, '\n');

  return normalized
    .split(/\n\s*\n/)
    .flatMap(paragraph => paragraph.split(/(?<=[.!?]["')\]]*)\s+/))
    .map(sentence => sentence.replace(/\s+/g, ' ').trim())
    .filter(sentence => sentence.length > 0);
}

/**
 * Group sentences into chunks of `pageSize`. The last chunk may be shorter.
 */
export function segment(sentences: readonly string[], pageSize: number): Chunk[] {
  if (!Number.isInteger(pageSize) || pageSize < 1) {
    throw new ConfigurationError(`Page size must be a positive integer, got ${pageSize}`);
  }

  const chunks: Chunk[] = [];
  for (let i = 0; i < sentences.length; i += pageSize) {
    const page = sentences.slice(i, i + pageSize);
    chunks.push({
      index: chunks.length,
      sentences: page,
      text: page.join(' '),
    });
  }
  return chunks;
}
