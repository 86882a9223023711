/**
 * Split text that is too long for one TTS request, preferring to cut right
 * after a sentence end.
 */

import { MAX_CHUNK_LENGTH } from '../config/constants';
import type { ChunkSplitOptions } from '../types/narration.types';

const isSentenceEnd = (ch: string): boolean => ch === '.' || ch === '!';

const isHighSurrogate = (code: number): boolean => code >= 0xd800 && code <= 0xdbff;

/** Pull a hard cut back so it does not land inside a surrogate pair. */
function safeHardCut(text: string, offset: number, limit: number): number {
  return limit - 1 > offset && isHighSurrogate(text.charCodeAt(limit - 1)) ? limit - 1 : limit;
}

/** Index just past the first sentence end in text[from, to), or -1. */
function findSentenceCut(text: string, from: number, to: number): number {
  for (let i = from; i < to; i++) {
    if (isSentenceEnd(text[i])) return i + 1;
  }
  return -1;
}

/**
 * Pieces of `text`, each trimmed.
 *
 * Once a piece would exceed `maxLength`, the cut goes after the first `.` or
 * `!` found at or beyond the limit, so a piece runs past `maxLength` up to the
 * end of the sentence it is in. Without such a sentence end (within
 * `maxLookahead`, when given) the cut is made exactly at the limit.
 */
export function splitIntoChunks(
  text: string,
  maxLength: number = MAX_CHUNK_LENGTH,
  options: ChunkSplitOptions = {}
): string[] {
  if (text.length <= maxLength) {
    return [text.trim()];
  }

  const pieces: string[] = [];
  let offset = 0;

  while (offset < text.length) {
    if (text.length - offset <= maxLength) {
      pieces.push(text.slice(offset).trim());
      break;
    }

    const limit = offset + maxLength;
    const searchEnd =
      options.maxLookahead === undefined
        ? text.length
        : Math.min(text.length, limit + options.maxLookahead);
    const cut = findSentenceCut(text, limit, searchEnd);
    const end = cut === -1 ? safeHardCut(text, offset, limit) : cut;

    pieces.push(text.slice(offset, end).trim());
    offset = end;
  }

  return pieces;
}

/** Apply `splitIntoChunks` to each paragraph and flatten the result. */
export function splitLongParagraphs(
  paragraphs: readonly string[],
  maxLength: number = MAX_CHUNK_LENGTH,
  options: ChunkSplitOptions = {}
): string[] {
  return paragraphs.flatMap((paragraph) => splitIntoChunks(paragraph, maxLength, options));
}
