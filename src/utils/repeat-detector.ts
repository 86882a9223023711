/**
 * Find words and phrases a speaker (or a TTS engine) said twice in a row, so
 * the second occurrence can be cut out of the audio.
 */

import { REPEAT_DETECTION_DEFAULTS } from '../config/constants';
import type {
  RemovalInterval,
  RepeatDetectionOptions,
  RepeatDetectionResult,
  RepeatMatch,
  WordSequence,
} from '../types/transcript.types';

const normalizeToken = (text: string): string => text.toLowerCase().trim();

const toMs = (seconds: number): number => Math.round(seconds * 1000);

function sameWindow(keys: string[], a: number, b: number, length: number): boolean {
  for (let k = 0; k < length; k++) {
    if (keys[a + k] !== keys[b + k]) return false;
  }
  return true;
}

/** Number of consecutive keys equal to keys[i], starting at i. */
function wordRunLength(keys: string[], i: number): number {
  let length = 1;
  while (i + length < keys.length && keys[i + length] === keys[i]) {
    length++;
  }
  return length;
}

/**
 * Scan a transcript for adjacent repeats.
 *
 * At each position the longest repeated phrase wins. A run of three or more
 * identical words is collapsed into one interval that keeps the first
 * occurrence; phrases lying wholly inside such a run are left to it. In both
 * cases the scan resumes after the removed copy.
 */
export function detectAdjacentRepeats(
  words: WordSequence,
  options: RepeatDetectionOptions = {}
): RepeatDetectionResult {
  const minWords = Math.max(1, options.minWords ?? REPEAT_DETECTION_DEFAULTS.minWords);
  const maxPhraseLen = options.maxPhraseLen ?? REPEAT_DETECTION_DEFAULTS.maxPhraseLen;
  const maxGapMs = options.maxGapMs ?? REPEAT_DETECTION_DEFAULTS.maxGapMs;

  const keys = words.map((w) => normalizeToken(w.text));
  const n = keys.length;
  const intervals: RemovalInterval[] = [];
  const matches: RepeatMatch[] = [];

  const record = (match: RepeatMatch): void => {
    // Rounding can collapse a zero-length word; nothing to cut then.
    if (match.interval.startMs >= match.interval.endMs) return;
    intervals.push(match.interval);
    matches.push(match);
  };

  let i = 0;
  while (i < n) {
    const runLength = wordRunLength(keys, i);
    let advance = 0;

    for (let len = Math.min(maxPhraseLen, Math.floor((n - i) / 2)); len >= minWords; len--) {
      // Shorter windows would only see the run word; the run below is one cut
      if (runLength >= 3 && 2 * len <= runLength) break;
      if (!sameWindow(keys, i, i + len, len)) continue;

      const gapMs = (words[i + len].start - words[i + len - 1].end) * 1000;
      if (gapMs > maxGapMs) continue;

      record({
        kind: 'phrase',
        phrase: keys.slice(i, i + len).join(' '),
        length: len,
        interval: {
          startMs: toMs(words[i + len].start),
          endMs: toMs(words[i + 2 * len - 1].end),
        },
      });
      advance = len;
      break;
    }

    if (advance === 0 && runLength >= 3) {
      record({
        kind: 'word-run',
        phrase: keys[i],
        count: runLength,
        interval: {
          startMs: toMs(words[i + 1].start),
          endMs: toMs(words[i + runLength - 1].end),
        },
      });
      advance = runLength;
    }

    i += advance > 0 ? advance : 1;
  }

  return { intervals, matches };
}

/** Order intervals for splicing: by start, then by end. */
export function sortIntervals(intervals: readonly RemovalInterval[]): RemovalInterval[] {
  return [...intervals].sort((a, b) => a.startMs - b.startMs || a.endMs - b.endMs);
}

/**
 * Pairs of intervals that overlap, for a list sorted by start. Abutting
 * intervals (one ends where the next starts) do not overlap.
 */
export function findOverlappingIntervals(
  sorted: readonly RemovalInterval[]
): [RemovalInterval, RemovalInterval][] {
  const overlaps: [RemovalInterval, RemovalInterval][] = [];
  let reach: RemovalInterval | undefined;

  for (const interval of sorted) {
    if (reach && interval.startMs < reach.endMs) {
      overlaps.push([reach, interval]);
    }
    if (!reach || interval.endMs > reach.endMs) {
      reach = interval;
    }
  }
  return overlaps;
}

/** Coalesce overlapping intervals of a list sorted by start. */
export function mergeOverlappingIntervals(sorted: readonly RemovalInterval[]): RemovalInterval[] {
  const merged: RemovalInterval[] = [];
  for (const interval of sorted) {
    const last = merged[merged.length - 1];
    if (last && interval.startMs < last.endMs) {
      last.endMs = Math.max(last.endMs, interval.endMs);
    } else {
      merged.push({ ...interval });
    }
  }
  return merged;
}

/** One-line description of a match, for logs and job events. */
export function describeRepeatMatch(match: RepeatMatch): string {
  const at = (match.interval.startMs / 1000).toFixed(2);
  if (match.kind === 'phrase') {
    return `Found repeat: ${match.phrase} (len=${match.length}) at ${at}s`;
  }
  return `Found single-word repeat: ${match.phrase} x${match.count} at ${at}s`;
}
