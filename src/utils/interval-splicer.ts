/**
 * Rebuild an audio timeline with removal intervals cut out.
 *
 * The splicer never touches audio itself: callers supply an `AudioRangeCopier`
 * that knows how to copy a millisecond range of their audio representation and
 * how to join the copies (an in-memory buffer, an ffmpeg filter graph, ...).
 */

import type { RemovalInterval, TimeRange } from '../types/transcript.types';

export interface AudioRangeCopier<TSegment> {
  /** Copy [startMs, endMs) of the source audio */
  copyRange(startMs: number, endMs: number): TSegment;
  /** Join copied segments in the given order */
  concat(segments: TSegment[]): TSegment;
}

/**
 * Ranges of a `durationMs` long recording left after cutting `intervals`.
 * Intervals must be sorted by start. Empty ranges are left out and bounds are
 * clamped to the recording.
 */
export function retainedRanges(
  durationMs: number,
  intervals: readonly RemovalInterval[]
): TimeRange[] {
  const ranges: TimeRange[] = [];
  const clamp = (ms: number) => Math.min(Math.max(ms, 0), durationMs);

  const keep = (startMs: number, endMs: number) => {
    const start = clamp(startMs);
    const end = clamp(endMs);
    if (end > start) ranges.push({ startMs: start, endMs: end });
  };

  let cursor = 0;
  for (const interval of intervals) {
    keep(cursor, interval.startMs);
    cursor = interval.endMs;
  }
  keep(cursor, durationMs);

  return ranges;
}

/** Total length of the audio kept by `retainedRanges`. */
export function retainedDurationMs(
  durationMs: number,
  intervals: readonly RemovalInterval[]
): number {
  return retainedRanges(durationMs, intervals).reduce(
    (total, range) => total + (range.endMs - range.startMs),
    0
  );
}

/**
 * Copy every retained range, in original order, and join the copies.
 * Overlapping intervals do not fail but may keep audio a later interval
 * meant to remove; check with `findOverlappingIntervals` first.
 */
export function spliceIntervals<TSegment>(
  durationMs: number,
  intervals: readonly RemovalInterval[],
  audio: AudioRangeCopier<TSegment>
): TSegment {
  const segments = retainedRanges(durationMs, intervals).map((range) =>
    audio.copyRange(range.startMs, range.endMs)
  );
  return audio.concat(segments);
}
