/**
 * Types shared by transcription, repeat detection and audio splicing.
 */

/** One transcribed word with its position in the audio, in seconds. */
export interface Word {
  readonly text: string;
  readonly start: number;
  readonly end: number;
}

/** Ordered, chronologically non-overlapping words of one recording. */
export type WordSequence = readonly Word[];

/** Half-open range [startMs, endMs) of audio to cut out. */
export interface RemovalInterval {
  startMs: number;
  endMs: number;
}

/** Half-open range [startMs, endMs) of audio to keep. */
export interface TimeRange {
  startMs: number;
  endMs: number;
}

export interface RepeatDetectionOptions {
  /** Shortest phrase (in words) compared as a unit */
  minWords?: number;
  /** Longest phrase (in words) compared as a unit */
  maxPhraseLen?: number;
  /** Largest silence allowed between a phrase and its repeat */
  maxGapMs?: number;
}

/** How a removal interval was found. */
export type RepeatMatch =
  | {
      kind: 'phrase';
      /** Normalized words of the repeated phrase */
      phrase: string;
      /** Number of words in the phrase */
      length: number;
      interval: RemovalInterval;
    }
  | {
      kind: 'word-run';
      /** The repeated word, normalized */
      phrase: string;
      /** Total occurrences in the run, the kept one included */
      count: number;
      interval: RemovalInterval;
    };

export interface RepeatDetectionResult {
  /** Intervals in discovery order (not sorted) */
  intervals: RemovalInterval[];
  /** One entry per interval, same order */
  matches: RepeatMatch[];
}
