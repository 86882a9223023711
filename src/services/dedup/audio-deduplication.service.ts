import fs from 'fs';
import path from 'path';
import { logsDir } from '../../config/logger';
import {
  MIN_AUDIO_DURATION_SECONDS,
  MIN_AUDIO_FILE_BYTES,
  REPEAT_DETECTION_DEFAULTS,
} from '../../config/constants';
import ffmpegService from '../audio/ffmpeg.service';
import type { AudioEditor } from '../audio/ffmpeg.service';
import whisperService from '../transcription/whisper.service';
import type { WordTranscriber } from '../transcription/whisper.service';
import {
  describeRepeatMatch,
  detectAdjacentRepeats,
  findOverlappingIntervals,
  mergeOverlappingIntervals,
  sortIntervals,
} from '../../utils/repeat-detector';
import { retainedDurationMs } from '../../utils/interval-splicer';
import { PipelineEventRecorder } from '../../utils/pipeline-events';
import type {
  RemovalInterval,
  RepeatDetectionOptions,
  WordSequence,
} from '../../types/transcript.types';
import type { PipelineEventListener, PipelineOutcome } from '../../types/narration.types';

// ===========================================================================
// Audio Deduplication
//
// Transcribe -> find adjacent repeats -> cut them out. Input problems
// (missing, tiny or very short files) come back as a `rejected` result;
// transcription and ffmpeg failures are thrown.
// ===========================================================================

export type DeduplicationStatus = 'cleaned' | 'already-clean' | 'rejected';

export interface DeduplicationResult {
  status: DeduplicationStatus;
  inputPath: string;
  /** Cleaned audio, only when `status === 'cleaned'` */
  outputPath: string | null;
  /** Tab-separated word timings written after transcription */
  wordLogPath: string | null;
  /** Intervals that were cut, sorted */
  intervals: RemovalInterval[];
  /** Audio removed, in ms */
  removedMs: number;
}

export interface DeduplicationOptions extends RepeatDetectionOptions {
  /** Defaults to `<base>_Cleaned<ext>` next to the input */
  outputPath?: string;
  /** Coalesce overlapping intervals before splicing (default true) */
  mergeOverlaps?: boolean;
  onEvent?: PipelineEventListener;
}

/** `/a/take.wav` -> `/a/take_Cleaned.wav` */
export function cleanedFilename(inputPath: string): string {
  const { dir, name, ext } = path.parse(inputPath);
  return path.join(dir, `${name}_Cleaned${ext}`);
}

/** One `word<TAB>start<TAB>end` line per word, times in seconds. */
export function formatWordLog(words: WordSequence): string {
  return words.map((w) => `${w.text}\t${w.start.toFixed(2)}\t${w.end.toFixed(2)}\n`).join('');
}

class AudioDeduplicationService {
  constructor(
    private readonly transcriber: WordTranscriber,
    private readonly audio: AudioEditor,
    private readonly wordLogDir: string = logsDir
  ) {}

  /**
   * Remove repeated words and phrases from a recording
   */
  async cleanAudio(
    inputPath: string,
    options: DeduplicationOptions = {}
  ): Promise<PipelineOutcome<DeduplicationResult>> {
    const {
      outputPath = cleanedFilename(inputPath),
      mergeOverlaps = true,
      onEvent,
      minWords = REPEAT_DETECTION_DEFAULTS.minWords,
      maxPhraseLen = REPEAT_DETECTION_DEFAULTS.maxPhraseLen,
      maxGapMs = REPEAT_DETECTION_DEFAULTS.maxGapMs,
    } = options;
    const events = new PipelineEventRecorder(onEvent, { workflow: 'deduplication', inputPath });
    const result: DeduplicationResult = {
      status: 'rejected',
      inputPath,
      outputPath: null,
      wordLogPath: null,
      intervals: [],
      removedMs: 0,
    };
    const done = () => ({ events: events.events, result });

    if (!fs.existsSync(inputPath) || fs.statSync(inputPath).size < MIN_AUDIO_FILE_BYTES) {
      events.error(`Audio file '${inputPath}' is empty or too small to process.`);
      return done();
    }

    try {
      const durationSeconds = await this.audio.getAudioDuration(inputPath);
      if (durationSeconds < MIN_AUDIO_DURATION_SECONDS) {
        events.error(
          `Audio file '${inputPath}' is too short to process (duration: ${durationSeconds.toFixed(2)}s).`
        );
        return done();
      }

      events.info(`Transcribing ${inputPath} with word-level timestamps...`);
      const words = await this.transcriber.transcribeWords(inputPath);
      result.wordLogPath = this.writeWordLog(inputPath, words);
      events.info(`Whisper word log saved to: ${result.wordLogPath}`);

      const { intervals, matches } = detectAdjacentRepeats(words, { minWords, maxPhraseLen, maxGapMs });
      if (intervals.length === 0) {
        result.status = 'already-clean';
        events.info('No repeated segments found. The audio is already clean.');
        return done();
      }

      events.info(`Found ${intervals.length} segments to remove. Splicing audio...`);
      matches.forEach((match) => events.info(describeRepeatMatch(match)));

      let sorted = sortIntervals(intervals);
      const overlaps = findOverlappingIntervals(sorted);
      if (overlaps.length > 0) {
        events.warn(
          `${overlaps.length} removal intervals overlap` +
            (mergeOverlaps ? '; merging them before splicing.' : '; splicing them as found.')
        );
        if (mergeOverlaps) sorted = mergeOverlappingIntervals(sorted);
      }

      events.info(`Exporting cleaned audio to ${outputPath}`);
      await this.audio.spliceAudio(inputPath, outputPath, sorted);

      const durationMs = Math.round(durationSeconds * 1000);
      result.status = 'cleaned';
      result.outputPath = outputPath;
      result.intervals = sorted;
      result.removedMs = durationMs - retainedDurationMs(durationMs, sorted);
      events.info('Done!');
      return done();
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      events.error(`Error during audio deduplication: ${message}`);
      throw error;
    }
  }

  private writeWordLog(inputPath: string, words: WordSequence): string {
    fs.mkdirSync(this.wordLogDir, { recursive: true });
    const logPath = path.join(this.wordLogDir, `${path.parse(inputPath).name}_WHISPERLOG.txt`);
    fs.writeFileSync(logPath, formatWordLog(words), 'utf-8');
    return logPath;
  }
}

export { AudioDeduplicationService };
export default new AudioDeduplicationService(whisperService, ffmpegService);
