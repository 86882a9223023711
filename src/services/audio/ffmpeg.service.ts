import ffmpeg from 'fluent-ffmpeg';
import fs from 'fs';
import path from 'path';
import { promisify } from 'util';
import { logger } from '../../config/logger';
import { spliceIntervals } from '../../utils/interval-splicer';
import type { AudioRangeCopier } from '../../utils/interval-splicer';
import type { RemovalInterval } from '../../types/transcript.types';

const unlinkAsync = promisify(fs.unlink);

const SAMPLE_RATE = 48000;
const normalizeSync = `aformat=channel_layouts=stereo,aresample=${SAMPLE_RATE}`;

export type AudioOutputFormat = 'mp3' | 'wav' | 'flac' | 'ogg';

/** A filter_complex graph whose final stream is labelled `outputLabel`. */
export interface FilterGraph {
  filters: string[];
  outputLabel: string;
}

/** What the deduplication workflow needs from an audio backend. */
export interface AudioEditor {
  getAudioDuration(filePath: string): Promise<number>;
  spliceAudio(inputPath: string, outputPath: string, intervals: RemovalInterval[]): Promise<string>;
}

const seconds = (ms: number): string => (ms / 1000).toFixed(3);

/** Copies ranges of input 0 with atrim and joins them with concat. */
class TrimConcatGraph implements AudioRangeCopier<FilterGraph> {
  private count = 0;

  copyRange(startMs: number, endMs: number): FilterGraph {
    const label = `seg${this.count++}`;
    return {
      filters: [`[0:a]atrim=start=${seconds(startMs)}:end=${seconds(endMs)},asetpts=PTS-STARTPTS[${label}]`],
      outputLabel: label,
    };
  }

  concat(segments: FilterGraph[]): FilterGraph {
    if (segments.length === 0) {
      return { filters: [], outputLabel: '' };
    }
    const filters = segments.flatMap((segment) => segment.filters);
    if (segments.length === 1) {
      filters.push(`[${segments[0].outputLabel}]anull[out]`);
    } else {
      const inputs = segments.map((segment) => `[${segment.outputLabel}]`).join('');
      filters.push(`${inputs}concat=n=${segments.length}:v=0:a=1[out]`);
    }
    return { filters, outputLabel: 'out' };
  }
}

/**
 * Filter graph that keeps everything outside `intervals` (sorted by start).
 * Null when nothing would be left.
 */
export function buildSpliceFilterGraph(
  durationMs: number,
  intervals: readonly RemovalInterval[]
): FilterGraph | null {
  const graph = spliceIntervals(durationMs, intervals, new TrimConcatGraph());
  return graph.filters.length > 0 ? graph : null;
}

/** Filter graph that joins `inputCount` inputs with `pauseMs` of silence between them. */
export function buildPausedConcatFilterGraph(inputCount: number, pauseMs: number): FilterGraph {
  const filters: string[] = [];
  const labels: string[] = [];

  for (let i = 0; i < inputCount; i++) {
    const isLast = i === inputCount - 1;
    const pad = !isLast && pauseMs > 0 ? `,apad=pad_dur=${seconds(pauseMs)}` : '';
    filters.push(`[${i}:a]${normalizeSync}${pad}[p${i}]`);
    labels.push(`[p${i}]`);
  }
  filters.push(`${labels.join('')}concat=n=${inputCount}:v=0:a=1[out]`);

  return { filters, outputLabel: 'out' };
}

/** Output format implied by a file extension; mp3 when unknown. */
export function formatFromPath(filePath: string): AudioOutputFormat {
  const ext = path.extname(filePath).slice(1).toLowerCase();
  switch (ext) {
    case 'wav':
    case 'flac':
    case 'ogg':
      return ext;
    default:
      return 'mp3';
  }
}

class FFmpegService implements AudioEditor {
  /**
   * Get audio duration in seconds
   */
  async getAudioDuration(filePath: string): Promise<number> {
    return new Promise((resolve, reject) => {
      ffmpeg.ffprobe(filePath, (err, metadata) => {
        if (err) {
          reject(err);
        } else {
          resolve(metadata.format.duration || 0);
        }
      });
    });
  }

  /**
   * Write `inputPath` to `outputPath` with the removal intervals cut out.
   * Intervals must be sorted by start.
   */
  async spliceAudio(
    inputPath: string,
    outputPath: string,
    intervals: RemovalInterval[]
  ): Promise<string> {
    const durationMs = Math.round((await this.getAudioDuration(inputPath)) * 1000);
    const graph = buildSpliceFilterGraph(durationMs, intervals);
    if (!graph) {
      throw new Error('Removal intervals cover the whole recording');
    }

    logger.info('Splicing audio', {
      inputPath,
      outputPath,
      cuts: intervals.length,
      durationMs,
    });

    return this.runGraph([inputPath], graph, outputPath);
  }

  /**
   * Join audio files in order with a silent pause between consecutive files.
   */
  async concatWithPauses(inputPaths: string[], outputPath: string, pauseMs: number): Promise<string> {
    if (inputPaths.length === 0) throw new Error('concatWithPauses requires at least one input');

    logger.info('Concatenating audio', { files: inputPaths.length, pauseMs, outputPath });

    const graph = buildPausedConcatFilterGraph(inputPaths.length, pauseMs);
    return this.runGraph(inputPaths, graph, outputPath);
  }

  /**
   * Clean up temporary files
   */
  async cleanupFile(filePath: string): Promise<void> {
    try {
      if (fs.existsSync(filePath)) {
        await unlinkAsync(filePath);
        logger.info('Cleaned up file:', { filePath });
      }
    } catch (error: unknown) {
      const msg = error instanceof Error ? error.message : String(error);
      logger.error('Error cleaning up file: %s', msg);
    }
  }

  private runGraph(inputPaths: string[], graph: FilterGraph, outputPath: string): Promise<string> {
    return new Promise((resolve, reject) => {
      fs.mkdirSync(path.dirname(outputPath), { recursive: true });

      const command = ffmpeg();
      for (const inputPath of inputPaths) {
        command.input(inputPath);
      }
      command.complexFilter(graph.filters, graph.outputLabel);
      this.setOutputOptions(command, formatFromPath(outputPath));
      command.output(outputPath);

      command
        .on('end', () => {
          logger.info('FFmpeg job completed:', { outputPath });
          resolve(outputPath);
        })
        .on('error', (err: unknown) => {
          const msg = err instanceof Error ? err.message : String(err);
          logger.error('FFmpeg error: %s', msg);
          reject(new Error(`FFmpeg processing failed: ${msg}`));
        });

      command.run();
    });
  }

  /**
   * Set output options based on format
   */
  private setOutputOptions(command: ffmpeg.FfmpegCommand, format: AudioOutputFormat) {
    switch (format) {
      case 'wav':
        command.audioCodec('pcm_s16le').audioChannels(2).audioFrequency(SAMPLE_RATE);
        break;
      case 'flac':
        command.audioCodec('flac').audioChannels(2).audioFrequency(SAMPLE_RATE);
        break;
      case 'ogg':
        command.audioCodec('libvorbis').audioChannels(2).audioFrequency(SAMPLE_RATE);
        break;
      default:
        command.audioCodec('libmp3lame').audioBitrate('320k').audioChannels(2).audioFrequency(SAMPLE_RATE);
    }
  }
}

export default new FFmpegService();
