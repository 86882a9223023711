import axios from 'axios';
import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { logger } from '../../config/logger';
import { errorDetails, upstreamError } from '../../utils/http-error';
import type { Word } from '../../types/transcript.types';

const WordSchema = z.object({
  word: z.string(),
  start: z.number(),
  end: z.number(),
});

const TranscriptionSchema = z.object({
  text: z.string().nullish(),
  words: z.array(WordSchema).nullish(),
  segments: z
    .array(
      z.object({
        words: z.array(WordSchema).nullish(),
      })
    )
    .nullish(),
});

/** What the deduplication workflow needs from a speech recognizer. */
export interface WordTranscriber {
  /** Words of the recording at `filePath`, in order, timed in seconds */
  transcribeWords(filePath: string): Promise<Word[]>;
}

/**
 * Word timings of a verbose_json transcription. Servers return them either at
 * the top level or per segment; the top-level list wins when both are present.
 */
export function parseTranscriptionWords(body: unknown): Word[] {
  const parsed = TranscriptionSchema.safeParse(body);
  if (!parsed.success) {
    throw new Error(
      `Unexpected transcription response: ${parsed.error.issues.map((i) => i.message).join('; ')}`
    );
  }

  const raw =
    parsed.data.words ?? (parsed.data.segments ?? []).flatMap((segment) => segment.words ?? []);

  return raw.map((w) => ({ text: w.word, start: w.start, end: Math.max(w.start, w.end) }));
}

class WhisperService implements WordTranscriber {
  private apiUrl: string;
  private apiKey: string;
  private model: string;

  constructor() {
    this.apiUrl = process.env.TRANSCRIBE_API_URL || 'http://localhost:8000/v1/audio/transcriptions';
    this.apiKey = process.env.TRANSCRIBE_API_KEY || '';
    this.model = process.env.WHISPER_MODEL || 'base.en';
  }

  /**
   * Transcribe an audio file with word-level timestamps
   */
  async transcribeWords(filePath: string): Promise<Word[]> {
    const form = new FormData();
    form.append('file', new Blob([fs.readFileSync(filePath)]), path.basename(filePath));
    form.append('model', this.model);
    form.append('response_format', 'verbose_json');
    form.append('timestamp_granularities[]', 'word');

    logger.info(`Transcribing ${filePath} with word-level timestamps`, { model: this.model });

    let body: unknown;
    try {
      const response = await axios.post<unknown>(this.apiUrl, form, {
        headers: this.apiKey ? { Authorization: `Bearer ${this.apiKey}` } : {},
        timeout: 600000,
        maxBodyLength: Infinity,
      });
      body = response.data;
    } catch (error: unknown) {
      logger.error('Error transcribing audio', { ...errorDetails(error), filePath });
      throw upstreamError('Transcription', 'transcribe audio', error);
    }

    const words = parseTranscriptionWords(body);
    logger.info('Transcription complete', { filePath, words: words.length });
    return words;
  }
}

export { WhisperService };
export default new WhisperService();
