import type { VoiceOption } from './narration.types';

/** Payload of a `narration` job; mirrors the POST /api/narration body. */
export interface NarrationJobData {
  text?: string;
  documentPath?: string;
  model: string;
  promptKey: string;
  customPrompt?: string;
  voice: string;
  voices?: (string | VoiceOption)[];
  skipTts?: boolean;
  maxLength?: number;
}

/** Payload of an `audio-deduplication` job. */
export interface DeduplicationJobData {
  /** Uploaded audio on local disk */
  inputPath: string;
  originalName?: string;
  minWords?: number;
  maxPhraseLen?: number;
  maxGapMs?: number;
}
