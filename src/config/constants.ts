import path from 'path';

/** Longest text (in characters) sent to TTS in one request. */
export const MAX_CHUNK_LENGTH = 750;

/** Adjacent-repeat detection defaults. */
export const REPEAT_DETECTION_DEFAULTS = {
  minWords: 1,
  maxPhraseLen: 20,
  maxGapMs: 2000,
} as const;

/** Largest `maxPhraseLen` a request may ask for. */
export const MAX_PHRASE_LEN_LIMIT = 200;

/** Silence inserted between narrated chunks when they are joined. */
export const CHUNK_PAUSE_MS = 1000;

/** Files smaller than this are rejected before transcription. */
export const MIN_AUDIO_FILE_BYTES = 1024;

/** Audio shorter than this is rejected before transcription. */
export const MIN_AUDIO_DURATION_SECONDS = 0.5;

/** Model name that skips the LLM and narrates the document text as-is. */
export const NO_MODEL = 'no_model';

/** Prompt key that takes the prompt text from the request instead of a file. */
export const CUSTOM_PROMPT_KEY = '__custom__';

/** Values substituted into `{{Name}}` placeholders of system prompts. */
export const USER_CONSTANTS: Record<string, string> = {
  Username: process.env.PROMPT_USERNAME || 'Deponent',
};

export const PROMPTS_DIR = path.join(__dirname, '../../prompts');

/** Built-in system prompts, keyed by the name clients send. */
export const PROMPT_OPTIONS: Record<string, string> = {
  summary: path.join(PROMPTS_DIR, 'summary.txt'),
  dialogue: path.join(PROMPTS_DIR, 'dialogue.txt'),
  narration: path.join(PROMPTS_DIR, 'narration.txt'),
};
