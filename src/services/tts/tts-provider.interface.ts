// ===========================================================================
// TTS Abstraction
//
// The narration workflow only needs "text + voice in, audio file out", so
// any speech server can sit behind this interface. Orpheus is the one
// shipped; tests use an in-process fake.
// ===========================================================================

import type { VoiceId } from '../../types/narration.types';

/** Download progress of one synthesis request, 0-100. */
export type SynthesisProgressCallback = (percent: number) => void;

export interface SynthesisOptions {
  /** Speed multiplier (1.0 = normal) */
  speed?: number;
  onProgress?: SynthesisProgressCallback;
}

/** Result of synthesizing one chunk. */
export interface SynthesisResult {
  /** Where the audio was written */
  filePath: string;
  /** Size of the audio in bytes */
  bytes: number;
  voice: VoiceId;
}

/**
 * Interface that every TTS backend must implement.
 */
export interface ISpeechSynthesizer {
  /** Backend identifier, used in logs */
  readonly provider: string;

  /** Whether the backend is configured and ready */
  isConfigured(): boolean;

  /** Synthesize `text` with `voice` and write it to a new file */
  synthesizeToFile(text: string, voice: VoiceId, options?: SynthesisOptions): Promise<SynthesisResult>;
}
