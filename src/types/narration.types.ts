/**
 * Types for tag segmentation, voice binding and chunking of narration text.
 */

export type VoiceId = string;

export type VoiceGender = 'male' | 'female' | 'neutral';

/** A voice offered by the TTS server. */
export interface VoiceOption {
  name: VoiceId;
  gender?: VoiceGender;
  /** Short human-readable description */
  description?: string;
}

/** Role marker found in LLM output: `<AI Summary>` or `<SPEAKER n>`. */
export type Tag = { kind: 'ai-summary' } | { kind: 'speaker'; index: number };

/** Text attributed to one tag; `tag: null` is narration in the user's voice. */
export interface TaggedSpan {
  tag: Tag | null;
  text: string;
}

/** A span after voice assignment, tag markers removed. */
export interface BoundSpan {
  tag: Tag | null;
  text: string;
  voice: VoiceId;
}

/** Unit of text handed to TTS. */
export interface Chunk {
  text: string;
  voice: VoiceId;
}

export interface ChunkSplitOptions {
  /**
   * How far past the length limit to look for a sentence end before falling
   * back to a hard cut. Unlimited when omitted.
   */
  maxLookahead?: number;
}

// ---------------------------------------------------------------------------
// Workflow results
// ---------------------------------------------------------------------------

export type PipelineEventLevel = 'info' | 'warn' | 'error';

/** Progress or diagnostic message produced by a workflow. */
export interface PipelineEvent {
  level: PipelineEventLevel;
  message: string;
}

/** Final value of a workflow together with everything it reported. */
export interface PipelineOutcome<T> {
  events: PipelineEvent[];
  result: T;
}

export type PipelineEventListener = (event: PipelineEvent) => void;
