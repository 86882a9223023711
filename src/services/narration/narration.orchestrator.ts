import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { CHUNK_PAUSE_MS, MAX_CHUNK_LENGTH, PROMPT_OPTIONS } from '../../config/constants';
import { AppError } from '../../middleware/errorHandler';
import { PipelineEventRecorder } from '../../utils/pipeline-events';
import { assignVoicesToChunks } from './pipeline-chunker';
import type { VoiceInput } from '../voice/voice-binder';
import { catalogVoiceNames } from '../voice/voice-catalog';
import { getSystemPrompt } from '../prompt.service';
import documentTextService from '../documents/document-text.service';
import llmService from '../llm/llm.service';
import type { TextGenerator } from '../llm/llm.service';
import orpheusService from '../tts/orpheus.service';
import type { ISpeechSynthesizer } from '../tts/tts-provider.interface';
import ffmpegService from '../audio/ffmpeg.service';
import type {
  Chunk,
  PipelineEventListener,
  PipelineOutcome,
  VoiceId,
} from '../../types/narration.types';

export interface NarrationInput {
  /** Text to narrate; alternative to `documentPath` */
  text?: string;
  /** Plain-text document to narrate; alternative to `text` */
  documentPath?: string;
  /** LLM model, or `no_model` to narrate the text as-is */
  model: string;
  promptKey: string;
  customPrompt?: string;
  /** The user's voice, used for untagged text */
  voice: VoiceId;
  /** Voices available for tagged roles; the catalog when omitted */
  voices?: VoiceInput[];
  /** Stop after chunking */
  skipTts?: boolean;
  maxLength?: number;
}

export type NarrationStage = 'document' | 'llm' | 'chunking' | 'tts' | 'mixing' | 'completed';

export interface NarrationProgress {
  stage: NarrationStage;
  progress: number;
  message: string;
}

export interface NarrationHooks {
  onEvent?: PipelineEventListener;
  onProgress?: (progress: NarrationProgress) => void;
}

export interface NarrationResult {
  /** Text after the LLM step, tags included */
  script: string;
  chunks: Chunk[];
  /** Joined narration; null when TTS was skipped */
  audioPath: string | null;
  /** Indexes of chunks whose synthesis failed */
  failedChunks: number[];
}

/** What the narration workflow needs from the audio backend. */
export interface NarrationAudioJoiner {
  concatWithPauses(inputPaths: string[], outputPath: string, pauseMs: number): Promise<string>;
  cleanupFile(filePath: string): Promise<void>;
}

export interface DocumentReader {
  readDocument(filePath: string): Promise<string>;
}

export interface NarrationDependencies {
  documents: DocumentReader;
  llm: TextGenerator;
  tts: ISpeechSynthesizer;
  audio: NarrationAudioJoiner;
  promptOptions: Record<string, string>;
  outputDir: string;
  pauseMs: number;
}

/**
 * Document -> LLM -> voice-tagged chunks -> TTS -> one audio file.
 */
export class NarrationOrchestrator {
  constructor(private readonly deps: NarrationDependencies) {}

  async narrate(
    input: NarrationInput,
    hooks: NarrationHooks = {}
  ): Promise<PipelineOutcome<NarrationResult>> {
    const { model, promptKey, customPrompt, voice, skipTts = false, maxLength = MAX_CHUNK_LENGTH } = input;
    const events = new PipelineEventRecorder(hooks.onEvent, { workflow: 'narration' });
    const progress = (stage: NarrationStage, percent: number, message: string) =>
      hooks.onProgress?.({ stage, progress: percent, message });

    // Stage 1: source text
    progress('document', 0, 'Loading document...');
    const sourceText = await this.loadText(input);
    if (!sourceText.trim()) {
      throw new AppError('No document text to narrate', 400);
    }
    events.info(`Loaded ${sourceText.length} characters of document text.`);

    // Stage 2: LLM
    progress('llm', 10, 'Generating script...');
    const { prompt, status } = getSystemPrompt(promptKey, this.deps.promptOptions, customPrompt);
    events.info(status);
    const script = await this.deps.llm.generate({ model, systemPrompt: prompt, text: sourceText });
    events.info(`Script ready (${script.length} characters).`);

    // Stage 3: chunking
    progress('chunking', 30, 'Assigning voices...');
    const voices = input.voices && input.voices.length > 0 ? input.voices : catalogVoiceNames();
    const chunks = assignVoicesToChunks(script, voice, voices, maxLength);
    events.info(`Prepared ${chunks.length} chunks for TTS.`);

    const result: NarrationResult = { script, chunks, audioPath: null, failedChunks: [] };

    if (skipTts) {
      events.info('TTS skipped.');
      progress('completed', 100, 'Done');
      return { events: events.events, result };
    }
    if (chunks.length === 0) {
      throw new AppError('Nothing to narrate after removing tags', 400);
    }

    // Stage 4: TTS per chunk
    const audioPaths: string[] = [];
    for (const [index, chunk] of chunks.entries()) {
      const label = `${index + 1}/${chunks.length}`;
      progress('tts', 30 + Math.round((60 * index) / chunks.length), `Generating speech ${label}...`);
      events.info(`Generating audio for chunk ${label} with voice ${chunk.voice}.`);
      try {
        const { filePath } = await this.deps.tts.synthesizeToFile(chunk.text, chunk.voice);
        audioPaths.push(filePath);
      } catch (error: unknown) {
        const message = error instanceof Error ? error.message : String(error);
        result.failedChunks.push(index);
        events.warn(`Chunk ${label} failed (${chunk.voice}): ${message}. Skipping.`);
      }
    }

    if (audioPaths.length === 0) {
      events.error('Speech generation failed for every chunk.');
      throw new Error('Speech generation failed for every chunk');
    }

    // Stage 5: join and clean up
    progress('mixing', 90, 'Combining audio...');
    const outputPath = path.join(this.deps.outputDir, this.outputName(input.documentPath));
    try {
      result.audioPath = await this.deps.audio.concatWithPauses(audioPaths, outputPath, this.deps.pauseMs);
    } finally {
      for (const audioPath of audioPaths) {
        await this.deps.audio.cleanupFile(audioPath);
      }
    }
    events.info(`Narration saved to ${result.audioPath}`);

    progress('completed', 100, 'Done');
    return { events: events.events, result };
  }

  private async loadText(input: NarrationInput): Promise<string> {
    if (input.text !== undefined) return input.text;
    if (input.documentPath) return this.deps.documents.readDocument(input.documentPath);
    throw new AppError('Either text or documentPath is required', 400);
  }

  private outputName(documentPath?: string): string {
    const base = documentPath ? path.parse(documentPath).name : 'narration';
    return `${base}_${uuidv4().slice(0, 8)}.wav`;
  }
}

export default new NarrationOrchestrator({
  documents: documentTextService,
  llm: llmService,
  tts: orpheusService,
  audio: ffmpegService,
  promptOptions: PROMPT_OPTIONS,
  outputDir: path.resolve(process.cwd(), process.env.OUTPUT_DIR || 'output'),
  pauseMs: CHUNK_PAUSE_MS,
});
