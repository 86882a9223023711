import { MAX_CHUNK_LENGTH } from '../../config/constants';
import { segmentTaggedText } from '../../utils/tag-segmenter';
import { splitIntoChunks } from '../../utils/chunk-splitter';
import { bindVoices } from '../voice/voice-binder';
import type { BindVoicesOptions, VoiceInput } from '../voice/voice-binder';
import type { Chunk, ChunkSplitOptions, VoiceId } from '../../types/narration.types';

export interface AssignVoicesOptions extends BindVoicesOptions, ChunkSplitOptions {}

/**
 * Turn raw LLM output into the ordered list of TTS requests: find the role
 * tags, give each tag a voice, and cut every span down to `maxLength`.
 */
export function assignVoicesToChunks(
  text: string,
  userVoice: VoiceId,
  allVoices: readonly VoiceInput[],
  maxLength: number = MAX_CHUNK_LENGTH,
  options: AssignVoicesOptions = {}
): Chunk[] {
  const spans = segmentTaggedText(text);
  const bound = bindVoices(spans, userVoice, allVoices, options);

  return bound.flatMap((span) =>
    splitIntoChunks(span.text, maxLength, options)
      .filter((piece) => piece.length > 0)
      .map((piece) => ({ text: piece, voice: span.voice }))
  );
}
