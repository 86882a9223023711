// ===========================================================================
// Voice binding
//
// Gives every tag in a piece of LLM output its own voice. The first tag seen
// gets a female voice, the second a male one, and so on, always skipping the
// user's own voice, which is kept for untagged narration. A tag keeps its
// voice for the rest of the text.
//
// All state lives in a VoiceAllocator built for one call and dropped after it.
// ===========================================================================

import { tagKey } from '../../utils/tag-segmenter';
import { catalogGender } from './voice-catalog';
import type {
  BoundSpan,
  Tag,
  TaggedSpan,
  VoiceGender,
  VoiceId,
  VoiceOption,
} from '../../types/narration.types';

export type VoiceInput = VoiceId | VoiceOption;

export interface BindVoicesOptions {
  /** Gender for voices given by name only; defaults to the voice catalog */
  genderOf?: (voice: VoiceId) => VoiceGender | undefined;
}

type BucketName = 'female' | 'male';

/** Voices of one gender, handed out round-robin. */
class VoiceBucket {
  private cursor = 0;

  constructor(readonly voices: VoiceId[]) {}

  get isEmpty(): boolean {
    return this.voices.length === 0;
  }

  /** True while some voice of the bucket has not been handed out yet. */
  get hasFresh(): boolean {
    return this.cursor < this.voices.length;
  }

  next(): VoiceId {
    const voice = this.voices[this.cursor % this.voices.length];
    this.cursor++;
    return voice;
  }
}

/** Per-call voice pool and tag→voice bindings. */
export class VoiceAllocator {
  private readonly bindings = new Map<string, VoiceId>();
  private readonly buckets: Record<BucketName, VoiceBucket>;
  private newTagCount = 0;

  constructor(
    private readonly userVoice: VoiceId,
    allVoices: readonly VoiceInput[],
    options: BindVoicesOptions = {}
  ) {
    const genderOf = options.genderOf ?? catalogGender;
    const seen = new Set<string>([userVoice.toLowerCase()]);
    const female: VoiceId[] = [];
    const male: VoiceId[] = [];

    for (const entry of allVoices) {
      const name = typeof entry === 'string' ? entry : entry.name;
      const key = name.toLowerCase();
      if (seen.has(key)) continue;
      seen.add(key);

      const gender = (typeof entry === 'string' ? undefined : entry.gender) ?? genderOf(name);
      if (gender === 'female') {
        female.push(name);
      } else {
        male.push(name);
      }
    }

    this.buckets = { female: new VoiceBucket(female), male: new VoiceBucket(male) };
  }

  /** Voice for a span's tag; untagged text is read by the user's voice. */
  voiceFor(tag: Tag | null): VoiceId {
    if (tag === null) return this.userVoice;

    const key = tagKey(tag);
    const bound = this.bindings.get(key);
    if (bound !== undefined) return bound;

    const voice = this.allocate();
    this.bindings.set(key, voice);
    return voice;
  }

  /** Snapshot of the bindings made so far, keyed by tag key. */
  boundVoices(): Record<string, VoiceId> {
    return Object.fromEntries(this.bindings);
  }

  private allocate(): VoiceId {
    const preferredName: BucketName = this.newTagCount % 2 === 0 ? 'female' : 'male';
    const otherName: BucketName = preferredName === 'female' ? 'male' : 'female';
    this.newTagCount++;

    const preferred = this.buckets[preferredName];
    const other = this.buckets[otherName];

    if (preferred.hasFresh) return preferred.next();
    if (other.hasFresh) return other.next();
    if (!preferred.isEmpty) return preferred.next();
    if (!other.isEmpty) return other.next();
    return this.userVoice;
  }
}

/**
 * Attach a voice to every span, in order. Span text is trimmed; the tag is
 * kept alongside for callers that want to report it.
 */
export function bindVoices(
  spans: readonly TaggedSpan[],
  userVoice: VoiceId,
  allVoices: readonly VoiceInput[],
  options: BindVoicesOptions = {}
): BoundSpan[] {
  const allocator = new VoiceAllocator(userVoice, allVoices, options);
  return spans.map((span) => ({
    tag: span.tag,
    text: span.text.trim(),
    voice: allocator.voiceFor(span.tag),
  }));
}
