import { describe, it, expect } from 'vitest';
import { bindVoices, VoiceAllocator } from './voice-binder';
import { catalogVoiceNames } from './voice-catalog';
import type { TaggedSpan } from '../../types/narration.types';

const speaker = (index: number, text: string): TaggedSpan => ({
  tag: { kind: 'speaker', index },
  text,
});

describe('bindVoices', () => {
  it('gives the first tag a female voice and the second a male one', () => {
    const spans = [speaker(1, 'Hello there.'), speaker(2, 'Hi back.')];

    expect(bindVoices(spans, 'Tara', ['Tara', 'Leo', 'Mia'])).toEqual([
      { tag: { kind: 'speaker', index: 1 }, text: 'Hello there.', voice: 'Mia' },
      { tag: { kind: 'speaker', index: 2 }, text: 'Hi back.', voice: 'Leo' },
    ]);
  });

  it('reads untagged text with the user voice', () => {
    const spans: TaggedSpan[] = [{ tag: null, text: '  Plain narration. ' }];

    expect(bindVoices(spans, 'Tara', catalogVoiceNames())).toEqual([
      { tag: null, text: 'Plain narration.', voice: 'Tara' },
    ]);
  });

  it('keeps a voice for a tag once it is bound', () => {
    const spans = [speaker(1, 'a'), speaker(2, 'b'), speaker(1, 'c'), speaker(2, 'd')];

    const voices = bindVoices(spans, 'Tara', catalogVoiceNames()).map((s) => s.voice);

    expect(voices).toEqual(['Leah', 'Leo', 'Leah', 'Leo']);
  });

  it('alternates buckets and walks each bucket in catalog order', () => {
    const spans = [1, 2, 3, 4, 5].map((n) => speaker(n, `line ${n}`));

    const voices = bindVoices(spans, 'Tara', catalogVoiceNames()).map((s) => s.voice);

    expect(voices).toEqual(['Leah', 'Leo', 'Jess', 'Dan', 'Mia']);
  });

  it('falls back to the other bucket once the preferred one is used up', () => {
    const spans = [1, 2, 3].map((n) => speaker(n, `line ${n}`));

    const voices = bindVoices(spans, 'Tara', ['Leo', 'Dan', 'Zac']).map((s) => s.voice);

    expect(voices).toEqual(['Leo', 'Dan', 'Zac']);
  });

  it('reuses voices round-robin when every voice has been handed out', () => {
    const spans = [1, 2, 3, 4].map((n) => speaker(n, `line ${n}`));

    const voices = bindVoices(spans, 'Tara', ['Mia', 'Leo']).map((s) => s.voice);

    expect(voices).toEqual(['Mia', 'Leo', 'Mia', 'Leo']);
  });

  it('uses the user voice for every tag when no other voice exists', () => {
    const spans = [speaker(1, 'a'), { tag: { kind: 'ai-summary' as const }, text: 'b' }];

    const voices = bindVoices(spans, 'Tara', ['tara']).map((s) => s.voice);

    expect(voices).toEqual(['Tara', 'Tara']);
  });

  it('takes gender from voice records and the genderOf option', () => {
    const spans = [speaker(1, 'a'), speaker(2, 'b')];

    expect(
      bindVoices(spans, 'Narrator', [
        { name: 'Bass', gender: 'male' },
        { name: 'Alto', gender: 'female' },
      ]).map((s) => s.voice)
    ).toEqual(['Alto', 'Bass']);

    expect(
      bindVoices(spans, 'Narrator', ['Bass', 'Alto'], {
        genderOf: (voice) => (voice === 'Alto' ? 'female' : 'male'),
      }).map((s) => s.voice)
    ).toEqual(['Alto', 'Bass']);
  });

  it('puts voices of unknown gender in the male bucket', () => {
    const spans = [speaker(1, 'a'), speaker(2, 'b')];

    expect(bindVoices(spans, 'Tara', ['Robot', 'Zoe']).map((s) => s.voice)).toEqual([
      'Zoe',
      'Robot',
    ]);
  });

  it('starts from scratch on every call', () => {
    const spans = [speaker(7, 'x')];

    const first = bindVoices(spans, 'Tara', catalogVoiceNames());
    const second = bindVoices(spans, 'Tara', catalogVoiceNames());

    expect(first).toEqual(second);
    expect(second[0].voice).toBe('Leah');
  });
});

describe('VoiceAllocator', () => {
  it('reports bindings by tag key', () => {
    const allocator = new VoiceAllocator('Tara', catalogVoiceNames());

    allocator.voiceFor({ kind: 'ai-summary' });
    allocator.voiceFor({ kind: 'speaker', index: 3 });
    allocator.voiceFor(null);

    expect(allocator.boundVoices()).toEqual({ AI_SUMMARY: 'Leah', SPEAKER_3: 'Leo' });
  });
});
