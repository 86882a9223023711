import type { VoiceGender, VoiceOption } from '../../types/narration.types';

/** Voices served by the Orpheus TTS server. */
export const VOICE_CATALOG: readonly VoiceOption[] = [
  { name: 'Tara', gender: 'female', description: 'Female, English, conversational, clear' },
  { name: 'Leah', gender: 'female', description: 'Female, English, warm, gentle' },
  { name: 'Jess', gender: 'female', description: 'Female, English, energetic, youthful' },
  { name: 'Leo', gender: 'male', description: 'Male, English, authoritative, deep' },
  { name: 'Dan', gender: 'male', description: 'Male, English, friendly, casual' },
  { name: 'Mia', gender: 'female', description: 'Female, English, professional, articulate' },
  { name: 'Zac', gender: 'male', description: 'Male, English, enthusiastic, dynamic' },
  { name: 'Zoe', gender: 'female', description: 'Female, English, calm, soothing' },
];

export const DEFAULT_VOICE = 'Tara';

export function findCatalogVoice(name: string): VoiceOption | undefined {
  const wanted = name.toLowerCase();
  return VOICE_CATALOG.find((voice) => voice.name.toLowerCase() === wanted);
}

/** Gender of a catalog voice, or undefined for voices the catalog doesn't list. */
export function catalogGender(name: string): VoiceGender | undefined {
  return findCatalogVoice(name)?.gender;
}

export function catalogVoiceNames(): string[] {
  return VOICE_CATALOG.map((voice) => voice.name);
}
