import type { VoiceGender } from './speech-provider';

export type Voice = {
  id: string;
  name: string;
  description: string;
  gender: VoiceGender;
  language: string;
  useCase: string;
  premium: boolean;
};

export const DEFAULT_VOICE_ID = 'lexi_whatsapp';

export const VOICES: readonly Voice[] = [
  {
    id: 'lexi_whatsapp',
    name: 'Lexi - WhatsApp Voice',
    description: 'Casual voice for short voice messages',
    gender: 'female',
    language: 'en-ng',
    useCase: 'social',
    premium: false,
  },
  {
    id: 'ada_business',
    name: 'Ada - Business Professional',
    description: 'Measured voice for business announcements',
    gender: 'female',
    language: 'en-ng',
    useCase: 'business',
    premium: true,
  },
  {
    id: 'kemi_academic',
    name: 'Kemi - Academic Expert',
    description: 'Clear voice for lectures and course material',
    gender: 'female',
    language: 'en-ng',
    useCase: 'education',
    premium: true,
  },
  {
    id: 'emeka_tech',
    name: 'Emeka - Tech Leader',
    description: 'Energetic voice for product walkthroughs',
    gender: 'male',
    language: 'en-ng',
    useCase: 'technology',
    premium: false,
  },
  {
    id: 'folake_legal',
    name: 'Folake - Legal Expert',
    description: 'Formal voice for notices and contracts',
    gender: 'female',
    language: 'en-ng',
    useCase: 'legal',
    premium: true,
  },
  {
    id: 'chidi_narrator',
    name: 'Chidi - Storyteller',
    description: 'Warm voice for narration',
    gender: 'male',
    language: 'en-ng',
    useCase: 'entertainment',
    premium: false,
  },
];

export function findVoice(voiceId: string): Voice | undefined {
  return VOICES.find((voice) => voice.id === voiceId);
}
