export const SPEECH_PROVIDER = Symbol('SPEECH_PROVIDER');

export interface SynthesisRequest {
  text: string;
  voiceId: string;
  gender: VoiceGender;
  signal: AbortSignal;
}

export interface SynthesizedAudio {
  audio: Buffer;
  contentType: string;
}

export type VoiceGender = 'female' | 'male';

export interface SpeechProvider {
  readonly name: string;
  synthesize(request: SynthesisRequest): Promise<SynthesizedAudio>;
}
