import { Injectable } from '@nestjs/common';

import { SpeechProvider, SynthesisRequest, SynthesizedAudio, VoiceGender } from './speech-provider';

const SAMPLE_RATE = 16_000;
const SECONDS_PER_CHARACTER = 0.08;
const MIN_SECONDS = 0.5;
const MAX_SECONDS = 10;
const AMPLITUDE = 0.3 * 0x7fff;
const WAV_HEADER_BYTES = 44;

const FREQUENCY_BY_GENDER: Record<VoiceGender, number> = {
  female: 440,
  male: 220,
};

/** Offline provider for local runs without an engine: a sine tone whose length follows the text. */
@Injectable()
export class ToneSpeechProvider implements SpeechProvider {
  readonly name = 'tone';

  async synthesize(request: SynthesisRequest): Promise<SynthesizedAudio> {
    if (request.signal.aborted) {
      throw new Error('Synthesis aborted');
    }

    const seconds = Math.min(
      MAX_SECONDS,
      Math.max(MIN_SECONDS, request.text.length * SECONDS_PER_CHARACTER),
    );
    const sampleCount = Math.round(seconds * SAMPLE_RATE);
    const frequency = FREQUENCY_BY_GENDER[request.gender];

    return { audio: encodeWav(sampleCount, frequency), contentType: 'audio/wav' };
  }
}

// 16-bit mono PCM in a RIFF/WAVE container.
export function encodeWav(sampleCount: number, frequency: number): Buffer {
  const dataBytes = sampleCount * 2;
  const buffer = Buffer.alloc(WAV_HEADER_BYTES + dataBytes);

  buffer.write('RIFF', 0, 'ascii');
  buffer.writeUInt32LE(36 + dataBytes, 4);
  buffer.write('WAVE', 8, 'ascii');
  buffer.write('fmt ', 12, 'ascii');
  buffer.writeUInt32LE(16, 16);
  buffer.writeUInt16LE(1, 20);
  buffer.writeUInt16LE(1, 22);
  buffer.writeUInt32LE(SAMPLE_RATE, 24);
  buffer.writeUInt32LE(SAMPLE_RATE * 2, 28);
  buffer.writeUInt16LE(2, 32);
  buffer.writeUInt16LE(16, 34);
  buffer.write('data', 36, 'ascii');
  buffer.writeUInt32LE(dataBytes, 40);

  for (let i = 0; i < sampleCount; i += 1) {
    const sample = Math.round(AMPLITUDE * Math.sin((2 * Math.PI * frequency * i) / SAMPLE_RATE));
    buffer.writeInt16LE(sample, WAV_HEADER_BYTES + i * 2);
  }

  return buffer;
}
