import { Injectable } from '@nestjs/common';

import { HttpClientService } from '../http-client/http-client.service';
import { SpeechProvider, SynthesisRequest, SynthesizedAudio } from './speech-provider';

/**
 * Calls the HTTP synthesis engine. The engine picks its neural voice from the
 * requested gender and answers with raw audio.
 */
@Injectable()
export class RemoteSpeechProvider implements SpeechProvider {
  readonly name = 'remote';

  constructor(private readonly httpClient: HttpClientService) {}

  async synthesize(request: SynthesisRequest): Promise<SynthesizedAudio> {
    const response = await this.httpClient.postForBinary(
      '/tts',
      { text: request.text, voice: request.gender },
      { signal: request.signal },
    );

    const contentType = response.contentType?.split(';')[0].trim().toLowerCase() ?? '';
    if (!contentType.startsWith('audio/')) {
      throw new Error(`Engine answered with unexpected content type "${contentType || 'none'}"`);
    }
    if (response.body.length === 0) {
      throw new Error('Engine answered with an empty body');
    }

    return { audio: response.body, contentType };
  }
}
