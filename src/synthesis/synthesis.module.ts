import { Logger, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import { CacheModule } from '../cache/cache.module';
import { HttpClientModule } from '../http-client/http-client.module';
import { RemoteSpeechProvider } from './remote-speech.provider';
import { SPEECH_PROVIDER, SpeechProvider } from './speech-provider';
import { SpeechSynthesisService } from './speech-synthesis.service';
import { ToneSpeechProvider } from './tone-speech.provider';

@Module({
  imports: [CacheModule, HttpClientModule],
  providers: [
    RemoteSpeechProvider,
    ToneSpeechProvider,
    {
      provide: SPEECH_PROVIDER,
      inject: [ConfigService, RemoteSpeechProvider, ToneSpeechProvider],
      useFactory: (
        configService: ConfigService,
        remote: RemoteSpeechProvider,
        tone: ToneSpeechProvider,
      ): SpeechProvider => {
        const logger = new Logger('SynthesisModule');
        const configured = configService.get<string>('SYNTHESIS_PROVIDER') ?? 'remote';
        const provider = configured === 'tone' ? tone : remote;
        logger.log(`Speech provider: ${provider.name}`);
        return provider;
      },
    },
    SpeechSynthesisService,
  ],
  exports: [SpeechSynthesisService],
})
export class SynthesisModule {}
