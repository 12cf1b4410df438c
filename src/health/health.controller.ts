import { Controller, Get } from '@nestjs/common';

import { CacheService } from '../cache/cache.service';
import { SpeechSynthesisService } from '../synthesis/speech-synthesis.service';

type LivenessReport = {
  status: 'ok';
  synthesisProvider: string;
};

@Controller('health')
export class HealthController {
  constructor(
    private readonly cacheService: CacheService,
    private readonly synthesisService: SpeechSynthesisService,
  ) {}

  @Get()
  getHealth(): LivenessReport {
    return { status: 'ok', synthesisProvider: this.synthesisService.providerName };
  }

  // Keys, counters and the ledger all live in Redis, so this doubles as the storage check.
  @Get('cache')
  async getCacheHealth(): Promise<{ status: 'ok' | 'degraded'; message?: string }> {
    const result = await this.cacheService.checkHealth();
    return { status: result.status, message: result.message };
  }
}
