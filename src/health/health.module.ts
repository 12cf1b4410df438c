import { Module } from '@nestjs/common';

import { CacheModule } from '../cache/cache.module';
import { SynthesisModule } from '../synthesis/synthesis.module';
import { HealthController } from './health.controller';

@Module({
  imports: [CacheModule, SynthesisModule],
  controllers: [HealthController],
})
export class HealthModule {}
