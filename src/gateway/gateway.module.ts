import { Module } from '@nestjs/common';

import { ApiKeysModule } from '../api-keys/api-keys.module';
import { RateLimitModule } from '../rate-limit/rate-limit.module';
import { SynthesisModule } from '../synthesis/synthesis.module';
import { UsageModule } from '../usage/usage.module';
import { GatewayController } from './gateway.controller';
import { GatewayService } from './gateway.service';

@Module({
  imports: [ApiKeysModule, RateLimitModule, SynthesisModule, UsageModule],
  controllers: [GatewayController],
  providers: [GatewayService],
})
export class GatewayModule {}
