import { Module } from '@nestjs/common';

import { CacheModule } from '../cache/cache.module';
import { RateLimitModule } from '../rate-limit/rate-limit.module';
import { UsageModule } from '../usage/usage.module';
import { AdminAuthGuard } from './admin-auth.guard';
import { ApiKeyAuthGuard } from './api-key-auth.guard';
import { ApiKeysService } from './api-keys.service';
import { ApiKeysAdminController } from './api-keys-admin.controller';

@Module({
  imports: [CacheModule, RateLimitModule, UsageModule],
  controllers: [ApiKeysAdminController],
  providers: [ApiKeysService, ApiKeyAuthGuard, AdminAuthGuard],
  exports: [ApiKeysService, ApiKeyAuthGuard],
})
export class ApiKeysModule {}
