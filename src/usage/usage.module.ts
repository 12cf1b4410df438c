import { Module } from '@nestjs/common';

import { CacheModule } from '../cache/cache.module';
import { UsageLedgerService } from './usage-ledger.service';

@Module({
  imports: [CacheModule],
  providers: [UsageLedgerService],
  exports: [UsageLedgerService],
})
export class UsageModule {}
