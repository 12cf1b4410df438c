import { CacheModule as NestCacheModule } from '@nestjs/cache-manager';
import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import { createStorageStore } from './cache-store';
import { CacheService } from './cache.service';

@Module({
  imports: [
    NestCacheModule.registerAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => createStorageStore(configService),
    }),
  ],
  providers: [CacheService],
  exports: [CacheService],
})
export class CacheModule {}
