import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';

import { ApiKeysModule } from './api-keys/api-keys.module';
import { CacheModule } from './cache/cache.module';
import { envValidationSchema } from './config/env.validation';
import { GatewayModule } from './gateway/gateway.module';
import { HealthModule } from './health/health.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ['.env'],
      cache: true,
      validationSchema: envValidationSchema,
      validationOptions: {
        abortEarly: false,
      },
    }),
    CacheModule,
    HealthModule,
    ApiKeysModule,
    GatewayModule,
  ],
})
export class AppModule {}
