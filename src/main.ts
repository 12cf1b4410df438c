import 'reflect-metadata';

import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { FastifyAdapter, NestFastifyApplication } from '@nestjs/platform-fastify';

import { AppModule } from './app.module';

const DEFAULT_BODY_LIMIT = 65536;

async function bootstrap(): Promise<void> {
  const rawBodyLimit = Number(process.env.REQUEST_BODY_LIMIT ?? DEFAULT_BODY_LIMIT);
  const bodyLimit =
    Number.isInteger(rawBodyLimit) && rawBodyLimit >= 1024 ? rawBodyLimit : DEFAULT_BODY_LIMIT;
  const adapter = new FastifyAdapter({
    logger: {
      level: process.env.LOG_LEVEL ?? 'info',
    },
    bodyLimit,
  });

  const app = await NestFactory.create<NestFastifyApplication>(AppModule, adapter, {
    logger: new Logger(),
  });
  app.enableShutdownHooks();

  const configService = app.get(ConfigService);
  const port = Number(configService.get('PORT') ?? 3000);

  await app.listen(port, '0.0.0.0');
  Logger.log(`Speech gateway listening on port ${port}`, 'Bootstrap');
}

bootstrap().catch((error: unknown) => {
  Logger.error(
    `Startup failed: ${error instanceof Error ? error.message : String(error)}`,
    'Bootstrap',
  );
  process.exit(1);
});
