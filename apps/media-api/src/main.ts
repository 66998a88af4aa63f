/**
 * Media API
 * Main entry point; listens on API_HOST:API_PORT (default 0.0.0.0:8000)
 */

import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import type { AppConfig } from '@cloudmedia/common/config';
import { AppModule } from './app.module';
import { configureApp } from './bootstrap';
import { MetadataSchemaService } from './metadata/metadata-schema.service';

async function bootstrap() {
  const logger = new Logger('Media API');
  const app = await NestFactory.create(AppModule);
  app.enableShutdownHooks();

  configureApp(app);

  await app.get(MetadataSchemaService).initialize();

  const config = app.get<ConfigService<AppConfig, true>>(ConfigService);
  const host = config.get('apiHost', { infer: true });
  const port = config.get('apiPort', { infer: true });
  await app.listen(port, host);

  logger.log(`Media API listening on ${host}:${port}`);
}

bootstrap().catch((error: unknown) => {
  const logger = new Logger('Bootstrap');
  logger.error('Failed to start Media API', error instanceof Error ? error.stack : String(error));
  process.exit(1);
});
