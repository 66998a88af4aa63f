import { INestApplication, ValidationPipe } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { AppConfig } from '@cloudmedia/common/config';
import { MediaPlatformErrorFilter } from '@cloudmedia/common/errors';

/**
 * Global filter, validation, CORS and the /api prefix; shared by main.ts and the e2e specs
 */
export function configureApp(app: INestApplication): void {
  const config = app.get<ConfigService<AppConfig, true>>(ConfigService);

  app.useGlobalFilters(new MediaPlatformErrorFilter(config.get('nodeEnv', { infer: true }) !== 'production'));

  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
    }),
  );

  app.enableCors({
    origin: config.get('allowedOrigins', { infer: true }),
    credentials: true,
  });

  app.setGlobalPrefix('api');
}
