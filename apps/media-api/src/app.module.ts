/**
 * Media API - App Module
 */

import { Module } from '@nestjs/common';
import { ClockModule } from '@cloudmedia/common/clock';
import { CloudMediaConfigModule } from '@cloudmedia/common/config';
import { AuthModule } from './auth/auth.module';
import { HealthController } from './health.controller';
import { MediaModule } from './media/media.module';
import { MetadataModule } from './metadata/metadata.module';

@Module({
  imports: [CloudMediaConfigModule, ClockModule, MetadataModule, AuthModule, MediaModule],
  controllers: [HealthController],
})
export class AppModule {}
