import { Module } from '@nestjs/common';
import { ClockModule } from '@cloudmedia/common/clock';
import { CloudMediaConfigModule } from '@cloudmedia/common/config';
import { MetadataModule } from '../../media-api/src/metadata/metadata.module';
import { UsersModule } from '../../media-api/src/users/users.module';

@Module({
  imports: [CloudMediaConfigModule, ClockModule, MetadataModule, UsersModule],
})
export class AdminModule {}
