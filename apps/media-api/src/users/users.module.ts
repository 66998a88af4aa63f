import { Module } from '@nestjs/common';
import { CryptoModule } from '@cloudmedia/common/crypto';
import { MetadataModule } from '../metadata/metadata.module';
import { UsersService } from './users.service';

@Module({
  imports: [CryptoModule, MetadataModule],
  providers: [UsersService],
  exports: [UsersService],
})
export class UsersModule {}
