import { Module } from '@nestjs/common';
import { CryptoModule } from '@cloudmedia/common/crypto';
import { JwtModule } from '@cloudmedia/common/jwt';
import { MetadataModule } from '../metadata/metadata.module';
import { AuthController } from './auth.controller';
import { AuthService } from './auth.service';
import { JwtAuthGuard } from './guards/jwt-auth.guard';

@Module({
  imports: [CryptoModule, JwtModule, MetadataModule],
  controllers: [AuthController],
  providers: [AuthService, JwtAuthGuard],
  exports: [JwtModule, JwtAuthGuard],
})
export class AuthModule {}
