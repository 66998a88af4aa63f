/**
 * Cloud Media Crypto Module
 * Provides password hashing and URL signing services
 */

import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { PasswordService } from './password.service';
import { UrlSignerService } from './url-signer.service';

@Module({
  imports: [ConfigModule],
  providers: [PasswordService, UrlSignerService],
  exports: [PasswordService, UrlSignerService],
})
export class CryptoModule {}
