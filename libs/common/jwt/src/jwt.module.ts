/**
 * Cloud Media JWT Module
 * Provides session token issuing/verification
 */

import { Module } from '@nestjs/common';
import { JwtModule as NestJwtModule } from '@nestjs/jwt';
import { ConfigModule, ConfigService } from '@nestjs/config';
import type { AppConfig } from '@cloudmedia/common/config';
import { JwtService } from './jwt.service';

@Module({
  imports: [
    ConfigModule,
    NestJwtModule.registerAsync({
      imports: [ConfigModule],
      inject: [ConfigService],
      useFactory: (config: ConfigService<AppConfig, true>) => {
        const secret = config.get('jwtSecret', { infer: true });

        if (!secret) {
          throw new Error('JWT secret is required. Set JWT_SECRET in environment');
        }

        return {
          secret,
          // exp is always set explicitly in the claims
          signOptions: {
            algorithm: config.get('jwtAlgorithm', { infer: true }),
          },
        };
      },
    }),
  ],
  providers: [JwtService],
  exports: [JwtService],
})
export class JwtModule {}
