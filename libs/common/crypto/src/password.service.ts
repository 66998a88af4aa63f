/**
 * Cloud Media Password Service
 * Argon2id password hashing with configurable cost
 */

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as argon2 from 'argon2';
import type { AppConfig } from '@cloudmedia/common/config';
import { describeError } from '@cloudmedia/common/errors';

export const ARGON2ID_PREFIX = '$argon2id$';

@Injectable()
export class PasswordService {
  private readonly logger = new Logger(PasswordService.name);
  private readonly timeCost: number;
  private readonly memoryCost: number;

  constructor(configService: ConfigService<AppConfig, true>) {
    this.timeCost = configService.get('passwordTimeCost', { infer: true });
    this.memoryCost = configService.get('passwordMemoryCost', { infer: true });
  }

  /**
   * Hash password using Argon2id
   * - salt: argon2's default, 16 random bytes per call
   * - hash_length: 32
   * - time/memory cost from PASSWORD_TIME_COST / PASSWORD_MEMORY_COST
   */
  async hash(password: string): Promise<string> {
    try {
      return await argon2.hash(password, {
        type: argon2.argon2id,
        timeCost: this.timeCost,
        memoryCost: this.memoryCost,
        parallelism: 1,
        hashLength: 32,
      });
    } catch (error) {
      this.logger.error(`Password hashing failed: ${describeError(error)}`);
      throw new Error('Password hashing failed');
    }
  }

  /**
   * Verify password against an encoded Argon2 hash.
   * Malformed hashes verify as false.
   */
  async verify(hash: string, password: string): Promise<boolean> {
    if (!hash.startsWith('$argon2')) {
      this.logger.warn('Password verification skipped: hash is not an argon2 encoding');
      return false;
    }

    try {
      return await argon2.verify(hash, password);
    } catch (error) {
      this.logger.error(`Password verification failed: ${describeError(error)}`);
      return false;
    }
  }
}
