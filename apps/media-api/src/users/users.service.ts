/**
 * Users Service
 * Password-hash audit and repair for the admin CLI
 */

import { Injectable, Logger } from '@nestjs/common';
import { ARGON2ID_PREFIX, PasswordService } from '@cloudmedia/common/crypto';
import { ERRORS } from '@cloudmedia/common/errors';
import { normalizeEmail } from '../auth/auth.service';
import { UsersRepository } from '../metadata/users.repository';

export const MAX_PASSWORD_HASH_LENGTH = 200;

export type PasswordHashVerdict = 'ok' | 'empty' | 'too long' | 'unexpected format';

export interface UserAuditEntry {
  id: string;
  username: string;
  email: string;
  createdAt: Date;
  hashLength: number;
  verdict: PasswordHashVerdict;
}

export function auditPasswordHash(passwordHash: string): PasswordHashVerdict {
  if (passwordHash.length === 0) {
    return 'empty';
  }
  if (passwordHash.length > MAX_PASSWORD_HASH_LENGTH) {
    return 'too long';
  }
  if (!passwordHash.startsWith(ARGON2ID_PREFIX)) {
    return 'unexpected format';
  }
  return 'ok';
}

@Injectable()
export class UsersService {
  private readonly logger = new Logger(UsersService.name);

  constructor(
    private usersRepository: UsersRepository,
    private passwordService: PasswordService,
  ) {}

  async auditPasswordHashes(): Promise<UserAuditEntry[]> {
    const users = await this.usersRepository.listAll();

    return users.map((user) => ({
      id: user.id,
      username: user.username,
      email: user.email,
      createdAt: user.createdAt,
      hashLength: user.passwordHash.length,
      verdict: auditPasswordHash(user.passwordHash),
    }));
  }

  /**
   * Re-hash and store a new password. Throws ValidationError for an unknown email.
   */
  async resetPassword(email: string, newPassword: string): Promise<void> {
    const normalized = normalizeEmail(email);
    const existing = await this.usersRepository.findByEmail(normalized);
    if (existing.kind === 'not_found') {
      throw ERRORS.ValidationError(`User does not exist: ${normalized}`);
    }

    const passwordHash = await this.passwordService.hash(newPassword);
    const updated = await this.usersRepository.updatePasswordHash(existing.value.id, passwordHash);
    if (updated.kind === 'not_found') {
      throw ERRORS.ValidationError(`User does not exist: ${normalized}`);
    }

    this.logger.log(`Password reset for user ${updated.value.id}`);
  }
}
