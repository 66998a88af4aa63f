import { ConfigService } from '@nestjs/config';
import { AppConfig, loadConfig } from '@cloudmedia/common/config';
import { PasswordService } from '@cloudmedia/common/crypto';
import { ErrorCode } from '@cloudmedia/common/errors';
import { InMemoryUsersRepository } from '../metadata/memory/in-memory-users.repository';
import { UserRecord } from '../metadata/records';
import { UsersService, auditPasswordHash } from './users.service';

function user(id: string, email: string, passwordHash: string, createdAt: string): UserRecord {
  return { id, username: id, email, passwordHash, createdAt: new Date(createdAt) };
}

describe('UsersService', () => {
  let repository: InMemoryUsersRepository;
  let passwordService: PasswordService;
  let service: UsersService;

  beforeEach(() => {
    const config = new ConfigService<AppConfig, true>(
      loadConfig({ PASSWORD_TIME_COST: '2', PASSWORD_MEMORY_COST: '4096' }),
    );
    repository = new InMemoryUsersRepository();
    passwordService = new PasswordService(config);
    service = new UsersService(repository, passwordService);
  });

  describe('auditPasswordHash', () => {
    it.each([
      ['', 'empty'],
      ['$argon2id$' + 'x'.repeat(191), 'too long'],
      ['$2b$12$abcdefghijklmnopqrstuv', 'unexpected format'],
      ['$argon2id$v=19$m=4096,t=2,p=1$c2FsdA$aGFzaA', 'ok'],
    ])('should judge %p as %p', (hash, verdict) => {
      expect(auditPasswordHash(hash)).toBe(verdict);
    });
  });

  it('should audit every user in creation order', async () => {
    await repository.create(user('u2', 'b@x.com', '', '2026-01-02T00:00:00Z'));
    await repository.create(user('u1', 'a@x.com', '$argon2id$v=19$m=4096,t=2,p=1$c2FsdA$aGFzaA', '2026-01-01T00:00:00Z'));

    const entries = await service.auditPasswordHashes();

    expect(entries.map((entry) => [entry.id, entry.verdict, entry.hashLength])).toEqual([
      ['u1', 'ok', 43],
      ['u2', 'empty', 0],
    ]);
  });

  it('should store a fresh hash that verifies the new password', async () => {
    await repository.create(user('u1', 'a@x.com', 'broken', '2026-01-01T00:00:00Z'));

    await service.resetPassword(' A@x.com', 'new-secret');

    const stored = await repository.findById('u1');
    expect(stored.kind).toBe('found');
    if (stored.kind === 'found') {
      expect(auditPasswordHash(stored.value.passwordHash)).toBe('ok');
      expect(await passwordService.verify(stored.value.passwordHash, 'new-secret')).toBe(true);
    }
  });

  it('should refuse to reset an unknown user', async () => {
    await expect(service.resetPassword('nobody@x.com', 'new-secret')).rejects.toMatchObject({
      code: ErrorCode.ValidationError,
      message: 'User does not exist: nobody@x.com',
    });
  });
});
