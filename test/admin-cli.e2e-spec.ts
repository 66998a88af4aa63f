import { Logger } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import { AdminModule } from '../apps/admin-cli/src/admin.module';
import { runCommand } from '../apps/admin-cli/src/commands';
import { UsersService } from '../apps/media-api/src/users/users.service';

/**
 * Admin CLI module wiring with only the settings it needs
 */
describe('Admin CLI (e2e)', () => {
  beforeAll(() => {
    Object.assign(process.env, { METADATA_DRIVER: 'memory', OBJECT_STORE_DRIVER: 'disk' });
    delete process.env.JWT_SECRET;
    delete process.env.STORAGE_SIGNING_SECRET;
  });

  it('should start and run check without token or URL signing secrets', async () => {
    const moduleRef = await Test.createTestingModule({ imports: [AdminModule] }).compile();
    const logger = new Logger('test');
    const log = jest.spyOn(logger, 'log').mockImplementation(() => undefined);

    try {
      await expect(runCommand(moduleRef.get(UsersService), ['check'], logger)).resolves.toBe(0);
      expect(log).toHaveBeenCalledWith('Found 0 user(s)');
    } finally {
      await moduleRef.close();
    }
  });
});
