/**
 * Admin CLI
 * Password-hash audit and repair against the configured metadata store
 *
 *   admin check
 *   admin reset-password <email> <new-password>
 */

import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { MetadataSchemaService } from '../../media-api/src/metadata/metadata-schema.service';
import { UsersService } from '../../media-api/src/users/users.service';
import { AdminModule } from './admin.module';
import { runCommand } from './commands';

async function main(argv: string[]): Promise<number> {
  const app = await NestFactory.createApplicationContext(AdminModule, {
    logger: ['log', 'warn', 'error'],
  });

  try {
    await app.get(MetadataSchemaService).initialize();
    return await runCommand(app.get(UsersService), argv);
  } finally {
    await app.close();
  }
}

main(process.argv.slice(2))
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error: unknown) => {
    const logger = new Logger('Admin CLI');
    logger.error('Command failed', error instanceof Error ? error.stack : String(error));
    process.exitCode = 1;
  });
