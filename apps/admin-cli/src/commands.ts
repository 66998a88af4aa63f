import { Logger } from '@nestjs/common';
import { describeError, isMediaPlatformError } from '@cloudmedia/common/errors';
import { UsersService } from '../../media-api/src/users/users.service';

const USAGE = 'Usage: admin check | admin reset-password <email> <new-password>';

/**
 * @returns the process exit code
 */
export async function runCommand(
  usersService: UsersService,
  argv: string[],
  logger = new Logger('Admin CLI'),
): Promise<number> {
  const [command, ...args] = argv;

  switch (command) {
    case 'check':
      return check(usersService, logger);
    case 'reset-password':
      if (args.length !== 2) {
        logger.error(USAGE);
        return 1;
      }
      return resetPassword(usersService, logger, args[0], args[1]);
    default:
      logger.error(USAGE);
      return 1;
  }
}

async function check(usersService: UsersService, logger: Logger): Promise<number> {
  const entries = await usersService.auditPasswordHashes();
  logger.log(`Found ${entries.length} user(s)`);

  for (const entry of entries) {
    const line =
      `${entry.email} id=${entry.id} username=${entry.username} ` +
      `created=${entry.createdAt.toISOString()} hashLength=${entry.hashLength}: ${entry.verdict}`;

    if (entry.verdict === 'ok') {
      logger.log(line);
    } else {
      logger.warn(line);
    }
  }

  const flagged = entries.filter((entry) => entry.verdict !== 'ok').length;
  if (flagged > 0) {
    logger.warn(`${flagged} user(s) need a reset: admin reset-password <email> <new-password>`);
  }
  return 0;
}

async function resetPassword(
  usersService: UsersService,
  logger: Logger,
  email: string,
  newPassword: string,
): Promise<number> {
  try {
    await usersService.resetPassword(email, newPassword);
  } catch (error) {
    if (isMediaPlatformError(error)) {
      logger.error(describeError(error));
      return 1;
    }
    throw error;
  }

  logger.log(`Password updated for ${email}`);
  return 0;
}
