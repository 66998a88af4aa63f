import { ERRORS, isMediaPlatformError } from '@cloudmedia/common/errors';

export const PG_UNIQUE_VIOLATION = '23505';

const SQL_IDENTIFIER = /^[a-z_][a-z0-9_]{0,62}$/;

/**
 * Table names come from configuration, so they are checked before being
 * interpolated into SQL
 */
export function tableName(name: string, variable: string): string {
  if (!SQL_IDENTIFIER.test(name)) {
    throw new Error(`${variable} must be a lower-case SQL identifier, got '${name}'`);
  }
  return name;
}

/**
 * Escape LIKE wildcards; patterns are matched with ESCAPE '\'
 */
export function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, (char) => `\\${char}`);
}

/**
 * Run a database call, rethrowing driver failures as BackendUnavailable
 */
export async function guardBackend<T>(operation: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    if (isMediaPlatformError(error)) {
      throw error;
    }
    throw ERRORS.BackendUnavailable(operation, error);
  }
}
