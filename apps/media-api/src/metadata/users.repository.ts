import { CreateResult, FindResult, UserRecord } from './records';

/**
 * Users collection. Emails are stored normalized (trimmed, lower-cased) by the caller.
 */
export abstract class UsersRepository {
  abstract create(user: UserRecord): Promise<CreateResult<UserRecord>>;

  abstract findById(id: string): Promise<FindResult<UserRecord>>;

  abstract findByEmail(email: string): Promise<FindResult<UserRecord>>;

  abstract listAll(): Promise<UserRecord[]>;

  abstract updatePasswordHash(id: string, passwordHash: string): Promise<FindResult<UserRecord>>;
}
