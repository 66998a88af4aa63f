import { Injectable } from '@nestjs/common';
import {
  CreateResult,
  FindResult,
  UserRecord,
  alreadyExists,
  created,
  found,
  notFound,
} from '../records';
import { UsersRepository } from '../users.repository';

/**
 * Process-local users collection for development and tests
 */
@Injectable()
export class InMemoryUsersRepository extends UsersRepository {
  private readonly users = new Map<string, UserRecord>();

  async create(user: UserRecord): Promise<CreateResult<UserRecord>> {
    const emailTaken = [...this.users.values()].some((existing) => existing.email === user.email);
    if (this.users.has(user.id) || emailTaken) {
      return alreadyExists();
    }

    this.users.set(user.id, structuredClone(user));
    return created(structuredClone(user));
  }

  async findById(id: string): Promise<FindResult<UserRecord>> {
    const user = this.users.get(id);
    return user ? found(structuredClone(user)) : notFound();
  }

  async findByEmail(email: string): Promise<FindResult<UserRecord>> {
    const user = [...this.users.values()].find((existing) => existing.email === email);
    return user ? found(structuredClone(user)) : notFound();
  }

  async listAll(): Promise<UserRecord[]> {
    return [...this.users.values()]
      .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime() || a.id.localeCompare(b.id))
      .map((user) => structuredClone(user));
  }

  async updatePasswordHash(id: string, passwordHash: string): Promise<FindResult<UserRecord>> {
    const user = this.users.get(id);
    if (!user) {
      return notFound();
    }

    const updated = { ...user, passwordHash };
    this.users.set(id, updated);
    return found(structuredClone(updated));
  }
}
