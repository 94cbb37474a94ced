import { Injectable } from '@nestjs/common';
import { NewUser, User, UserChanges } from './interfaces/user.interface';
import { DuplicateEmailError, UsersRepository } from './users.repository';

@Injectable()
export class InMemoryUsersRepository extends UsersRepository {
  private readonly users = new Map<string, User>();
  private nextId = 1;

  findByEmail(email: string): Promise<User | null> {
    const wanted = this.normalizeEmail(email);
    for (const user of this.users.values()) {
      if (user.deletedAt === null && user.email === wanted) {
        return Promise.resolve({ ...user });
      }
    }
    return Promise.resolve(null);
  }

  findById(id: string): Promise<User | null> {
    const user = this.users.get(id);
    return Promise.resolve(user && user.deletedAt === null ? { ...user } : null);
  }

  create(input: NewUser): Promise<User> {
    const email = this.normalizeEmail(input.email);
    // soft-deleted rows keep their email reserved
    for (const existing of this.users.values()) {
      if (existing.email === email) {
        return Promise.reject(new DuplicateEmailError(email));
      }
    }

    const now = new Date();
    const user: User = {
      ...input,
      id: String(this.nextId++),
      email,
      createdAt: now,
      updatedAt: now,
      deletedAt: null,
    };
    this.users.set(user.id, user);
    return Promise.resolve({ ...user });
  }

  update(id: string, changes: UserChanges): Promise<User | null> {
    const user = this.users.get(id);
    if (!user || user.deletedAt !== null) return Promise.resolve(null);

    Object.assign(user, changes, { updatedAt: new Date() });
    return Promise.resolve({ ...user });
  }

  softDelete(id: string): Promise<boolean> {
    const user = this.users.get(id);
    if (!user || user.deletedAt !== null) return Promise.resolve(false);

    user.deletedAt = new Date();
    return Promise.resolve(true);
  }

  private normalizeEmail(email: string): string {
    return email.trim().toLowerCase();
  }
}
