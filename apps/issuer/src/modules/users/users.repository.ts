import { NewUser, User, UserChanges } from './interfaces/user.interface';

export class DuplicateEmailError extends Error {
  constructor(email: string) {
    super(`A user with email ${email} already exists`);
    this.name = 'DuplicateEmailError';
  }
}

/**
 * User store. Lookups never return soft-deleted users and email matching is
 * case-insensitive.
 */
export abstract class UsersRepository {
  abstract findByEmail(email: string): Promise<User | null>;
  abstract findById(id: string): Promise<User | null>;
  abstract create(input: NewUser): Promise<User>;
  abstract update(id: string, changes: UserChanges): Promise<User | null>;
  abstract softDelete(id: string): Promise<boolean>;
}
