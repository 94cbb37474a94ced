export interface User {
  id: string;
  email: string;
  name: string;
  /** bcrypt hash, never the plaintext. */
  passwordHash: string;
  isAdmin: boolean;
  createdAt: Date;
  updatedAt: Date;
  deletedAt: Date | null;
}

export type NewUser = Pick<User, 'email' | 'name' | 'passwordHash' | 'isAdmin'>;

export type UserChanges = Partial<Pick<User, 'name' | 'passwordHash' | 'isAdmin'>>;
