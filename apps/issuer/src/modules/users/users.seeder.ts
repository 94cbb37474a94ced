import { Inject, Injectable, Logger, OnModuleInit } from '@nestjs/common';
import * as bcrypt from 'bcryptjs';
import { readFile } from 'fs/promises';
import {
  issuerConfig,
  IssuerConfig,
} from '../../common/config/configuration';
import { UsersRepository } from './users.repository';

interface SeedUser {
  email: string;
  name: string;
  password: string;
  is_admin?: boolean;
}

function isSeedUser(value: unknown): value is SeedUser {
  if (typeof value !== 'object' || value === null) return false;
  const entry: Record<string, unknown> = { ...value };
  return (
    typeof entry.email === 'string' &&
    typeof entry.name === 'string' &&
    typeof entry.password === 'string' &&
    (entry.is_admin === undefined || typeof entry.is_admin === 'boolean')
  );
}

/** Loads USERS_SEED_FILE into the user store at startup, hashing passwords. */
@Injectable()
export class UsersSeeder implements OnModuleInit {
  private readonly logger = new Logger(UsersSeeder.name);

  constructor(
    private readonly users: UsersRepository,
    @Inject(issuerConfig.KEY) private readonly config: IssuerConfig,
  ) {}

  async onModuleInit(): Promise<void> {
    const { seedFile } = this.config.users;
    if (!seedFile) return;

    const entries = await this.readSeedFile(seedFile);
    let created = 0;
    for (const entry of entries) {
      if (await this.users.findByEmail(entry.email)) continue;
      await this.users.create({
        email: entry.email,
        name: entry.name,
        passwordHash: await bcrypt.hash(entry.password, this.config.users.bcryptRounds),
        isAdmin: entry.is_admin ?? false,
      });
      created += 1;
    }
    this.logger.log(`Seeded ${created} user(s) from ${seedFile}`);
  }

  private async readSeedFile(path: string): Promise<SeedUser[]> {
    const parsed: unknown = JSON.parse(await readFile(path, 'utf8'));
    if (!Array.isArray(parsed) || !parsed.every(isSeedUser)) {
      throw new Error(
        `Seed file ${path} must be a JSON array of { email, name, password, is_admin? }`,
      );
    }
    return parsed;
  }
}
