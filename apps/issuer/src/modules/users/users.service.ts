import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import { User } from './interfaces/user.interface';
import { UsersRepository } from './users.repository';

@Injectable()
export class UsersService {
  private readonly logger = new Logger(UsersService.name);

  constructor(private readonly users: UsersRepository) {}

  async getProfile(userId: string): Promise<User> {
    const user = await this.users.findById(userId);
    if (!user) {
      throw new NotFoundException('User not found');
    }
    return user;
  }

  async updateProfile(userId: string, name: string): Promise<User> {
    const user = await this.users.update(userId, { name });
    if (!user) {
      throw new NotFoundException('User not found');
    }
    this.logger.log(`Profile updated for user ${userId}`);
    return user;
  }
}
