import { ApiProperty } from '@nestjs/swagger';
import type { User } from '../interfaces/user.interface';

export class UserProfileDto {
  @ApiProperty({ example: '1' })
  id!: string;

  @ApiProperty({ example: 'alice@example.com' })
  email!: string;

  @ApiProperty({ example: 'Alice Example' })
  name!: string;

  @ApiProperty({ example: false })
  is_admin!: boolean;

  static fromUser(user: User): UserProfileDto {
    return {
      id: user.id,
      email: user.email,
      name: user.name,
      is_admin: user.isAdmin,
    };
  }
}
