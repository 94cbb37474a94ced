import { Body, Controller, Get, Put, UnauthorizedException } from '@nestjs/common';
import {
  ApiBearerAuth,
  ApiOperation,
  ApiResponse,
  ApiTags,
} from '@nestjs/swagger';
import type { AuthenticatedIdentity } from '../../../../../libs/common/src';
import { currentUser } from '../../common/decorators/current-user.decorator';
import { UpdateProfileDto } from './dto/update-profile.dto';
import { UserProfileDto } from './dto/user-profile.dto';
import { UsersService } from './users.service';

@ApiTags('Users')
@ApiBearerAuth()
@Controller('users')
export class UsersController {
  constructor(private readonly usersService: UsersService) {}

  @Get('profile')
  @ApiOperation({ summary: 'Get the current user profile' })
  @ApiResponse({ status: 200, type: UserProfileDto })
  @ApiResponse({ status: 401, description: 'Missing or invalid access token' })
  async getProfile(
    @currentUser() identity: AuthenticatedIdentity | undefined,
  ): Promise<UserProfileDto> {
    const user = await this.usersService.getProfile(this.requireSubject(identity));
    return UserProfileDto.fromUser(user);
  }

  @Put('profile')
  @ApiOperation({ summary: 'Update the current user profile' })
  @ApiResponse({ status: 200, type: UserProfileDto })
  async updateProfile(
    @currentUser() identity: AuthenticatedIdentity | undefined,
    @Body() dto: UpdateProfileDto,
  ): Promise<UserProfileDto> {
    const user = await this.usersService.updateProfile(
      this.requireSubject(identity),
      dto.name,
    );
    return UserProfileDto.fromUser(user);
  }

  private requireSubject(identity: AuthenticatedIdentity | undefined): string {
    if (!identity) {
      throw new UnauthorizedException('User not authenticated');
    }
    return identity.subjectId;
  }
}
