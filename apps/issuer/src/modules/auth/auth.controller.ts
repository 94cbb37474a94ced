import {
  Body,
  Controller,
  HttpCode,
  HttpStatus,
  Post,
  UnauthorizedException,
} from '@nestjs/common';
import {
  ApiBearerAuth,
  ApiOperation,
  ApiResponse,
  ApiTags,
} from '@nestjs/swagger';
import type { AuthenticatedIdentity } from '../../../../../libs/common/src';
import { currentUser } from '../../common/decorators/current-user.decorator';
import { publicDecorator } from '../../common/decorators/public.decorator';
import { AuthService } from './auth.service';
import { LoginDto } from './dto/login.dto';
import { LogoutResponseDto } from './dto/logout-response.dto';
import { RefreshTokenDto } from './dto/refresh-token.dto';
import { TokenResponseDto } from './dto/token-response.dto';

@ApiTags('Authentication')
@Controller('auth')
export class AuthController {
  constructor(private readonly authService: AuthService) {}

  @publicDecorator()
  @Post('login')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Login with email and password' })
  @ApiResponse({ status: 200, type: TokenResponseDto })
  @ApiResponse({ status: 401, description: 'Invalid credentials' })
  async login(@Body() dto: LoginDto): Promise<TokenResponseDto> {
    const pair = await this.authService.login(dto.email, dto.password);
    return TokenResponseDto.fromPair(pair);
  }

  @publicDecorator()
  @Post('refresh')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Exchange a refresh token for a new token pair' })
  @ApiResponse({ status: 200, type: TokenResponseDto })
  @ApiResponse({ status: 401, description: 'Invalid or expired refresh token' })
  async refresh(@Body() dto: RefreshTokenDto): Promise<TokenResponseDto> {
    const pair = await this.authService.refresh(dto.refresh_token);
    return TokenResponseDto.fromPair(pair);
  }

  @Post('logout')
  @HttpCode(HttpStatus.OK)
  @ApiBearerAuth()
  @ApiOperation({ summary: 'Logout the current user' })
  @ApiResponse({ status: 200, type: LogoutResponseDto })
  async logout(
    @currentUser() identity: AuthenticatedIdentity | undefined,
    @Body() dto: RefreshTokenDto,
  ): Promise<LogoutResponseDto> {
    if (!identity) {
      throw new UnauthorizedException('User not authenticated');
    }
    const { revoked } = await this.authService.logout(identity, dto.refresh_token);
    return { message: 'Logged out successfully', revoked };
  }
}
