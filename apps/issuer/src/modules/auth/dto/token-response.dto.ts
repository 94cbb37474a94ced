import { ApiProperty } from '@nestjs/swagger';
import type { TokenPair } from '../../../../../../libs/common/src';

export class TokenResponseDto {
  @ApiProperty()
  access_token!: string;

  @ApiProperty()
  refresh_token!: string;

  @ApiProperty({ example: 'Bearer' })
  token_type!: 'Bearer';

  @ApiProperty({ description: 'Access token lifetime in seconds', example: 1800 })
  expires_in!: number;

  static fromPair(pair: TokenPair): TokenResponseDto {
    return {
      access_token: pair.accessToken,
      refresh_token: pair.refreshToken,
      token_type: 'Bearer',
      expires_in: pair.expiresIn,
    };
  }
}
