import { ApiProperty } from '@nestjs/swagger';

export class LogoutResponseDto {
  @ApiProperty({ example: 'Logged out successfully' })
  message!: string;

  @ApiProperty({
    description: 'Whether the refresh token was actually revoked server-side',
    example: false,
  })
  revoked!: boolean;
}
