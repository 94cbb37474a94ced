import { ApiProperty } from '@nestjs/swagger';

export class PublicKeyResponseDto {
  @ApiProperty({
    description: 'SPKI public key in PEM form',
    example: '-----BEGIN PUBLIC KEY-----\n...\n-----END PUBLIC KEY-----\n',
  })
  public_key!: string;

  @ApiProperty({ example: 'RS256' })
  algorithm!: 'RS256';

  @ApiProperty({ example: 'RSA' })
  key_type!: 'RSA';
}
