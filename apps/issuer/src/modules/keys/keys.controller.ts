import { Controller, Get } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { SIGNING_ALGORITHM } from '../../../../../libs/common/src';
import { publicDecorator } from '../../common/decorators/public.decorator';
import { KeyManagerService } from './key-manager.service';
import { PublicKeyResponseDto } from './public-key-response.dto';

@ApiTags('Authentication')
@Controller('auth')
export class KeysController {
  constructor(private readonly keyManager: KeyManagerService) {}

  @publicDecorator()
  @Get('public-key')
  @ApiOperation({ summary: 'Get the public key used to verify issued tokens' })
  @ApiResponse({ status: 200, type: PublicKeyResponseDto })
  getPublicKey(): PublicKeyResponseDto {
    return {
      public_key: this.keyManager.exportPublicKeyPem(),
      algorithm: SIGNING_ALGORITHM,
      key_type: 'RSA',
    };
  }
}
