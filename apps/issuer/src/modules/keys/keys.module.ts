import { Module } from '@nestjs/common';
import { KeyManagerService } from './key-manager.service';
import { KeysController } from './keys.controller';

@Module({
  controllers: [KeysController],
  providers: [KeyManagerService],
  exports: [KeyManagerService],
})
export class KeysModule {}
