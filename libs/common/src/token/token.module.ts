import { Module } from '@nestjs/common';
import { JwtModule } from '@nestjs/jwt';
import { CLOCK, systemClock } from '../clock';
import { TokenCodecService } from './token-codec.service';

@Module({
  imports: [JwtModule.register({})],
  providers: [TokenCodecService, { provide: CLOCK, useValue: systemClock }],
  exports: [TokenCodecService, CLOCK],
})
export class TokenModule {}
