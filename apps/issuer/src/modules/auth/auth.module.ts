import { Module } from '@nestjs/common';
import { PassportModule } from '@nestjs/passport';
import { TokenModule } from '../../../../../libs/common/src';
import { KeysModule } from '../keys/keys.module';
import { UsersModule } from '../users/users.module';
import { AuthController } from './auth.controller';
import { AuthService } from './auth.service';
import {
  StatelessRevocationStore,
  TOKEN_REVOCATION_STORE,
} from './revocation/token-revocation.store';
import { JwtStrategy } from './strategies/jwt.strategy';

@Module({
  imports: [PassportModule, TokenModule, KeysModule, UsersModule],
  controllers: [AuthController],
  providers: [
    AuthService,
    JwtStrategy,
    { provide: TOKEN_REVOCATION_STORE, useClass: StatelessRevocationStore },
  ],
  exports: [AuthService],
})
export class AuthModule {}
