import {
  HttpException,
  ServiceUnavailableException,
  UnauthorizedException,
} from '@nestjs/common';
import type { KeyUnavailableStatus } from '../../common/config/configuration';
import type { AuthFailure } from './auth.types';

export const MISSING_CREDENTIALS_MESSAGE = 'Authorization header required';
export const MALFORMED_HEADER_MESSAGE =
  "Invalid authorization header format. Expected 'Bearer <token>'";
export const INVALID_TOKEN_MESSAGE = 'Invalid or expired token';
export const KEY_UNAVAILABLE_MESSAGE = 'Authentication is temporarily unavailable';

export function mapAuthFailure(
  failure: AuthFailure,
  keyUnavailableStatus: KeyUnavailableStatus,
): HttpException {
  switch (failure.kind) {
    case 'MissingCredentials':
      return new UnauthorizedException(MISSING_CREDENTIALS_MESSAGE);
    case 'MalformedHeader':
      return new UnauthorizedException(MALFORMED_HEADER_MESSAGE);
    case 'KeyUnavailable':
      return keyUnavailableStatus === 503
        ? new ServiceUnavailableException(KEY_UNAVAILABLE_MESSAGE)
        : new UnauthorizedException(INVALID_TOKEN_MESSAGE);
    case 'InvalidToken':
    case 'WrongTokenType':
      return new UnauthorizedException(INVALID_TOKEN_MESSAGE);
  }
}
