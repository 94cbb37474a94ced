import type {
  AuthenticatedIdentity,
  TokenErrorCode,
} from '../../../../../libs/common/src';
import type { KeyUnavailableReason } from './key-unavailable.error';

export enum AuthPolicy {
  Required = 'required',
  Optional = 'optional',
}

export type AuthFailure =
  | { kind: 'MissingCredentials' }
  | { kind: 'MalformedHeader' }
  | { kind: 'KeyUnavailable'; reason: KeyUnavailableReason }
  | { kind: 'InvalidToken'; code: TokenErrorCode }
  | { kind: 'WrongTokenType' };

export type AuthResult =
  | { ok: true; identity: AuthenticatedIdentity }
  | { ok: false; failure: AuthFailure };

export type PolicyOutcome =
  | { action: 'continue'; identity: AuthenticatedIdentity | undefined }
  | { action: 'reject'; failure: AuthFailure };
