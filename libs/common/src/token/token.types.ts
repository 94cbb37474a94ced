export enum TokenKind {
  Access = 'access',
  Refresh = 'refresh',
}

export const SIGNING_ALGORITHM = 'RS256';

/** Who a token is about. */
export interface TokenSubject {
  subjectId: string;
  email: string;
  isAdmin: boolean;
}

export interface TokenClaims extends TokenSubject {
  tokenKind: TokenKind;
  issuer: string;
  issuedAt: Date;
  notBefore: Date;
  expiresAt: Date;
}

/** Claims as they travel inside the signed JWT payload. */
export interface TokenPayload {
  user_id: string;
  email: string;
  is_admin: boolean;
  type: TokenKind;
  iss: string;
  sub: string;
  iat: number;
  nbf: number;
  exp: number;
}

export interface TokenPair {
  accessToken: string;
  refreshToken: string;
  /** Access token lifetime in seconds. */
  expiresIn: number;
}

/** Identity attached to a request once its access token has been verified. */
export type AuthenticatedIdentity = TokenSubject;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isTokenKind(value: unknown): value is TokenKind {
  return value === TokenKind.Access || value === TokenKind.Refresh;
}

export function isTokenPayload(value: unknown): value is TokenPayload {
  if (!isRecord(value)) return false;
  return (
    typeof value.user_id === 'string' &&
    value.user_id.length > 0 &&
    typeof value.email === 'string' &&
    typeof value.is_admin === 'boolean' &&
    isTokenKind(value.type) &&
    typeof value.iss === 'string' &&
    typeof value.iat === 'number' &&
    typeof value.nbf === 'number' &&
    typeof value.exp === 'number'
  );
}

/**
 * Converts a decoded payload into claims, or returns null when any claim is
 * missing or has the wrong type.
 */
export function claimsFromPayload(value: unknown): TokenClaims | null {
  if (!isTokenPayload(value)) return null;
  return {
    subjectId: value.user_id,
    email: value.email,
    isAdmin: value.is_admin,
    tokenKind: value.type,
    issuer: value.iss,
    issuedAt: new Date(value.iat * 1000),
    notBefore: new Date(value.nbf * 1000),
    expiresAt: new Date(value.exp * 1000),
  };
}

export function identityFromClaims(claims: TokenClaims): AuthenticatedIdentity {
  return {
    subjectId: claims.subjectId,
    email: claims.email,
    isAdmin: claims.isAdmin,
  };
}
