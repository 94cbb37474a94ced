export type KeyUnavailableReason =
  | 'timeout'
  | 'network'
  | 'http-status'
  | 'bad-response'
  | 'pem-parse'
  | 'not-rsa';

/** The issuer's verification key could not be obtained. */
export class KeyUnavailableError extends Error {
  constructor(
    readonly reason: KeyUnavailableReason,
    message: string,
  ) {
    super(message);
    this.name = 'KeyUnavailableError';
  }
}
