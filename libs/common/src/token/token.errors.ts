export enum TokenErrorCode {
  MalformedToken = 'MalformedToken',
  SignatureInvalid = 'SignatureInvalid',
  Expired = 'Expired',
  NotYetValid = 'NotYetValid',
  WrongAlgorithm = 'WrongAlgorithm',
}

export class TokenError extends Error {
  constructor(
    readonly code: TokenErrorCode,
    message: string,
  ) {
    super(message);
    this.name = 'TokenError';
  }
}
