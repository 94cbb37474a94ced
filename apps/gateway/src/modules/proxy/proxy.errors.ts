/** The backend could not be reached after all retries, or its circuit is open. */
export class BackendUnavailableError extends Error {
  constructor(
    readonly serviceName: string,
    readonly cause?: unknown,
  ) {
    super(`Service ${serviceName} is unavailable`);
    this.name = 'BackendUnavailableError';
  }
}

/** The outbound request could not be built. */
export class InternalProxyError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InternalProxyError';
  }
}
