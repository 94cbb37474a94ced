import { Logger } from '@nestjs/common';

export interface CircuitBreakerOptions {
  failureThreshold: number; // consecutive failures to open
  cooldownMs: number; // time window to half-open
  successThreshold: number; // successes to close from half-open
}

export type CircuitState = 'closed' | 'open' | 'half-open';

export const DEFAULT_CIRCUIT_BREAKER_OPTIONS: CircuitBreakerOptions = {
  failureThreshold: 5,
  cooldownMs: 30000,
  successThreshold: 1,
};

/**
 * Per-dependency circuit breaker. While open, calls go straight to the
 * fallback without touching the dependency.
 */
export class CircuitBreakerService {
  private readonly logger: Logger;
  private state: CircuitState = 'closed';
  private failures = 0;
  private successes = 0;
  private nextAttemptTs = 0;
  private readonly options: CircuitBreakerOptions;

  constructor(
    readonly name: string,
    options: Partial<CircuitBreakerOptions> = {},
  ) {
    this.logger = new Logger(`${CircuitBreakerService.name}:${name}`);
    this.options = {
      failureThreshold:
        options.failureThreshold ?? DEFAULT_CIRCUIT_BREAKER_OPTIONS.failureThreshold,
      cooldownMs: options.cooldownMs ?? DEFAULT_CIRCUIT_BREAKER_OPTIONS.cooldownMs,
      successThreshold:
        options.successThreshold ?? DEFAULT_CIRCUIT_BREAKER_OPTIONS.successThreshold,
    };
  }

  getState(): CircuitState {
    return this.state;
  }

  async exec<T>(
    fn: () => Promise<T>,
    fallback: (reason: unknown) => Promise<T>,
  ): Promise<T> {
    const now = Date.now();
    if (this.state === 'open') {
      if (now >= this.nextAttemptTs) {
        this.state = 'half-open';
        this.logger.warn('Circuit moved to half-open');
      } else {
        this.logger.warn('Circuit open; using fallback');
        return fallback(new Error(`Circuit ${this.name} is open`));
      }
    }

    try {
      const result = await fn();
      this.recordSuccess();
      return result;
    } catch (err) {
      this.recordFailure();
      this.logger.warn(
        `Circuit failure: ${err instanceof Error ? err.message : String(err)}`,
      );
      return fallback(err);
    }
  }

  private recordSuccess(): void {
    if (this.state === 'half-open') {
      this.successes += 1;
      if (this.successes >= this.options.successThreshold) {
        this.close();
      }
    } else {
      this.reset();
    }
  }

  private recordFailure(): void {
    this.failures += 1;
    if (
      this.state === 'half-open' ||
      this.failures >= this.options.failureThreshold
    ) {
      this.open();
    }
  }

  private open(): void {
    this.state = 'open';
    this.nextAttemptTs = Date.now() + this.options.cooldownMs;
    this.failures = 0;
    this.successes = 0;
    this.logger.warn('Circuit opened');
  }

  private close(): void {
    this.state = 'closed';
    this.reset();
    this.logger.log('Circuit closed');
  }

  private reset(): void {
    this.failures = 0;
    this.successes = 0;
    this.nextAttemptTs = 0;
  }
}
