import ms from 'ms';

export const DURATION_PATTERN =
  /^\d+(\.\d+)?\s*(ms|milliseconds?|s|secs?|seconds?|m|mins?|minutes?|h|hrs?|hours?|d|days?|w|weeks?|y|years?)?$/i;

/**
 * Converts a human duration such as `30m`, `7d` or `5000` into milliseconds.
 */
export function parseDuration(value: string): number {
  const parsed = ms(value.trim());
  if (typeof parsed !== 'number' || !Number.isFinite(parsed) || parsed < 0) {
    throw new Error(`Invalid duration: "${value}"`);
  }
  return parsed;
}

export function parseDurationSeconds(value: string): number {
  return Math.floor(parseDuration(value) / 1000);
}
