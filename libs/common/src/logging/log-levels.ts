import type { LogLevel } from '@nestjs/common';

const ORDERED_LEVELS: LogLevel[] = ['error', 'warn', 'log', 'debug', 'verbose'];

/**
 * Maps LOG_LEVEL onto the Nest levels to enable. `info` is an alias for `log`.
 */
export function resolveLogLevels(level: string | undefined): LogLevel[] {
  const normalized = !level || level === 'info' ? 'log' : level;
  const index = ORDERED_LEVELS.findIndex((entry) => entry === normalized);
  return ORDERED_LEVELS.slice(0, index === -1 ? 3 : index + 1);
}
