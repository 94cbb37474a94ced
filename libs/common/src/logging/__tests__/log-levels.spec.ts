import { resolveLogLevels } from '../log-levels';

describe('resolveLogLevels', () => {
  it('should treat info as the default log level', () => {
    expect(resolveLogLevels('info')).toEqual(['error', 'warn', 'log']);
    expect(resolveLogLevels(undefined)).toEqual(['error', 'warn', 'log']);
  });

  it('should include every level up to the requested one', () => {
    expect(resolveLogLevels('error')).toEqual(['error']);
    expect(resolveLogLevels('debug')).toEqual(['error', 'warn', 'log', 'debug']);
  });

  it('should fall back to info for unknown levels', () => {
    expect(resolveLogLevels('chatty')).toEqual(['error', 'warn', 'log']);
  });
});
