import { describe, it, expect } from 'vitest';
import { parseLogLevels } from './app.config';

describe('parseLogLevels', () => {
  it('should fall back to log, error and warn when unset', () => {
    expect(parseLogLevels(undefined)).toEqual(['log', 'error', 'warn']);
    expect(parseLogLevels('')).toEqual(['log', 'error', 'warn']);
  });

  it('should keep known levels in order and drop unknown ones', () => {
    expect(parseLogLevels('error, debug,loud,warn')).toEqual([
      'error',
      'debug',
      'warn',
    ]);
  });

  it('should fall back to the defaults when every level is unknown', () => {
    expect(parseLogLevels('loud, quiet')).toEqual(['log', 'error', 'warn']);
  });
});
