import { registerAs } from '@nestjs/config';
import type { LogLevel } from '@nestjs/common';

const KNOWN_LOG_LEVELS: readonly LogLevel[] = [
  'log',
  'error',
  'warn',
  'debug',
  'verbose',
  'fatal',
];

const isLogLevel = (value: string): value is LogLevel =>
  KNOWN_LOG_LEVELS.some((level) => level === value);

const DEFAULT_LOG_LEVELS: LogLevel[] = ['log', 'error', 'warn'];

/**
 * Parse a comma separated LOG_LEVELS value, ignoring unknown entries.
 * Falls back to the defaults when nothing known is left.
 */
export const parseLogLevels = (raw: string | undefined): LogLevel[] => {
  const levels = (raw ?? '')
    .split(',')
    .map((level) => level.trim())
    .filter(isLogLevel);
  return levels.length > 0 ? levels : [...DEFAULT_LOG_LEVELS];
};

export default registerAs('app', () => ({
  nodeEnv: process.env.NODE_ENV || 'development',
  port: parseInt(process.env.PORT || '3000', 10),
  corsOrigin: process.env.CORS_ORIGIN || '*',
  logLevels: parseLogLevels(process.env.LOG_LEVELS),
}));
