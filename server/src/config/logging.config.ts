/**
 * Logging Configuration
 * Single source of truth for all logging behavior
 */

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

export interface LoggingConfig {
  level: LogLevel;
  pretty: boolean;
  toFile: boolean;
  dir: string;
  rotateDays: number;
  console: boolean;
  redactFields: string[];
}

function parseLevel(raw: string | undefined): LogLevel {
  const value = raw?.trim().toLowerCase();
  return LOG_LEVELS.find(level => level === value) ?? 'info';
}

export function getLoggingConfig(): LoggingConfig {
  const isDev = process.env.NODE_ENV === 'development';

  return {
    level: parseLevel(process.env.LOG_LEVEL),
    pretty: process.env.LOG_PRETTY === 'true' || (isDev && process.env.LOG_PRETTY !== 'false'),
    toFile: process.env.LOG_TO_FILE === 'true',
    dir: process.env.LOG_DIR || './logs',
    rotateDays: Number(process.env.LOG_ROTATE_DAYS || 14),
    console: process.env.LOG_CONSOLE !== 'false',
    redactFields: (process.env.LOG_REDACT_FIELDS ||
      'authorization,cookie,token,password,apiKey,secret,req.headers.authorization,req.headers.cookie')
      .split(',').map(f => f.trim()).filter(Boolean)
  };
}
