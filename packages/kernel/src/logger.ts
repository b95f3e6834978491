import { pino, type Logger } from 'pino';

export type { Logger };

export interface LoggerOptions {
  level?: string;
}

/**
 * Named pino logger with secret redaction.
 *
 * Level comes from the option, then LOG_LEVEL, then "info".
 */
export function createLogger(name: string, options: LoggerOptions = {}): Logger {
  return pino({
    name,
    level: options.level ?? process.env['LOG_LEVEL'] ?? 'info',
    redact: {
      paths: [
        'authorization',
        'token',
        'req.headers.authorization',
        'headers.authorization',
        '*.secret',
        '*.privateKey',
        '*.token',
      ],
      censor: '[REDACTED]',
    },
  });
}
