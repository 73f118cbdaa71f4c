import pino, { type DestinationStream, type Logger, type LoggerOptions } from 'pino';

export type { Logger } from 'pino';

/**
 * Create a logger instance with appropriate configuration
 * - Pretty output in interactive development sessions
 * - JSON output in production, under the function runtime and in tests
 * - Redacts credential fields (access tokens, auth headers)
 *
 * pino-pretty runs in a worker thread, so it is only attached when stdout is a
 * terminal and no test runner is active.
 */
export interface CreateLoggerOptions {
  level?: string;
  pretty?: boolean;
  /** Write JSON lines here instead of stdout; disables pretty output */
  destination?: DestinationStream;
}

export function createLogger(options?: CreateLoggerOptions): Logger {
  const isDevelopment = process.env.NODE_ENV !== 'production';
  const isTestRun = typeof process.env.VITEST !== 'undefined';
  const level = options?.level || process.env.LOG_LEVEL || (isDevelopment ? 'debug' : 'info');

  const config: LoggerOptions = {
    level,
    redact: {
      paths: [
        'token',
        'accessToken',
        'scannerAccessToken',
        'authorization',
        'headers.Authorization',
        'secret',
        'config.scannerAccessToken',
      ],
      censor: '[REDACTED]',
    },
  };

  if (options?.destination) {
    return pino(config, options.destination);
  }

  const wantsPretty = options?.pretty ?? (isDevelopment && !isTestRun && process.stdout.isTTY === true);
  if (wantsPretty) {
    config.transport = {
      target: 'pino-pretty',
      options: {
        colorize: true,
        ignore: 'pid,hostname',
        translateTime: 'HH:MM:ss.l',
      },
    };
  }

  return pino(config);
}

// Export singleton logger instance
export const logger = createLogger();
