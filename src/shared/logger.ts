import pino from 'pino';

/**
 * Structured Logger using Pino
 *
 * Log lines go to stderr so they never interleave with command output on stdout.
 *
 * **Configuration:**
 * - LOG_LEVEL: Set log level (error, warn, info, debug, silent) - defaults to 'warn'
 * - NODE_ENV: 'development' uses pretty-printing, anything else uses JSON
 *
 * **Usage:**
 * ```typescript
 * import { logger } from '../shared/logger';
 *
 * logger.error({
 *   msg: 'Command failed',
 *   command: 'add',
 *   error: error.message,
 *   stack: error.stack
 * });
 * ```
 */

const isDevelopment = process.env.NODE_ENV === 'development';
const logLevel = process.env.LOG_LEVEL || 'warn';
const STDERR = 2;

export const logger = pino(
  {
    level: logLevel,
    transport: isDevelopment
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'HH:MM:ss Z',
            ignore: 'pid,hostname',
            destination: STDERR,
          },
        }
      : undefined,
    base: {
      env: process.env.NODE_ENV || 'production',
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  },
  isDevelopment ? undefined : pino.destination({ dest: STDERR, sync: true })
);
