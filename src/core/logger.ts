/**
 * Structured logging with Pino
 *
 * - Development: pretty-printed, colorized output
 * - Production and tests: plain JSON (no transport worker)
 * - API keys and tokens are redacted
 */

import pino from 'pino';

const env = process.env.NODE_ENV;
const pretty = env !== 'production' && env !== 'test';

const logger = pino({
  level: process.env.LOG_LEVEL || (env === 'test' ? 'silent' : 'info'),
  transport: pretty
    ? { target: 'pino-pretty', options: { colorize: true, translateTime: 'SYS:HH:MM:ss', destination: 2 } }
    : undefined,
  redact: [
    'apiKey',
    'token',
    'secret',
    '*.apiKey',
    '*.token',
    '*.secret',
    'headers.authorization',
    'headers["x-api-key"]',
    'headers["x-goog-api-key"]',
  ],
}, pretty ? undefined : pino.destination(2));

/**
 * Create a child logger scoped to a module
 *
 * @example
 * const log = createLogger('orchestrator');
 * log.info({ subject: 42 }, 'Tier 1 gated');
 */
export function createLogger(module: string): pino.Logger {
  return logger.child({ module });
}

export default logger;
