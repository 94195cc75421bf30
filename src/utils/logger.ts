/**
 * Shared pino logger. Writes to stderr so `print` output on stdout stays clean.
 * Level comes from LOG_LEVEL (default: info; `silent` disables output).
 */

import pino from 'pino';

export const logger = pino(
  {
    name: 'miner-launcher',
    level: process.env.LOG_LEVEL || 'info',
  },
  pino.destination({ dest: 2, sync: true })
);
