/**
 * Structured JSON logger shared by every module.
 * Level comes from LOG_LEVEL and is overridden by config once it is loaded.
 */

import pino from 'pino';

const logLevel = process.env['LOG_LEVEL'] ?? 'info';

// Pretty output unless running in production or LOG_FORMAT=json.
const usePretty =
  process.env['LOG_FORMAT'] === 'pretty' ||
  (process.env['NODE_ENV'] !== 'production' &&
    process.env['NODE_ENV'] !== 'test' &&
    process.env['LOG_FORMAT'] !== 'json');

export const logger = pino({
  name: 'quotawatch',
  level: logLevel,
  ...(usePretty && {
    transport: {
      target: 'pino-pretty',
      options: {
        translateTime: 'HH:MM:ss.l',
        ignore: 'pid,hostname',
        colorize: true,
      },
    },
  }),
});
