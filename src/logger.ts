/**
 * @file logger.ts
 * @description Root pino logger and per-module child loggers.
 *
 * Level comes from LOG_LEVEL.  Without it the default is `info` when logging
 * to a file and `warn` otherwise.  The test config sets it to `silent`.
 *
 * Modules never build their own pino instance; they ask for a child so every
 * line carries a `module` binding:
 *
 *   const log = createLogger('ball');
 *   log.info({ player: 2 }, 'point scored');
 *
 * Output goes to stderr, or to the file named by LOG_FILE, so it never
 * lands in the middle of a frame the terminal front end draws on stdout.
 */

import { pino, destination } from 'pino';
import type { Logger } from 'pino';

export type { Logger };

/** Process-wide root logger. */
export const logger: Logger = pino(
  {
    name:  'rally-pong',
    level: process.env.LOG_LEVEL ?? (process.env.LOG_FILE ? 'info' : 'warn'),
  },
  destination({ dest: process.env.LOG_FILE ?? 2, sync: true }),
);

/**
 * @function createLogger
 * @description Returns a child of the root logger tagged with `module`.
 */
export function createLogger(module: string): Logger
{
  return logger.child({ module });
}
