/**
 * @file vitest.config.ts
 * @description Vitest configuration for the Rally Pong unit tests.
 *
 * The simulation core is plain logic with no terminal or file access, so
 * tests run in the `node` environment with no stubs beyond Math.random.
 * LOG_LEVEL is forced to `silent` so pino stays quiet during test runs.
 */

import { defineConfig } from 'vitest/config';

export default defineConfig(
{
  test:
  {
    environment: 'node',
    include:     ['tests/**/*.test.ts'],
    env:
    {
      LOG_LEVEL: 'silent',
    },
  },
});
