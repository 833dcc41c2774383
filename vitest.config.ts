import { defineConfig } from 'vitest/config';

/**
 * Root configuration: every workspace package is a project with its own
 * vitest.config.ts. Tests run in-process against fake models only.
 */

const isCI = process.env.CI === 'true';

export default defineConfig({
  test: {
    environment: 'node',
    // No retries - surface issues immediately
    retry: 0,
    testTimeout: isCI ? 30000 : 10000,
    reporters: ['default'],
    projects: ['packages/*'],
    env: {
      NODE_ENV: 'test',
      FC_NUM_RUNS: isCI ? '1000' : '100',
    },
  },
});
