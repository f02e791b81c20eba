import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['packages/*/test/**/*.test.ts'],
    environment: 'node',
    // Workflow tests chdir into temp dirs, which worker threads do not allow.
    pool: 'forks'
  }
});
