import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['packages/*/test/**/*.test.ts'],
    // script timeouts and sandbox contexts run real wall-clock time
    testTimeout: 20_000,
  },
});
