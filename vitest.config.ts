import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['packages/*/tests/**/*.test.ts'],
    environment: 'node',
    reporters: 'default',
    // report and config tests write under os.tmpdir()
    testTimeout: 10_000
  }
});
