import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['test/**/*.test.ts'],
    setupFiles: ['./test/setup.ts'],
    testTimeout: 15000,
    // Tests share real child processes and temp dirs; keep files sequential
    fileParallelism: false,
  },
});
