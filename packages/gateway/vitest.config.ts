import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'gateway',
    globals: true,
    environment: 'node',
    include: ['src/**/*.test.ts'],
    setupFiles: ['src/test-setup.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json'],
      exclude: ['**/*.test.ts', '**/test-setup.ts', '**/index.ts', 'src/server.ts'],
    },
  },
});
