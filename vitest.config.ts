import { fileURLToPath } from 'url';
import { defineConfig } from 'vitest/config';

const anthropicMock = fileURLToPath(new URL('./tests/mocks/anthropic.ts', import.meta.url));

export default defineConfig({
  test: {
    setupFiles: ['./tests/setup.ts'],
    include: ['tests/unit/**/*.test.ts'],
    environment: 'node',
    globals: true,
    testTimeout: 10000,
    // The completion client never leaves the process in tests
    alias: {
      '@anthropic-ai/sdk': anthropicMock,
    },
  },
});
