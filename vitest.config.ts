import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: [
      'packages/shared/tests/**/*.test.ts',
      'relay-api/tests/**/*.test.ts',
      'relay-worker/tests/**/*.test.ts',
    ],
    restoreMocks: true,
  },
});
