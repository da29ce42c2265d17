import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['shared/src/**/*.test.ts', 'apps/api/src/**/*.test.ts'],
    environment: 'node',
  },
});
