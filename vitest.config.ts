import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: [
      'apps/api/src/**/*.test.ts',
      'apps/api/test/**/*.spec.ts',
    ],
    env: {
      NODE_ENV: 'test',
    },
  },
});
