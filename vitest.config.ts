import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['services/**/__tests__/**/*.spec.ts'],
    environment: 'node',
    env: {
      LOG_LEVEL: 'silent',
    },
  },
});
