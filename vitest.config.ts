import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.spec.ts'],
    environment: 'node',
    restoreMocks: true,
    env: { LOG_LEVEL: 'error' },
  },
});
