import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/__tests__/**/*.spec.ts'],
    environment: 'node',
    env: {
      ENGINE_CACHE_LOG_LEVEL: 'silent'
    }
  }
});
