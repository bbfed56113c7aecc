import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts', 'services/*/tests/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    clearMocks: true,
    env: {
      NODE_ENV: 'test',
      LOG_LEVEL: 'silent'
    },
    testTimeout: 10000,
    hookTimeout: 10000
  },
  resolve: {
    alias: {
      '@': fileURLToPath(new URL('./src', import.meta.url))
    }
  }
});
