import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      '@': fileURLToPath(new URL('./src', import.meta.url))
    }
  },
  test: {
    include: ['src/**/__tests__/**/*.test.ts', 'packages/**/__tests__/**/*.test.ts'],
    environment: 'node'
  }
});
