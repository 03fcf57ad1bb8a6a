import { defineConfig } from 'vitest/config';
import { resolve } from 'path';

export default defineConfig({
  test: {
    setupFiles: ['tests/setup.ts'],
    environment: 'node',
    globals: true,
    include: [
      'core/**/*.test.ts',
      'interpreter/**/*.test.ts',
      'cli/**/*.test.ts',
      'api/**/*.test.ts',
      'tests/**/*.test.ts'
    ],
    exclude: [
      'node_modules',
      'dist'
    ],
    alias: {
      '@core': resolve(__dirname, './core'),
      '@interpreter': resolve(__dirname, './interpreter'),
      '@cli': resolve(__dirname, './cli'),
      '@api': resolve(__dirname, './api'),
      '@tests': resolve(__dirname, './tests')
    }
  }
});
