import { defineConfig } from 'vitest/config';

export default defineConfig({
  // keep Vite from scanning for a postcss config
  css: { postcss: {} },
  test: {
    globals: true,
    environment: 'node',
    include: [
      'packages/*/tests/**/*.test.ts',
      'apps/*/tests/**/*.test.ts',
    ],
    exclude: [
      '**/node_modules/**',
      '**/dist/**',
    ],
  },
});
