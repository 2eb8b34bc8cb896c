import { defineConfig } from 'vitest/config';
import tsconfigPaths from 'vite-tsconfig-paths';

export default defineConfig({
  plugins: [tsconfigPaths()],
  test: {
    environment: 'node',
    include: [
      'packages/*/__tests__/**/*.{test,spec}.ts',
      'apps/*/__tests__/**/*.{test,spec}.ts',
    ],
    testTimeout: 15000,
  },
});
