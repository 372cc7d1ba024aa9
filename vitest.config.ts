import { defineConfig } from 'vitest/config';
import tsconfigPaths from 'vite-tsconfig-paths';

/**
 * Root Vitest configuration.
 *
 * Each workspace package is its own project with its own include globs;
 * `npm test` at the root runs all of them once.
 */
export default defineConfig({
  plugins: [tsconfigPaths()],
  test: {
    environment: 'node',
    retry: 0,
    reporters: ['default'],
    projects: ['packages/*'],
  },
});
