/**
 * FILE PURPOSE: Root Vitest config for the monorepo
 *
 * HOW: One `vitest run` at the root discovers tests in packages/ and apps/.
 *      Workspaces keep their own config for running in place.
 */

import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['packages/**/tests/**/*.test.ts', 'apps/**/tests/**/*.test.ts'],
    passWithNoTests: false,
  },
});
