/**
 * Workspace-level Vitest config for @curate/shared-types
 *
 * WHY: Mostly a types package; the test only pins the literal unions.
 */

import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    passWithNoTests: true,
  },
});
