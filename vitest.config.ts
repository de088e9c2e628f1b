/**
 * @fileoverview Vitest configuration for the workspace
 *
 * @description
 * Runs every `__tests__` suite across packages in a single node process.
 * Tests never reach PostgreSQL: services run against the in-memory
 * repository bundle.
 */

import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    environment: 'node',
    include: ['apps/**/src/**/*.test.ts', 'packages/**/src/**/*.test.ts'],
  },
})
