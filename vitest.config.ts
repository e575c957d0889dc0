/**
 * Vitest Configuration
 *
 * - globals: true (enables global test functions)
 * - environment: 'node' (Node.js test environment)
 */
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
  },
});
