/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { defineConfig } from 'vitest/config';

const isWindows = process.platform === 'win32';

export default defineConfig({
  test: {
    name: 'core',
    include: ['src/**/*.{test,spec}.ts'],
    testTimeout: 30000,
    teardownTimeout: 120000,
    silent: true,
    setupFiles: ['./test-setup.ts'],
    pool: isWindows ? 'forks' : undefined,
    coverage: {
      provider: 'v8',
      reportsDirectory: './coverage',
      include: ['src/**/*'],
      exclude: ['src/test-utils/**', 'src/**/*.{test,spec}.ts'],
      reporter: ['text', 'lcov'],
    },
  },
});
