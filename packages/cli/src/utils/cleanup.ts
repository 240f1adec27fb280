/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { DebugLogger } from '@tokenloom/core';

const logger = DebugLogger.getLogger('tokenloom:cli:cleanup');

const cleanupFunctions: Array<(() => void) | (() => Promise<void>)> = [];
let cleanupInProgress = false;

export function registerCleanup(fn: (() => void) | (() => Promise<void>)) {
  cleanupFunctions.push(fn);
}

export async function runExitCleanup() {
  // Signal handlers and command handlers may both get here
  if (cleanupInProgress) return;
  cleanupInProgress = true;

  for (const fn of cleanupFunctions) {
    try {
      await fn();
    } catch (error) {
      logger.warn(
        () =>
          `cleanup step failed: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
  }
  cleanupFunctions.length = 0;
}

/**
 * Reset cleanup state for testing purposes only.
 * @internal
 */
export function __resetCleanupStateForTesting() {
  cleanupFunctions.length = 0;
  cleanupInProgress = false;
}
