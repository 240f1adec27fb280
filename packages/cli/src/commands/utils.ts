/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { runExitCleanup } from '../utils/cleanup.js';

/** Runs registered cleanup (pending flows, refresh timers) and exits. */
export async function exitCli(exitCode = 0): Promise<never> {
  try {
    await runExitCleanup();
  } finally {
    process.exit(exitCode);
  }
}

export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
