#!/usr/bin/env -S node --import tsx

/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import chalk from 'chalk';
import { AuthError } from '@tokenloom/core';
import { main } from './src/tokenloom.js';

// --- Global Entry Point ---
main().catch((error: unknown) => {
  if (error instanceof AuthError) {
    console.error(chalk.red(error.message));
    process.exit(1);
  }
  console.error('An unexpected critical error occurred:');
  if (error instanceof Error) {
    console.error(error.stack);
  } else {
    console.error(String(error));
  }
  process.exit(1);
});
