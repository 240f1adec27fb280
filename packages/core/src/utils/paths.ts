/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { homedir } from 'node:os';
import { join } from 'node:path';

export const TOKENLOOM_DIR = '.tokenloom';
export const SETTINGS_FILE_NAME = 'settings.json';

export function getUserConfigDir(): string {
  return join(homedir(), TOKENLOOM_DIR);
}

export function getUserSettingsPath(): string {
  return join(getUserConfigDir(), SETTINGS_FILE_NAME);
}
