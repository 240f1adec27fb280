/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { beforeEach } from 'vitest';

// Read by settings loading and browser detection
const SCRUBBED_ENV = [
  'TOKENLOOM_PREFERRED_FLOW',
  'TOKENLOOM_LOOPBACK_PORT',
  'TOKENLOOM_NO_BROWSER',
  'NO_BROWSER',
];

beforeEach(() => {
  for (const name of SCRUBBED_ENV) {
    delete process.env[name];
  }
});
