/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export * from './src/index.js';
export {
  openBrowserSecurely,
  shouldLaunchBrowser,
} from './src/utils/browser.js';
