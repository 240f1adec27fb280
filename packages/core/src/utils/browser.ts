/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import open from 'open';
import { DebugLogger } from '../debug/index.js';

const logger = DebugLogger.getLogger('tokenloom:utils:browser');

/** Browsers that render in the terminal and cannot complete a sign-in */
const TEXT_BROWSERS = new Set([
  'www-browser',
  'lynx',
  'links',
  'w3m',
  'elinks',
]);

/**
 * Whether a graphical browser can plausibly be launched. False in CI, when
 * NO_BROWSER is set, over SSH without a display, and on Linux without a
 * display server.
 */
export function shouldLaunchBrowser(
  env: NodeJS.ProcessEnv = process.env,
  platform: NodeJS.Platform = process.platform,
): boolean {
  if (env['NO_BROWSER'] || env['TOKENLOOM_NO_BROWSER']) {
    return false;
  }
  if (env['CI'] || env['DEBIAN_FRONTEND'] === 'noninteractive') {
    return false;
  }

  const browser = env['BROWSER'];
  if (browser && TEXT_BROWSERS.has(browser)) {
    return false;
  }

  const hasDisplay = Boolean(env['DISPLAY'] || env['WAYLAND_DISPLAY']);
  if (env['SSH_CONNECTION'] && !hasDisplay) {
    return false;
  }
  if (platform === 'linux') {
    return hasDisplay || Boolean(env['MIR_SOCKET']);
  }
  return true;
}

/**
 * Opens `url` in the default browser. Only http and https URLs are
 * accepted.
 */
export async function openBrowserSecurely(url: string): Promise<void> {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch (error) {
    throw new Error(`Invalid URL: ${url}`, { cause: error });
  }
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new Error(
      `Unsafe protocol ${parsed.protocol}; only http and https URLs can be opened`,
    );
  }

  const child = await open(parsed.toString());
  // A missing launcher (no xdg-open in a container) surfaces as an 'error'
  // event on the child; unhandled, it would take the process down.
  child.on('error', (error) => {
    logger.warn(() => `browser launcher failed: ${error.message}`);
  });
}
