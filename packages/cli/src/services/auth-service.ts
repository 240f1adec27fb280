/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import {
  KeyringSecureStorage,
  createAuthenticationService,
  loadAuthSettings,
  type AuthenticationService,
  type LoadAuthSettingsOptions,
} from '@tokenloom/core';
import { TerminalPresenter } from '../ui/terminal-presenter.js';
import { registerCleanup } from '../utils/cleanup.js';

/**
 * The service behind every command: user settings, the OS keyring and the
 * terminal presenter. Disposed by exit cleanup, which aborts any sign-in
 * still waiting.
 */
export function createCliAuthService(
  options: LoadAuthSettingsOptions = {},
): AuthenticationService {
  const service = createAuthenticationService({
    settings: loadAuthSettings(options),
    storage: new KeyringSecureStorage(),
    presenter: new TerminalPresenter(),
  });
  registerCleanup(() => service.dispose());
  return service;
}
