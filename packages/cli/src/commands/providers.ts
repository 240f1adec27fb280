/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import chalk from 'chalk';
import type { CommandModule } from 'yargs';
import {
  getUserSettingsPath,
  type AuthenticationService,
} from '@tokenloom/core';
import { createCliAuthService } from '../services/auth-service.js';
import { exitCli } from './utils.js';

export function handleProviders(service: AuthenticationService): void {
  const providers = service.listProviders();
  if (providers.length === 0) {
    console.log(
      `No providers configured. Add a clientId under auth.providers in ${getUserSettingsPath()}.`,
    );
    return;
  }
  for (const provider of providers) {
    const config = provider.getConfig();
    const name = config.displayName ? ` ${config.displayName}` : '';
    const flows = provider.supportedFlows().join(', ');
    console.log(`${chalk.bold(provider.id)}${name} ${chalk.dim(`(${flows})`)}`);
  }
}

export const providersCommand: CommandModule = {
  command: 'providers',
  describe: 'Lists the configured providers and their sign-in flows.',
  builder: (yargs) => yargs,
  handler: async () => {
    handleProviders(createCliAuthService());
    await exitCli();
  },
};
