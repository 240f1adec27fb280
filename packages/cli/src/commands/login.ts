/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import chalk from 'chalk';
import type { CommandModule } from 'yargs';
import { z } from 'zod';
import type { AuthenticationService, FlowKind } from '@tokenloom/core';
import { createCliAuthService } from '../services/auth-service.js';
import { exitCli, getErrorMessage } from './utils.js';

const LoginArgsSchema = z.object({
  provider: z.string(),
  scopes: z.array(z.string()).default([]),
  device: z.boolean().optional(),
  browser: z.boolean().optional(),
  account: z.string().optional(),
});

export type LoginArgs = z.infer<typeof LoginArgsSchema>;

function requestedFlow(args: LoginArgs): FlowKind | undefined {
  if (args.device) {
    return 'device_code';
  }
  return args.browser ? 'loopback' : undefined;
}

export async function handleLogin(
  service: AuthenticationService,
  args: LoginArgs,
): Promise<void> {
  try {
    const session = await service.acquireSession(
      args.provider,
      args.scopes,
      true,
      { flow: requestedFlow(args), accountHint: args.account },
    );
    console.log(
      chalk.green(`Signed in to ${session.providerId} as ${session.account}`),
    );
    console.log(`Scopes: ${session.scopes.canonical || '(none)'}`);
    console.log(
      `Access token valid until ${new Date(session.expiresAt).toISOString()}`,
    );
  } catch (error) {
    console.error(chalk.red(`Login failed: ${getErrorMessage(error)}`));
    await exitCli(1);
  }
}

export const loginCommand: CommandModule = {
  command: 'login <provider> [scopes..]',
  describe: 'Signs in to a provider and stores the refresh token.',
  builder: (yargs) =>
    yargs
      .positional('provider', {
        describe: 'The provider id, for example github.',
        type: 'string',
      })
      .positional('scopes', {
        describe: 'Scopes to request, in addition to the provider defaults.',
        type: 'string',
        array: true,
      })
      .option('device', {
        describe: 'Use the device code flow.',
        type: 'boolean',
      })
      .option('browser', {
        describe: 'Use the browser (loopback) flow.',
        type: 'boolean',
      })
      .option('account', {
        describe: 'Account to sign in as; sent to the provider as a hint.',
        type: 'string',
      })
      .conflicts('device', 'browser'),
  handler: async (argv) => {
    await handleLogin(createCliAuthService(), LoginArgsSchema.parse(argv));
    await exitCli();
  },
};
