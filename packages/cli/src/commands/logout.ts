/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { CommandModule } from 'yargs';
import { z } from 'zod';
import {
  AuthenticationRequiredError,
  type AuthenticationService,
} from '@tokenloom/core';
import { createCliAuthService } from '../services/auth-service.js';
import { exitCli, getErrorMessage } from './utils.js';

const LogoutArgsSchema = z.object({
  provider: z.string(),
  scopes: z.array(z.string()).default([]),
  account: z.string().optional(),
});

export type LogoutArgs = z.infer<typeof LogoutArgsSchema>;

/**
 * Restores the stored session without prompting, then signs it out, which
 * also revokes the refresh token where the provider supports it.
 */
export async function handleLogout(
  service: AuthenticationService,
  args: LogoutArgs,
): Promise<void> {
  try {
    const session = await service.acquireSession(
      args.provider,
      args.scopes,
      false,
      { accountHint: args.account },
    );
    await service.removeSession(session.id);
    console.log(`Signed out of ${session.providerId} (${session.account}).`);
  } catch (error) {
    if (error instanceof AuthenticationRequiredError) {
      console.log(`No stored session for ${args.provider}.`);
      return;
    }
    console.error(`Logout failed: ${getErrorMessage(error)}`);
    await exitCli(1);
  }
}

export const logoutCommand: CommandModule = {
  command: 'logout <provider> [scopes..]',
  describe: 'Signs out of a provider and forgets its stored token.',
  builder: (yargs) =>
    yargs
      .positional('provider', {
        describe: 'The provider id.',
        type: 'string',
      })
      .positional('scopes', {
        describe: 'The scopes the session was created with.',
        type: 'string',
        array: true,
      })
      .option('account', {
        describe: 'The account to sign out.',
        type: 'string',
      }),
  handler: async (argv) => {
    await handleLogout(createCliAuthService(), LogoutArgsSchema.parse(argv));
    await exitCli();
  },
};
