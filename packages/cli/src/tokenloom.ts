/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import yargs from 'yargs/yargs';
import { hideBin } from 'yargs/helpers';
import { loginCommand } from './commands/login.js';
import { logoutCommand } from './commands/logout.js';
import { providersCommand } from './commands/providers.js';
import { exitCli } from './commands/utils.js';

export async function main(argv: string[] = hideBin(process.argv)) {
  // Ctrl-C during a sign-in aborts the flow and frees the loopback port
  process.once('SIGINT', () => {
    void exitCli(130);
  });

  const yargsInstance = yargs(argv)
    .scriptName('tokenloom')
    .usage('Usage: tokenloom <command> [options]')
    .command(loginCommand)
    .command(providersCommand)
    .command(logoutCommand)
    .demandCommand(1, 'Choose a command.')
    .recommendCommands()
    .strict()
    .help()
    .alias('h', 'help')
    .version();

  yargsInstance.wrap(yargsInstance.terminalWidth());
  await yargsInstance.parseAsync();
}
