/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import chalk from 'chalk';
import {
  DebugLogger,
  openBrowserSecurely,
  shouldLaunchBrowser,
  type AuthPresenter,
  type DeviceCodePrompt,
} from '@tokenloom/core';

const logger = DebugLogger.getLogger('tokenloom:cli:presenter');
const RULE = '─'.repeat(40);

export interface TerminalPresenterOptions {
  canLaunchBrowser?: () => boolean;
  openBrowser?: (url: string) => Promise<void>;
  now?: () => number;
}

/**
 * Prints sign-in instructions to the terminal and opens the browser for
 * loopback sign-in when one can be launched.
 */
export class TerminalPresenter implements AuthPresenter {
  private readonly canLaunchBrowser: () => boolean;
  private readonly openBrowser: (url: string) => Promise<void>;
  private readonly now: () => number;

  constructor(options: TerminalPresenterOptions = {}) {
    this.canLaunchBrowser = options.canLaunchBrowser ?? shouldLaunchBrowser;
    this.openBrowser = options.openBrowser ?? openBrowserSecurely;
    this.now = options.now ?? Date.now;
  }

  presentDeviceCode(prompt: DeviceCodePrompt): void {
    const minutes = Math.max(
      1,
      Math.round((prompt.expiresAt - this.now()) / 60_000),
    );
    console.log(`\n${chalk.bold(`Sign in to ${prompt.providerId}`)}`);
    console.log(RULE);
    console.log(`Visit ${chalk.cyan(prompt.verificationUri)}`);
    console.log(`and enter the code ${chalk.bold.yellow(prompt.userCode)}`);
    if (prompt.verificationUriComplete) {
      console.log(
        `or open ${chalk.cyan(prompt.verificationUriComplete)} directly`,
      );
    }
    console.log(chalk.dim(`The code expires in ${minutes} min.`));
    console.log(RULE);
    console.log('Waiting for authorization...\n');
  }

  async openSignIn(url: string, providerId: string): Promise<void> {
    console.log(`\n${chalk.bold(`Sign in to ${providerId}`)}`);
    console.log(RULE);
    console.log('Please visit the following URL to authorize:');
    console.log(url);

    if (this.canLaunchBrowser()) {
      console.log('Opening browser for authentication...');
      try {
        await this.openBrowser(url);
      } catch (error) {
        // The URL above is still usable
        console.log('Failed to open browser automatically.');
        logger.debug(
          () =>
            `browser launch error: ${error instanceof Error ? error.message : String(error)}`,
        );
      }
    }

    console.log(RULE);
    console.log('Waiting for authorization...\n');
  }
}
