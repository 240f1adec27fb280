/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import chalk from 'chalk';

// Plain output regardless of the terminal running the tests
chalk.level = 0;
