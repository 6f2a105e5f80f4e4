#!/usr/bin/env -S node --no-deprecation

/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

// Note: Using --no-deprecation in shebang to suppress deprecation warnings from dependencies

import { main } from './src/shellward.js';
import { exitCli } from './src/commands/utils.js';
import { reportFatalError } from './src/utils/errors.js';

// --- Global Entry Point ---
main().catch(async (error: unknown) => {
  await exitCli(reportFatalError(error));
});
