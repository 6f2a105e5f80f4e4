/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { CommandModule } from 'yargs';
import { readInvocationOptions } from '../config/invocation.js';
import { processIO, runHook } from '../hook/adapter.js';
import { exitCli } from './utils.js';

export const hookCommand: CommandModule = {
  command: ['hook', '$0'],
  describe:
    'Read a PreToolUse request on stdin and allow, ask or block it (default)',
  handler: async (argv) => {
    const exitCode = await runHook(readInvocationOptions(argv), processIO());
    await exitCli(exitCode);
  },
};
