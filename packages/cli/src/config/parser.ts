/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import yargs from 'yargs/yargs';
import type { Argv } from 'yargs';
import { FatalError, Platform } from '@shellward/core';
import { checkCommand, checkPathCommand } from '../commands/check.js';
import { hookCommand } from '../commands/hook.js';
import { initCommand } from '../commands/init.js';
import { enableDebugOutput, readInvocationOptions } from './invocation.js';

/**
 * Builds the command-line parser. Usage errors and errors thrown by command
 * handlers reject `parseAsync`.
 */
export function createParser(args: string[], version: string): Argv {
  return yargs(args)
    .locale('en')
    .scriptName('shellward')
    .usage(
      '$0 [command] [options]\n\nPre-execution policy firewall for agent tool calls',
    )
    .option('config', {
      alias: 'c',
      type: 'string',
      describe: 'Rule file to use instead of searching the default locations',
    })
    .option('project-dir', {
      type: 'string',
      describe:
        'Project root searched for .shellward/ (default: $CLAUDE_PROJECT_DIR, then the working directory)',
    })
    .option('platform', {
      type: 'string',
      choices: [Platform.POSIX, Platform.WINDOWS],
      describe: 'Command and path rules to apply (default: this host)',
    })
    .option('debug', {
      alias: 'd',
      type: 'boolean',
      default: false,
      describe: 'Write debug logs for every shellward:* namespace',
    })
    .middleware((argv) => {
      enableDebugOutput(readInvocationOptions(argv));
    })
    .command(hookCommand)
    .command(checkCommand)
    .command(checkPathCommand)
    .command(initCommand)
    .version(version)
    .alias('v', 'version')
    .help()
    .alias('h', 'help')
    .strict()
    .fail((message, error) => {
      if (error) {
        throw error;
      }
      throw new FatalError(message, 1);
    });
}
