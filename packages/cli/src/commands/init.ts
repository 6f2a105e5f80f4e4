/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { existsSync } from 'node:fs';
import { copyFile, mkdir } from 'node:fs/promises';
import { homedir } from 'node:os';
import * as path from 'node:path';
import type { CommandModule } from 'yargs';
import {
  DEFAULT_POLICY_FILES,
  FatalConfigError,
  Platform,
  RULES_FILE_NAME,
  SHELLWARD_DIR,
  getDefaultPoliciesDir,
  overlayFileName,
} from '@shellward/core';
import {
  readInvocationOptions,
  resolveProjectDir,
  type TextSink,
} from '../config/invocation.js';
import { exitCli } from './utils.js';

export interface InitOptions {
  /** Directory that receives `.shellward/`. */
  targetDir: string;
  force: boolean;
}

/** Bundled file to installed file name. */
export function defaultRuleFiles(): Array<[string, string]> {
  return [
    [DEFAULT_POLICY_FILES.base, RULES_FILE_NAME],
    [DEFAULT_POLICY_FILES[Platform.POSIX], overlayFileName(Platform.POSIX)],
    [DEFAULT_POLICY_FILES[Platform.WINDOWS], overlayFileName(Platform.WINDOWS)],
  ];
}

/**
 * Copies the bundled rules into `<targetDir>/.shellward/`.
 *
 * @returns the files written
 * @throws FatalConfigError when a rule file exists and `force` is not set
 */
export async function handleInit(
  options: InitOptions,
  stdout: TextSink = process.stdout,
): Promise<string[]> {
  const rulesDir = path.join(options.targetDir, SHELLWARD_DIR);
  const files = defaultRuleFiles().map(
    ([bundled, installed]): [string, string] => [
      path.join(getDefaultPoliciesDir(), bundled),
      path.join(rulesDir, installed),
    ],
  );

  if (!options.force) {
    const existing = files.find(([, target]) => existsSync(target));
    if (existing) {
      throw new FatalConfigError(
        `Rule file already exists: ${existing[1]}. Use --force to overwrite it.`,
      );
    }
  }

  await mkdir(rulesDir, { recursive: true });
  const written: string[] = [];
  for (const [source, target] of files) {
    await copyFile(source, target);
    stdout.write(`Created ${target}\n`);
    written.push(target);
  }
  return written;
}

export const initCommand: CommandModule = {
  command: 'init',
  describe: 'Install the default rules for a project or the current user',
  builder: (yargs) =>
    yargs
      .option('user', {
        describe: 'Install into the home directory instead of the project',
        type: 'boolean',
        default: false,
      })
      .option('force', {
        describe: 'Overwrite existing rule files',
        type: 'boolean',
        default: false,
      }),
  handler: async (argv) => {
    const options = readInvocationOptions(argv);
    await handleInit({
      targetDir:
        argv['user'] === true
          ? homedir()
          : resolveProjectDir(options, process.cwd()),
      force: argv['force'] === true,
    });
    await exitCli(0);
  },
};
