/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { homedir } from 'node:os';
import {
  ConfigurationManager,
  FatalConfigError,
  Platform,
  PolicyLoadError,
  detectPlatform,
  loadPolicyConfig,
  type PolicyConfig,
} from '@shellward/core';

/** Options shared by every command. */
export interface InvocationOptions {
  configPath?: string;
  projectDir?: string;
  platform: Platform;
  debug: boolean;
}

export interface TextSink {
  write(chunk: string): unknown;
}

export const PROJECT_DIR_ENV = 'CLAUDE_PROJECT_DIR';

export const NO_RULES_WARNING =
  'Warning: no shellward rule file found; allowing all operations.';

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' && value !== '' ? value : undefined;
}

export function parsePlatform(value: unknown): Platform | undefined {
  switch (value) {
    case Platform.POSIX:
      return Platform.POSIX;
    case Platform.WINDOWS:
      return Platform.WINDOWS;
    default:
      return undefined;
  }
}

/**
 * Reads the global options out of parsed yargs arguments.
 */
export function readInvocationOptions(
  argv: Record<string, unknown>,
): InvocationOptions {
  return {
    configPath: optionalString(argv['config']),
    projectDir: optionalString(argv['project-dir']),
    platform: parsePlatform(argv['platform']) ?? detectPlatform(),
    debug: argv['debug'] === true,
  };
}

/**
 * `--project-dir`, then $CLAUDE_PROJECT_DIR, then the given fallback.
 */
export function resolveProjectDir(
  options: InvocationOptions,
  fallback: string,
  env: NodeJS.ProcessEnv = process.env,
): string {
  return options.projectDir ?? optionalString(env[PROJECT_DIR_ENV]) ?? fallback;
}

export function enableDebugOutput(options: InvocationOptions): void {
  if (options.debug) {
    ConfigurationManager.getInstance().setCliConfig({
      enabled: true,
      namespaces: ['shellward:*'],
    });
  }
}

/**
 * Loads the rule files for one invocation. A missing rule file is reported
 * on `stderr` and yields an empty configuration.
 *
 * @throws FatalConfigError when a rule file exists but cannot be loaded
 */
export async function loadInvocationPolicy(
  options: InvocationOptions,
  projectDir: string,
  stderr: TextSink,
  homeDir: string = homedir(),
): Promise<PolicyConfig> {
  try {
    const loaded = await loadPolicyConfig({
      explicitPath: options.configPath,
      projectDir,
      homeDir,
      platform: options.platform,
    });
    if (loaded.source === undefined) {
      stderr.write(`${NO_RULES_WARNING}\n`);
    }
    return loaded.config;
  } catch (error) {
    if (error instanceof PolicyLoadError) {
      throw new FatalConfigError(error.message);
    }
    throw error;
  }
}
