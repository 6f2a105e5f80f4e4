/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { existsSync } from 'node:fs';
import * as path from 'node:path';
import { DebugLogger } from '../debug/DebugLogger.js';
import { SHELLWARD_DIR } from '../utils/paths.js';
import {
  createPolicyConfig,
  emptyPolicyConfig,
  mergePolicyConfigs,
} from './config.js';
import { PolicyLoadError, loadPartialConfigFromToml } from './toml-loader.js';
import type { Platform, PolicyConfig } from './types.js';

const logger = DebugLogger.getLogger('shellward:policy:sources');

export const RULES_FILE_NAME = 'rules.toml';

export function overlayFileName(platform: Platform): string {
  return `rules.${platform}.toml`;
}

export interface RuleSourceOptions {
  /** Rule file named on the command line. Must exist when given. */
  explicitPath?: string;
  projectDir?: string;
  homeDir: string;
  platform: Platform;
}

export interface RuleSources {
  base: string;
  overlay?: string;
}

/**
 * Candidate base files in search order.
 */
export function candidateRuleFiles(
  options: Omit<RuleSourceOptions, 'platform'>,
): string[] {
  if (options.explicitPath !== undefined) {
    return [path.resolve(options.explicitPath)];
  }
  const candidates: string[] = [];
  if (options.projectDir) {
    candidates.push(
      path.join(options.projectDir, SHELLWARD_DIR, RULES_FILE_NAME),
    );
  }
  candidates.push(
    path.join(options.homeDir, SHELLWARD_DIR, RULES_FILE_NAME),
    // Legacy XDG-style location
    path.join(options.homeDir, '.config', 'shellward', RULES_FILE_NAME),
  );
  return candidates;
}

/**
 * Finds the base rule file and its platform overlay.
 *
 * @returns undefined when no base file exists
 * @throws PolicyLoadError when an explicit path does not exist
 */
export function resolveRuleSources(
  options: RuleSourceOptions,
): RuleSources | undefined {
  const candidates = candidateRuleFiles(options);
  const base = candidates.find((candidate) => existsSync(candidate));

  if (base === undefined) {
    if (options.explicitPath !== undefined) {
      throw new PolicyLoadError(
        `Rule file not found: ${candidates[0]}`,
        candidates[0],
      );
    }
    logger.debug(() => `No rule file in ${candidates.join(', ')}`);
    return undefined;
  }

  const overlay = path.join(
    path.dirname(base),
    overlayFileName(options.platform),
  );
  return existsSync(overlay) ? { base, overlay } : { base };
}

export interface LoadedPolicyConfig {
  config: PolicyConfig;
  /** Files that contributed, base first. Undefined when none was found. */
  source?: RuleSources;
}

/**
 * Resolves, loads and merges the rule files for one invocation.
 * With no rule file the configuration is empty and everything is allowed.
 */
export async function loadPolicyConfig(
  options: RuleSourceOptions,
): Promise<LoadedPolicyConfig> {
  const source = resolveRuleSources(options);
  if (!source) {
    return { config: emptyPolicyConfig() };
  }

  const base = createPolicyConfig(await loadPartialConfigFromToml(source.base));
  if (source.overlay === undefined) {
    return { config: base, source };
  }
  const overlay = createPolicyConfig(
    await loadPartialConfigFromToml(source.overlay),
  );
  return { config: mergePolicyConfigs(base, overlay), source };
}
