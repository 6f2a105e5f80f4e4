/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * TOML Rule Loader
 *
 * Loads and parses TOML rule files into PartialPolicyConfig objects.
 * Handles:
 * - TOML parsing with @iarna/toml
 * - Schema validation with zod
 * - Bundled default rule files
 *
 * Regular expressions in generic rules are not compiled here. A malformed
 * pattern is carried through and skipped by the engine.
 */

import * as toml from '@iarna/toml';
import { z } from 'zod';
import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { DebugLogger } from '../debug/DebugLogger.js';
import { getErrorMessage } from '../utils/errors.js';
import { createPolicyConfig, mergePolicyConfigs } from './config.js';
import {
  Platform,
  type PartialPolicyConfig,
  type PolicyConfig,
} from './types.js';

const logger = DebugLogger.getLogger('shellward:policy:loader');

/**
 * Zod schema for a single generic rule in TOML
 */
const TomlGenericRuleSchema = z
  .object({
    pattern: z.string().min(1, 'pattern must not be empty'),
    reason: z.string().min(1, 'reason must not be empty'),
    ask: z.boolean().default(false),
  })
  .strict();

const PathListSchema = z.array(
  z.string().min(1, 'paths must not be empty strings'),
);

/**
 * Zod schema for the entire rule file
 */
const RuleFileSchema = z
  .object({
    genericRules: z.array(TomlGenericRuleSchema).optional(),
    zeroAccessPaths: PathListSchema.optional(),
    readOnlyPaths: PathListSchema.optional(),
    noDeletePaths: PathListSchema.optional(),
  })
  .strict();

export type RuleFile = z.infer<typeof RuleFileSchema>;

/**
 * Error thrown when rule loading or validation fails
 */
export class PolicyLoadError extends Error {
  readonly path?: string;
  override readonly cause?: unknown;

  constructor(message: string, path?: string, options?: { cause?: unknown }) {
    super(message);
    this.name = 'PolicyLoadError';
    this.path = path;
    this.cause = options?.cause;
  }
}

function formatIssues(error: z.ZodError): string {
  return error.errors
    .map((issue) =>
      issue.path.length > 0
        ? `${issue.path.join('.')}: ${issue.message}`
        : issue.message,
    )
    .join(', ');
}

/**
 * Validates already-parsed TOML content.
 *
 * @param source - Used in error messages only
 */
export function parseRuleFile(
  parsed: unknown,
  source: string,
): PartialPolicyConfig {
  const result = RuleFileSchema.safeParse(parsed);
  if (!result.success) {
    throw new PolicyLoadError(
      `Invalid rule schema in ${source}: ${formatIssues(result.error)}`,
      source,
      { cause: result.error },
    );
  }

  const partial: PartialPolicyConfig = {};
  const { genericRules, zeroAccessPaths, readOnlyPaths, noDeletePaths } =
    result.data;
  if (genericRules !== undefined) {
    partial.genericRules = genericRules;
  }
  if (zeroAccessPaths !== undefined) {
    partial.zeroAccessPaths = zeroAccessPaths;
  }
  if (readOnlyPaths !== undefined) {
    partial.readOnlyPaths = readOnlyPaths;
  }
  if (noDeletePaths !== undefined) {
    partial.noDeletePaths = noDeletePaths;
  }
  return partial;
}

/**
 * Parses TOML text into a partial rule set.
 *
 * @throws PolicyLoadError if the text is not valid TOML or fails validation
 */
export function parseRuleToml(
  content: string,
  source: string,
): PartialPolicyConfig {
  let parsed: unknown;
  try {
    parsed = toml.parse(content);
  } catch (error) {
    throw new PolicyLoadError(
      `Invalid TOML syntax in ${source}: ${getErrorMessage(error)}`,
      source,
      { cause: error },
    );
  }
  return parseRuleFile(parsed, source);
}

/**
 * Loads and parses a TOML rule file
 *
 * @param path - Absolute path to the TOML rule file
 * @throws PolicyLoadError if file cannot be read, parsed, or validated
 */
export async function loadPartialConfigFromToml(
  path: string,
): Promise<PartialPolicyConfig> {
  let content: string;

  try {
    content = await readFile(path, 'utf-8');
  } catch (error) {
    throw new PolicyLoadError(`Failed to read rule file: ${path}`, path, {
      cause: error,
    });
  }

  const partial = parseRuleToml(content, path);
  logger.debug(
    () =>
      `Loaded ${path}: ${partial.genericRules?.length ?? 0} generic, ` +
      `${partial.zeroAccessPaths?.length ?? 0} zero-access, ` +
      `${partial.readOnlyPaths?.length ?? 0} read-only, ` +
      `${partial.noDeletePaths?.length ?? 0} no-delete`,
  );
  return partial;
}

// Sources run from src/policy, the build from dist/src/policy
const POLICY_DIR_CANDIDATES = ['../../policies/', '../../../policies/'];

/**
 * Directory holding the bundled rule files.
 *
 * @throws PolicyLoadError if the directory is missing from the package
 */
export function getDefaultPoliciesDir(): string {
  for (const candidate of POLICY_DIR_CANDIDATES) {
    const dir = fileURLToPath(new URL(candidate, import.meta.url));
    if (existsSync(dir)) {
      return dir;
    }
  }
  throw new PolicyLoadError('Bundled policies directory not found');
}

/** Bundled file names: the shared base, then one overlay per platform. */
export const DEFAULT_POLICY_FILES = {
  base: 'base.toml',
  [Platform.POSIX]: 'posix.toml',
  [Platform.WINDOWS]: 'windows.toml',
} as const;

/**
 * Loads the bundled defaults for one platform: base.toml merged with the
 * platform's overlay.
 *
 * @throws PolicyLoadError if any default rule file fails to load
 */
export async function loadDefaultPolicyConfig(
  platform: Platform,
): Promise<PolicyConfig> {
  const policiesDir = getDefaultPoliciesDir();
  const files = [DEFAULT_POLICY_FILES.base, DEFAULT_POLICY_FILES[platform]];

  let config = createPolicyConfig();
  for (const file of files) {
    const path = join(policiesDir, file);
    try {
      config = mergePolicyConfigs(
        config,
        createPolicyConfig(await loadPartialConfigFromToml(path)),
      );
    } catch (error) {
      // Re-throw with context about which default file failed
      if (error instanceof PolicyLoadError) {
        throw new PolicyLoadError(
          `Failed to load default rules ${file}: ${error.message}`,
          path,
          { cause: error },
        );
      }
      throw error;
    }
  }

  return config;
}
