/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Policy Configuration
 *
 * Builds the immutable PolicyConfig from partial rule sources:
 * 1. Base rule file
 * 2. Platform overlay (rules.<platform>.toml)
 *
 * Merging concatenates each list, base first. Order inside a list is
 * priority order, so base entries are checked before overlay entries.
 */

import { createPathPattern } from './path-matcher.js';
import type {
  GenericRule,
  PartialPolicyConfig,
  PathPattern,
  PolicyConfig,
} from './types.js';

function freezeConfig(config: {
  genericRules: GenericRule[];
  zeroAccessPaths: PathPattern[];
  readOnlyPaths: PathPattern[];
  noDeletePaths: PathPattern[];
}): PolicyConfig {
  return Object.freeze({
    genericRules: Object.freeze(
      config.genericRules.map((rule) => Object.freeze({ ...rule })),
    ),
    zeroAccessPaths: Object.freeze(
      config.zeroAccessPaths.map((pattern) => Object.freeze({ ...pattern })),
    ),
    readOnlyPaths: Object.freeze(
      config.readOnlyPaths.map((pattern) => Object.freeze({ ...pattern })),
    ),
    noDeletePaths: Object.freeze(
      config.noDeletePaths.map((pattern) => Object.freeze({ ...pattern })),
    ),
  });
}

const EMPTY_POLICY_CONFIG: PolicyConfig = freezeConfig({
  genericRules: [],
  zeroAccessPaths: [],
  readOnlyPaths: [],
  noDeletePaths: [],
});

/**
 * The configuration used when no rule source exists. Everything is allowed.
 */
export function emptyPolicyConfig(): PolicyConfig {
  return EMPTY_POLICY_CONFIG;
}

/**
 * Classifies every path of a partial source once and freezes the result.
 */
export function createPolicyConfig(
  partial: PartialPolicyConfig = {},
): PolicyConfig {
  return freezeConfig({
    genericRules: (partial.genericRules ?? []).map((rule) => ({
      pattern: rule.pattern,
      reason: rule.reason,
      ask: rule.ask,
    })),
    zeroAccessPaths: (partial.zeroAccessPaths ?? []).map(createPathPattern),
    readOnlyPaths: (partial.readOnlyPaths ?? []).map(createPathPattern),
    noDeletePaths: (partial.noDeletePaths ?? []).map(createPathPattern),
  });
}

/**
 * Field-wise concatenation, base first.
 */
export function mergePolicyConfigs(
  base: PolicyConfig,
  overlay: PolicyConfig,
): PolicyConfig {
  return freezeConfig({
    genericRules: [...base.genericRules, ...overlay.genericRules],
    zeroAccessPaths: [...base.zeroAccessPaths, ...overlay.zeroAccessPaths],
    readOnlyPaths: [...base.readOnlyPaths, ...overlay.readOnlyPaths],
    noDeletePaths: [...base.noDeletePaths, ...overlay.noDeletePaths],
  });
}

export function isEmptyPolicyConfig(config: PolicyConfig): boolean {
  return (
    config.genericRules.length === 0 &&
    config.zeroAccessPaths.length === 0 &&
    config.readOnlyPaths.length === 0 &&
    config.noDeletePaths.length === 0
  );
}
