/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { DebugLogger } from '../debug/DebugLogger.js';
import { getErrorMessage } from '../utils/errors.js';
import {
  compileOperationRules,
  compileReferenceMatcher,
  matchAny,
} from './command-patterns.js';
import { emptyPolicyConfig } from './config.js';
import {
  defaultPathEnvironment,
  matchPathPattern,
} from './path-matcher.js';
import {
  Platform,
  PolicyDecision,
  type AllowDecision,
  type AskDecision,
  type BlockDecision,
  type CompiledOperationRule,
  type Decision,
  type GenericRule,
  type OperationClass,
  type PathEnvironment,
  type PathPattern,
  type PolicyConfig,
  type PolicyTier,
} from './types.js';

const logger = DebugLogger.getLogger('shellward:policy:engine');

const ALLOW: AllowDecision = { decision: PolicyDecision.ALLOW };

interface CompiledGenericRule {
  rule: GenericRule;
  regex: RegExp;
}

interface CompiledReference {
  pattern: PathPattern;
  regex: RegExp;
}

interface CompiledPathRules {
  pattern: PathPattern;
  rules: CompiledOperationRule[];
}

export interface PolicyEngineOptions {
  platform?: Platform;
  /** Home directory and variables used for `~` / `$VAR` expansion. */
  environment?: PathEnvironment;
}

export function detectPlatform(
  nodePlatform: NodeJS.Platform = process.platform,
): Platform {
  return nodePlatform === 'win32' ? Platform.WINDOWS : Platform.POSIX;
}

function ask(reason: string, pattern: string): AskDecision {
  return { decision: PolicyDecision.ASK, reason, pattern };
}

function block(
  tier: PolicyTier,
  reason: string,
  pattern: string,
  operation?: string,
): BlockDecision {
  const decision: BlockDecision = {
    decision: PolicyDecision.BLOCK,
    reason,
    tier,
    pattern,
  };
  if (operation !== undefined) {
    decision.operation = operation;
  }
  return decision;
}

/**
 * PolicyEngine evaluates shell commands and edit paths against a PolicyConfig.
 *
 * Tiers are checked in a fixed order and the first matching entry wins:
 * generic rules, zero-access paths, read-only paths, no-delete paths.
 * Every rule is compiled once for the engine's platform when the engine is
 * built; rules that cannot be compiled are skipped.
 */
export class PolicyEngine {
  private readonly config: PolicyConfig;
  private readonly platform: Platform;
  private readonly environment: PathEnvironment;
  private readonly genericRules: CompiledGenericRule[];
  private readonly zeroAccessMatchers: CompiledReference[];
  private readonly readOnlyRules: CompiledPathRules[];
  private readonly noDeleteRules: CompiledPathRules[];

  constructor(
    config: PolicyConfig = emptyPolicyConfig(),
    options: PolicyEngineOptions = {},
  ) {
    this.config = config;
    this.platform = options.platform ?? detectPlatform();
    this.environment = options.environment ?? defaultPathEnvironment();

    this.genericRules = this.compileGenericRules(config.genericRules);
    this.zeroAccessMatchers = this.compileReferences(config.zeroAccessPaths);
    this.readOnlyRules = this.compilePathRules(config.readOnlyPaths);
    this.noDeleteRules = this.compilePathRules(config.noDeletePaths, [
      'delete',
    ]);
  }

  /**
   * Decides whether a shell command may run.
   *
   * @param command - The full command line as the assistant would run it
   */
  evaluateCommand(command: string): Decision {
    if (command.trim() === '') {
      return ALLOW;
    }

    for (const { rule, regex } of this.genericRules) {
      if (regex.test(command)) {
        return this.report(
          command,
          rule.ask
            ? ask(rule.reason, rule.pattern)
            : block('generic', rule.reason, rule.pattern),
        );
      }
    }

    for (const { pattern, regex } of this.zeroAccessMatchers) {
      if (regex.test(command)) {
        return this.report(
          command,
          block(
            'zero-access',
            `zero-access path ${pattern.source} (no operations allowed)`,
            pattern.source,
          ),
        );
      }
    }

    for (const { pattern, rules } of this.readOnlyRules) {
      const match = matchAny(command, rules);
      if (match.matched && match.operation !== undefined) {
        return this.report(
          command,
          block(
            'read-only',
            `${match.operation} operation on read-only path ${pattern.source}`,
            pattern.source,
            match.operation,
          ),
        );
      }
    }

    for (const { pattern, rules } of this.noDeleteRules) {
      const match = matchAny(command, rules);
      if (match.matched && match.operation !== undefined) {
        return this.report(
          command,
          block(
            'no-delete',
            `${match.operation} operation on no-delete path ${pattern.source}`,
            pattern.source,
            match.operation,
          ),
        );
      }
    }

    return ALLOW;
  }

  /**
   * Decides whether a file may be written or edited directly, without any
   * command parsing. No-delete paths stay editable.
   */
  evaluatePathEdit(filePath: string): Decision {
    if (filePath.trim() === '') {
      return ALLOW;
    }

    for (const pattern of this.config.zeroAccessPaths) {
      if (matchPathPattern(filePath, pattern, this.platform, this.environment)) {
        return this.report(
          filePath,
          block('zero-access', `zero-access path ${pattern.source}`, pattern.source),
        );
      }
    }

    for (const pattern of this.config.readOnlyPaths) {
      if (matchPathPattern(filePath, pattern, this.platform, this.environment)) {
        return this.report(
          filePath,
          block('read-only', `read-only path ${pattern.source}`, pattern.source),
        );
      }
    }

    return ALLOW;
  }

  getConfig(): PolicyConfig {
    return this.config;
  }

  private report(input: string, decision: Decision): Decision {
    logger.debug(
      () => `${decision.decision} ${JSON.stringify(input)}: ${JSON.stringify(decision)}`,
    );
    return decision;
  }

  private compileGenericRules(
    rules: readonly GenericRule[],
  ): CompiledGenericRule[] {
    const compiled: CompiledGenericRule[] = [];
    for (const rule of rules) {
      try {
        compiled.push({ rule, regex: new RegExp(rule.pattern, 'i') });
      } catch (error) {
        logger.warn(
          () =>
            `Skipping generic rule with invalid pattern ${JSON.stringify(rule.pattern)}: ${getErrorMessage(error)}`,
        );
      }
    }
    return compiled;
  }

  private compileReferences(
    patterns: readonly PathPattern[],
  ): CompiledReference[] {
    const compiled: CompiledReference[] = [];
    for (const pattern of patterns) {
      const regex = compileReferenceMatcher(
        pattern,
        this.platform,
        this.environment,
      );
      if (regex) {
        compiled.push({ pattern, regex });
      } else {
        logger.warn(`Skipping zero-access path ${pattern.source}: cannot compile`);
      }
    }
    return compiled;
  }

  private compilePathRules(
    patterns: readonly PathPattern[],
    classes?: readonly OperationClass[],
  ): CompiledPathRules[] {
    const compiled: CompiledPathRules[] = [];
    for (const pattern of patterns) {
      const rules = compileOperationRules(
        pattern,
        this.platform,
        this.environment,
        classes,
      );
      if (rules.length > 0) {
        compiled.push({ pattern, rules });
      } else {
        logger.warn(`Skipping path ${pattern.source}: cannot compile`);
      }
    }
    return compiled;
  }
}

const engineCache = new WeakMap<PolicyConfig, Map<Platform, PolicyEngine>>();

function engineFor(config: PolicyConfig, platform: Platform): PolicyEngine {
  let byPlatform = engineCache.get(config);
  if (!byPlatform) {
    byPlatform = new Map();
    engineCache.set(config, byPlatform);
  }
  let engine = byPlatform.get(platform);
  if (!engine) {
    engine = new PolicyEngine(config, { platform });
    byPlatform.set(platform, engine);
  }
  return engine;
}

/**
 * Stateless entry point. Compiled engines are cached per (config, platform);
 * configs are frozen, so a cached engine can never go stale.
 */
export function evaluateCommand(
  command: string,
  config: PolicyConfig,
  platform: Platform,
): Decision {
  return engineFor(config, platform).evaluateCommand(command);
}

export function evaluatePathEdit(
  filePath: string,
  config: PolicyConfig,
  platform: Platform,
): Decision {
  return engineFor(config, platform).evaluatePathEdit(filePath);
}
