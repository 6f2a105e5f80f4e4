/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export enum Platform {
  POSIX = 'posix',
  WINDOWS = 'windows',
}

export enum PolicyDecision {
  ALLOW = 'allow',
  ASK = 'ask',
  BLOCK = 'block',
}

export type PolicyTier = 'generic' | 'zero-access' | 'read-only' | 'no-delete';

export interface LiteralPathPattern {
  kind: 'literal';
  source: string;
}

export interface GlobPathPattern {
  kind: 'glob';
  source: string;
}

export type PathPattern = LiteralPathPattern | GlobPathPattern;

/**
 * Path-independent rule matched against the whole command text.
 * `pattern` is a regular expression source, compiled case-insensitively.
 */
export interface GenericRule {
  pattern: string;
  reason: string;
  ask: boolean;
}

/**
 * Merged, immutable rule set. Order inside each list is priority order.
 */
export interface PolicyConfig {
  readonly genericRules: readonly GenericRule[];
  readonly zeroAccessPaths: readonly PathPattern[];
  readonly readOnlyPaths: readonly PathPattern[];
  readonly noDeletePaths: readonly PathPattern[];
}

/**
 * What a single rule source contributes before merging. Paths are still
 * plain strings here; classification happens in createPolicyConfig.
 */
export interface PartialPolicyConfig {
  genericRules?: GenericRule[];
  zeroAccessPaths?: string[];
  readOnlyPaths?: string[];
  noDeletePaths?: string[];
}

export interface AllowDecision {
  decision: PolicyDecision.ALLOW;
}

export interface AskDecision {
  decision: PolicyDecision.ASK;
  reason: string;
  pattern: string;
}

export interface BlockDecision {
  decision: PolicyDecision.BLOCK;
  reason: string;
  tier: PolicyTier;
  pattern: string;
  operation?: string;
}

export type Decision = AllowDecision | AskDecision | BlockDecision;

export type OperationClass =
  | 'write'
  | 'append'
  | 'edit'
  | 'move-copy'
  | 'delete'
  | 'permission'
  | 'truncate';

/**
 * One command-syntax template for an operation. `template` is a regular
 * expression source containing the `{path}` placeholder.
 */
export interface OperationRule {
  operation: string;
  operationClass: OperationClass;
  template: string;
}

export interface CompiledOperationRule {
  operation: string;
  operationClass: OperationClass;
  regex: RegExp;
}

/**
 * Values used to expand `~` and environment references in paths.
 */
export interface PathEnvironment {
  home: string;
  env: Readonly<Record<string, string | undefined>>;
}
