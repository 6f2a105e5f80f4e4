/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Operation tables used to spot a write-class operation applied to a
 * protected path inside free command text.
 *
 * This is text matching, not shell parsing: quoting, variable indirection
 * and command substitution can hide a path from these patterns.
 */

import { DebugLogger } from '../debug/DebugLogger.js';
import { getErrorMessage } from '../utils/errors.js';
import {
  escapeRegExp,
  expandPath,
  globToRegExpSource,
} from './path-matcher.js';
import {
  Platform,
  type CompiledOperationRule,
  type OperationClass,
  type OperationRule,
  type PathEnvironment,
  type PathPattern,
} from './types.js';

const logger = DebugLogger.getLogger('shellward:policy:patterns');

export const PATH_PLACEHOLDER = '{path}';

/** Evaluation order of operation classes within the read-only tier. */
export const OPERATION_CLASS_ORDER: readonly OperationClass[] = [
  'write',
  'append',
  'edit',
  'move-copy',
  'delete',
  'permission',
  'truncate',
];

type OperationTable = Record<OperationClass, readonly OperationRule[]>;

function rules(
  operationClass: OperationClass,
  entries: ReadonlyArray<[operation: string, template: string]>,
): OperationRule[] {
  return entries.map(([operation, template]) => ({
    operation,
    operationClass,
    template,
  }));
}

const POSIX_OPERATIONS: OperationTable = {
  write: rules('write', [
    // Plain redirection; `>>` is append and `: >` is truncate
    ['write', '(?<!>|:\\s*)>(?!>)\\s*{path}'],
    ['write', '\\btee\\b(?!.*\\s(?:-a|--append)\\b).*\\s{path}'],
    ['write', '\\bdd\\b.*\\bof={path}'],
  ]),
  append: rules('append', [
    ['append', '>>\\s*{path}'],
    ['append', '\\btee\\b.*\\s(?:-a|--append)\\b.*\\s{path}'],
  ]),
  edit: rules('edit', [
    ['edit', '\\bsed\\b.*\\s(?:-[a-zA-Z]*i|--in-place)\\S*\\s.*{path}'],
    ['edit', '\\bperl\\b.*\\s-[a-zA-Z]*i\\S*\\s.*{path}'],
    ['edit', '\\bg?awk\\b.*\\s-i\\s+inplace\\b.*{path}'],
    ['edit', '\\bpatch\\s+.*{path}'],
  ]),
  'move-copy': rules('move-copy', [
    ['move', '\\bmv\\s+.*{path}'],
    ['copy', '\\bcp\\s+.*\\s+{path}'],
    ['copy', '\\brsync\\s+.*\\s+{path}'],
    ['copy', '\\binstall\\s+.*\\s+{path}'],
    ['link', '\\bln\\s+.*\\s+{path}'],
  ]),
  delete: rules('delete', [
    ['delete', '\\brm\\s+.*{path}'],
    ['delete', '\\bunlink\\s+.*{path}'],
    ['delete', '\\brmdir\\s+.*{path}'],
    ['delete', '\\bshred\\s+.*{path}'],
    ['delete', '\\bfind\\s+.*{path}.*\\s-delete\\b'],
  ]),
  permission: rules('permission', [
    ['chmod', '\\bchmod\\s+.*{path}'],
    ['chown', '\\bchown\\s+.*{path}'],
    ['chgrp', '\\bchgrp\\s+.*{path}'],
    ['chattr', '\\bchattr\\s+.*{path}'],
    ['setfacl', '\\bsetfacl\\s+.*{path}'],
  ]),
  truncate: rules('truncate', [
    ['truncate', '\\btruncate\\s+.*{path}'],
    ['truncate', ':\\s*>\\s*{path}'],
  ]),
};

const WINDOWS_OPERATIONS: OperationTable = {
  write: rules('write', [
    ['write', '(?<!>)>(?!>)\\s*{path}'],
    ['write', '\\bSet-Content\\b.*{path}'],
    ['write', '\\bOut-File\\b(?!.*\\s-Append\\b).*{path}'],
  ]),
  append: rules('append', [
    ['append', '>>\\s*{path}'],
    ['append', '\\bAdd-Content\\b.*{path}'],
    ['append', '\\bOut-File\\b.*{path}'],
  ]),
  edit: rules('edit', [
    ['edit', '\\bGet-Content\\b.*{path}.*\\s-replace\\b'],
  ]),
  'move-copy': rules('move-copy', [
    ['move', '\\b(?:move|Move-Item|mi|mv)\\s+.*{path}'],
    ['rename', '\\b(?:ren|rename|Rename-Item|rni)\\s+.*{path}'],
    ['copy', '\\b(?:copy|xcopy|robocopy|Copy-Item|cpi|cp)\\s+.*\\s+{path}'],
  ]),
  delete: rules('delete', [
    ['delete', '\\b(?:del|erase|rd|rmdir|Remove-Item|ri|rm)\\s+.*{path}'],
  ]),
  permission: rules('permission', [
    ['icacls', '\\bicacls\\s+.*{path}'],
    ['cacls', '\\bcacls\\s+.*{path}'],
    ['attrib', '\\battrib\\s+.*{path}'],
    ['takeown', '\\btakeown\\b.*{path}'],
    ['set-acl', '\\bSet-Acl\\b.*{path}'],
  ]),
  truncate: rules('truncate', [
    ['truncate', '\\b(?:Clear-Content|clc)\\s+.*{path}'],
  ]),
};

const OPERATION_TABLES: Record<Platform, OperationTable> = {
  [Platform.POSIX]: POSIX_OPERATIONS,
  [Platform.WINDOWS]: WINDOWS_OPERATIONS,
};

/**
 * Operation templates for the given classes on one platform, in class order.
 */
export function getOperationRules(
  platform: Platform,
  classes: readonly OperationClass[] = OPERATION_CLASS_ORDER,
): OperationRule[] {
  const table = OPERATION_TABLES[platform];
  return OPERATION_CLASS_ORDER.filter((operationClass) =>
    classes.includes(operationClass),
  ).flatMap((operationClass) => table[operationClass]);
}

/**
 * Regex fragments that spell the pattern inside command text. Literal
 * patterns yield both the expanded and the as-written spelling; an empty
 * list means the pattern cannot be compiled.
 */
export function pathFragments(
  pattern: PathPattern,
  platform: Platform,
  environment: PathEnvironment,
): string[] {
  const spellings = [pattern.source];
  const expanded = expandPath(pattern.source, platform, environment);
  if (expanded !== pattern.source) {
    spellings.unshift(expanded);
  }

  if (pattern.kind === 'literal') {
    return spellings.map(escapeRegExp);
  }

  const fragments: string[] = [];
  for (const spelling of spellings) {
    const fragment = globToRegExpSource(spelling, platform);
    if (fragment === null) {
      return [];
    }
    fragments.push(fragment);
  }
  return fragments;
}

function alternation(fragments: string[]): string {
  return fragments.length === 1 ? fragments[0] : `(?:${fragments.join('|')})`;
}

// A reference starts a path word: not inside an identifier or a dotted name
const REFERENCE_START = '(?<![\\w.-])';

/**
 * Compiles "pattern appears anywhere in the command". Returns null when the
 * pattern cannot be compiled.
 */
export function compileReferenceMatcher(
  pattern: PathPattern,
  platform: Platform,
  environment: PathEnvironment,
): RegExp | null {
  const fragments = pathFragments(pattern, platform, environment);
  if (fragments.length === 0) {
    return null;
  }
  try {
    return new RegExp(
      `${REFERENCE_START}(?:${fragments.join('|')})`,
      'i',
    );
  } catch {
    return null;
  }
}

/**
 * Substitutes the pattern into every template of the requested classes.
 * Templates that fail to compile are dropped; the rest keep their order.
 */
export function compileOperationRules(
  pattern: PathPattern,
  platform: Platform,
  environment: PathEnvironment,
  classes: readonly OperationClass[] = OPERATION_CLASS_ORDER,
): CompiledOperationRule[] {
  const fragments = pathFragments(pattern, platform, environment);
  if (fragments.length === 0) {
    return [];
  }
  const pathSource = alternation(fragments);

  const compiled: CompiledOperationRule[] = [];
  for (const rule of getOperationRules(platform, classes)) {
    try {
      compiled.push({
        operation: rule.operation,
        operationClass: rule.operationClass,
        regex: new RegExp(
          rule.template.split(PATH_PLACEHOLDER).join(pathSource),
          'i',
        ),
      });
    } catch (error) {
      logger.warn(
        () =>
          `Skipping ${rule.operation} template for ${pattern.source}: ${getErrorMessage(error)}`,
      );
    }
  }
  return compiled;
}

export interface OperationMatch {
  matched: boolean;
  operation?: string;
  operationClass?: OperationClass;
}

/**
 * Scans the command against compiled rules in order; the first hit wins.
 */
export function matchAny(
  command: string,
  compiledRules: readonly CompiledOperationRule[],
): OperationMatch {
  for (const rule of compiledRules) {
    if (rule.regex.test(command)) {
      return {
        matched: true,
        operation: rule.operation,
        operationClass: rule.operationClass,
      };
    }
  }
  return { matched: false };
}
