/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Path classification, expansion and matching for protected-path rules.
 *
 * Literal patterns match a candidate equal to them or located beneath them
 * (prefix ending on a separator). Glob patterns match the candidate's final
 * component, and the whole normalized path when the pattern itself contains
 * a separator. In globs `*` and `?` never cross whitespace or separators.
 */

import * as os from 'node:os';
import * as path from 'node:path';
import {
  Platform,
  type PathEnvironment,
  type PathPattern,
} from './types.js';

const GLOB_CHARS = /[*?[]/;
const VARIABLE_NAME = '[A-Za-z_][A-Za-z0-9_]*';
const POSIX_VARIABLE = new RegExp(
  `\\$\\{(${VARIABLE_NAME})\\}|\\$(${VARIABLE_NAME})`,
  'g',
);
const POWERSHELL_VARIABLE = new RegExp(`\\$env:(${VARIABLE_NAME})`, 'gi');
const CMD_VARIABLE = /%([^%\s]+)%/g;
const REGEX_SPECIALS = /[.*+?^${}()|[\]\\/-]/g;

export function isGlob(pattern: string): boolean {
  return GLOB_CHARS.test(pattern);
}

/**
 * Classifies a configured path once so matching sites never re-inspect it.
 */
export function createPathPattern(source: string): PathPattern {
  return isGlob(source)
    ? { kind: 'glob', source }
    : { kind: 'literal', source };
}

export function defaultPathEnvironment(): PathEnvironment {
  return { home: os.homedir(), env: { ...process.env } };
}

export function separatorFor(platform: Platform): string {
  return platform === Platform.WINDOWS ? '\\' : '/';
}

function pathApi(platform: Platform): path.PlatformPath {
  return platform === Platform.WINDOWS ? path.win32 : path.posix;
}

function lookupVariable(
  name: string,
  platform: Platform,
  environment: PathEnvironment,
): string | undefined {
  if (platform !== Platform.WINDOWS) {
    return environment.env[name];
  }
  // Windows environment names are case-insensitive
  const wanted = name.toUpperCase();
  for (const [key, value] of Object.entries(environment.env)) {
    if (key.toUpperCase() === wanted) {
      return value;
    }
  }
  return undefined;
}

function expandHome(
  input: string,
  platform: Platform,
  environment: PathEnvironment,
): string {
  if (input === '~') {
    return environment.home;
  }
  if (
    input.startsWith('~/') ||
    (platform === Platform.WINDOWS && input.startsWith('~\\'))
  ) {
    return environment.home + input.slice(1);
  }
  return input;
}

/**
 * Resolves a leading `~` and environment references. Unknown variables are
 * left exactly as written.
 */
export function expandPath(
  input: string,
  platform: Platform,
  environment: PathEnvironment = defaultPathEnvironment(),
): string {
  let result = expandHome(input, platform, environment);

  if (platform === Platform.WINDOWS) {
    result = result.replace(
      POWERSHELL_VARIABLE,
      (match: string, name: string) =>
        lookupVariable(name, platform, environment) ?? match,
    );
    result = result.replace(
      CMD_VARIABLE,
      (match: string, name: string) =>
        lookupVariable(name, platform, environment) ?? match,
    );
  }

  return result.replace(
    POSIX_VARIABLE,
    (match: string, braced: string | undefined, bare: string | undefined) => {
      const name = braced ?? bare;
      if (name === undefined) {
        return match;
      }
      return lookupVariable(name, platform, environment) ?? match;
    },
  );
}

function trimTrailingSeparators(input: string, platform: Platform): string {
  const separator = separatorFor(platform);
  let result = input;
  while (result.length > 1 && result.endsWith(separator)) {
    // Keep filesystem roots such as "/" and "c:\"
    if (platform === Platform.WINDOWS && /^[A-Za-z]:\\$/.test(result)) {
      break;
    }
    result = result.slice(0, -1);
  }
  return result;
}

/**
 * Expands, collapses redundant separators and dot segments, and lower-cases
 * on Windows.
 */
export function normalizePath(
  input: string,
  platform: Platform,
  environment: PathEnvironment = defaultPathEnvironment(),
): string {
  const expanded = expandPath(input, platform, environment);
  if (expanded === '') {
    return expanded;
  }
  const normalized = trimTrailingSeparators(
    pathApi(platform).normalize(expanded),
    platform,
  );
  return platform === Platform.WINDOWS ? normalized.toLowerCase() : normalized;
}

export function matchLiteral(
  candidate: string,
  pattern: string,
  platform: Platform,
  environment: PathEnvironment = defaultPathEnvironment(),
): boolean {
  if (candidate === '' || pattern === '') {
    return false;
  }
  const normalizedCandidate = normalizePath(candidate, platform, environment);
  const normalizedPattern = normalizePath(pattern, platform, environment);
  if (normalizedCandidate === normalizedPattern) {
    return true;
  }
  const separator = separatorFor(platform);
  const prefix = normalizedPattern.endsWith(separator)
    ? normalizedPattern
    : normalizedPattern + separator;
  return normalizedCandidate.startsWith(prefix);
}

export function escapeRegExp(input: string): string {
  return input.replace(REGEX_SPECIALS, '\\$&');
}

/**
 * Translates a glob into an unanchored regular expression source, or
 * returns null when the glob is malformed (unclosed or empty `[...]`).
 */
export function globToRegExpSource(
  glob: string,
  platform: Platform,
): string | null {
  const segmentChar =
    platform === Platform.WINDOWS ? '[^\\s/\\\\]' : '[^\\s/]';
  let source = '';

  for (let i = 0; i < glob.length; i++) {
    const ch = glob[i];

    if (ch === '*') {
      while (glob[i + 1] === '*') {
        i++;
      }
      source += `${segmentChar}*`;
      continue;
    }

    if (ch === '?') {
      source += segmentChar;
      continue;
    }

    if (ch === '[') {
      let bodyStart = i + 1;
      const negated = glob[bodyStart] === '!' || glob[bodyStart] === '^';
      if (negated) {
        bodyStart++;
      }
      const close = glob.indexOf(']', bodyStart);
      if (close === -1 || close === bodyStart) {
        return null;
      }
      const body = glob.slice(bodyStart, close).replace(/[\\\]^]/g, '\\$&');
      source += `[${negated ? '^' : ''}${body}]`;
      i = close;
      continue;
    }

    source += escapeRegExp(ch);
  }

  return source;
}

/**
 * Compiles a glob into an anchored, case-insensitive RegExp.
 * Returns null instead of throwing for globs that cannot compile.
 */
export function compileGlob(glob: string, platform: Platform): RegExp | null {
  const source = globToRegExpSource(glob, platform);
  if (source === null) {
    return null;
  }
  try {
    return new RegExp(`^${source}$`, 'i');
  } catch {
    return null;
  }
}

function containsSeparator(pattern: string, platform: Platform): boolean {
  return (
    pattern.includes('/') ||
    (platform === Platform.WINDOWS && pattern.includes('\\'))
  );
}

export function matchGlob(
  candidate: string,
  pattern: string,
  platform: Platform,
  environment: PathEnvironment = defaultPathEnvironment(),
): boolean {
  if (candidate === '' || pattern === '') {
    return false;
  }
  const normalizedCandidate = normalizePath(candidate, platform, environment);
  const basename = pathApi(platform).basename(normalizedCandidate);

  const basenameRegex = compileGlob(pattern, platform);
  if (basenameRegex?.test(basename)) {
    return true;
  }

  if (!containsSeparator(pattern, platform)) {
    return false;
  }

  const fullRegex = compileGlob(
    normalizePath(pattern, platform, environment),
    platform,
  );
  return fullRegex?.test(normalizedCandidate) ?? false;
}

/**
 * Dispatches on the pattern's classification.
 */
export function matchPathPattern(
  candidate: string,
  pattern: PathPattern,
  platform: Platform,
  environment: PathEnvironment = defaultPathEnvironment(),
): boolean {
  switch (pattern.kind) {
    case 'glob':
      return matchGlob(candidate, pattern.source, platform, environment);
    case 'literal':
      return matchLiteral(candidate, pattern.source, platform, environment);
    default: {
      const exhaustive: never = pattern;
      return exhaustive;
    }
  }
}
