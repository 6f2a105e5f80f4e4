/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import * as path from 'node:path';
import {
  Platform,
  PolicyDecision,
  type Decision,
  type PolicyEngine,
} from '@shellward/core';
import type { HookInput } from './protocol.js';

/** Tools whose input carries a shell command line. */
export const COMMAND_TOOLS: Readonly<Record<string, string>> = {
  Bash: 'command',
};

/** Tools that write a file directly, and the input field naming it. */
export const EDIT_TOOLS: Readonly<Record<string, string>> = {
  Edit: 'file_path',
  MultiEdit: 'file_path',
  Write: 'file_path',
  NotebookEdit: 'notebook_path',
};

export type ToolRequest =
  | { kind: 'command'; command: string }
  | {
      kind: 'edit';
      path: string;
      /** The same file spelled relative to the project root. */
      projectPath?: string;
    }
  | { kind: 'other'; toolName: string };

function stringField(input: Record<string, unknown>, field: string): string {
  const value = input[field];
  return typeof value === 'string' ? value : '';
}

/**
 * Resolves a relative edit path against the request's working directory,
 * using the path rules of the target platform.
 */
export function resolveEditPath(
  filePath: string,
  cwd: string,
  platform: Platform,
): string {
  if (filePath === '') {
    return filePath;
  }
  const pathApi = platform === Platform.WINDOWS ? path.win32 : path.posix;
  return pathApi.isAbsolute(filePath) ? filePath : pathApi.join(cwd, filePath);
}

/**
 * Spells `target` relative to `projectDir`, or returns undefined when it lies
 * outside the project. Rule entries such as `.git/` or `package-lock.json`
 * only match this spelling.
 */
export function projectRelativePath(
  target: string,
  projectDir: string,
  platform: Platform,
): string | undefined {
  if (target === '') {
    return undefined;
  }
  const pathApi = platform === Platform.WINDOWS ? path.win32 : path.posix;
  const relative = pathApi.relative(projectDir, target);
  if (
    relative === '' ||
    relative === '..' ||
    relative.startsWith(`..${pathApi.sep}`) ||
    pathApi.isAbsolute(relative)
  ) {
    return undefined;
  }
  return relative;
}

export function classifyToolCall(
  input: HookInput,
  platform: Platform,
  fallbackCwd: string,
  projectDir?: string,
): ToolRequest {
  const commandField = COMMAND_TOOLS[input.tool_name];
  if (commandField !== undefined) {
    return {
      kind: 'command',
      command: stringField(input.tool_input, commandField),
    };
  }

  const pathField = EDIT_TOOLS[input.tool_name];
  if (pathField !== undefined) {
    const target = resolveEditPath(
      stringField(input.tool_input, pathField),
      input.cwd ?? fallbackCwd,
      platform,
    );
    return {
      kind: 'edit',
      path: target,
      projectPath:
        projectDir === undefined
          ? undefined
          : projectRelativePath(target, projectDir, platform),
    };
  }

  return { kind: 'other', toolName: input.tool_name };
}

/**
 * Checks the absolute spelling first, then the project-relative one.
 */
export function evaluateEdit(
  target: string,
  projectPath: string | undefined,
  engine: PolicyEngine,
): Decision {
  const decision = engine.evaluatePathEdit(target);
  if (decision.decision !== PolicyDecision.ALLOW || projectPath === undefined) {
    return decision;
  }
  return engine.evaluatePathEdit(projectPath);
}

export function evaluateToolCall(
  request: ToolRequest,
  engine: PolicyEngine,
): Decision {
  switch (request.kind) {
    case 'command':
      return engine.evaluateCommand(request.command);
    case 'edit':
      return evaluateEdit(request.path, request.projectPath, engine);
    case 'other':
      return { decision: PolicyDecision.ALLOW };
    default: {
      const exhaustive: never = request;
      return exhaustive;
    }
  }
}
