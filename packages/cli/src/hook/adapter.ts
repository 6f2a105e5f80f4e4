/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import {
  DebugLogger,
  PolicyDecision,
  PolicyEngine,
  type Decision,
} from '@shellward/core';
import {
  loadInvocationPolicy,
  resolveProjectDir,
  type InvocationOptions,
  type TextSink,
} from '../config/invocation.js';
import { readStdin } from '../utils/readStdin.js';
import {
  EXIT_ALLOW,
  EXIT_BLOCK,
  askOutput,
  parseHookInput,
} from './protocol.js';
import { classifyToolCall, evaluateToolCall } from './tool-router.js';

const logger = DebugLogger.getLogger('shellward:cli:hook');

export interface HookIO {
  stdin: AsyncIterable<string | Buffer>;
  /** Receives only the JSON response. */
  stdout: TextSink;
  stderr: TextSink;
}

export interface HookEnvironment {
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  homeDir?: string;
}

export function processIO(): HookIO {
  return {
    stdin: process.stdin,
    stdout: process.stdout,
    stderr: process.stderr,
  };
}

/**
 * Reports a decision the way the host expects it and returns the exit code.
 */
export function writeDecision(decision: Decision, io: HookIO): number {
  switch (decision.decision) {
    case PolicyDecision.ALLOW:
      return EXIT_ALLOW;
    case PolicyDecision.ASK:
      io.stdout.write(JSON.stringify(askOutput(decision.reason)));
      return EXIT_ALLOW;
    case PolicyDecision.BLOCK:
      io.stderr.write(`Blocked: ${decision.reason}\n`);
      return EXIT_BLOCK;
    default: {
      const exhaustive: never = decision;
      return exhaustive;
    }
  }
}

/**
 * Handles one PreToolUse request.
 *
 * @returns the process exit code: 0 to allow or ask, 2 to block
 * @throws FatalInputError for unreadable input
 * @throws FatalConfigError when the rule files cannot be loaded
 */
export async function runHook(
  options: InvocationOptions,
  io: HookIO,
  environment: HookEnvironment = {},
): Promise<number> {
  const input = parseHookInput(await readStdin(io.stdin));
  const cwd = environment.cwd ?? process.cwd();
  const projectDir = resolveProjectDir(
    options,
    input.cwd ?? cwd,
    environment.env,
  );
  logger.debug(
    () =>
      `${input.tool_name} request, project ${projectDir}, ${options.platform}`,
  );

  const config = await loadInvocationPolicy(
    options,
    projectDir,
    io.stderr,
    environment.homeDir,
  );
  const engine = new PolicyEngine(config, { platform: options.platform });
  const request = classifyToolCall(
    input,
    options.platform,
    cwd,
    projectDir,
  );
  return writeDecision(evaluateToolCall(request, engine), io);
}
