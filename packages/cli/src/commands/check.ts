/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { CommandModule } from 'yargs';
import {
  PolicyDecision,
  PolicyEngine,
  type Decision,
} from '@shellward/core';
import {
  loadInvocationPolicy,
  readInvocationOptions,
  resolveProjectDir,
  type InvocationOptions,
  type TextSink,
} from '../config/invocation.js';
import {
  evaluateEdit,
  projectRelativePath,
  resolveEditPath,
} from '../hook/tool-router.js';
import { EXIT_ALLOW, EXIT_BLOCK } from '../hook/protocol.js';
import { exitCli } from './utils.js';

export interface CheckIO {
  stdout: TextSink;
  stderr: TextSink;
  cwd?: string;
  homeDir?: string;
  env?: NodeJS.ProcessEnv;
}

function defaultIO(): CheckIO {
  return { stdout: process.stdout, stderr: process.stderr };
}

export function formatDecision(decision: Decision): string {
  switch (decision.decision) {
    case PolicyDecision.ALLOW:
      return 'allow';
    case PolicyDecision.ASK:
      return `ask: ${decision.reason}`;
    case PolicyDecision.BLOCK:
      return `block: ${decision.reason}`;
    default: {
      const exhaustive: never = decision;
      return exhaustive;
    }
  }
}

interface CheckContext {
  engine: PolicyEngine;
  cwd: string;
  projectDir: string;
}

async function createContext(
  options: InvocationOptions,
  io: CheckIO,
): Promise<CheckContext> {
  const cwd = io.cwd ?? process.cwd();
  const projectDir = resolveProjectDir(options, cwd, io.env);
  const config = await loadInvocationPolicy(
    options,
    projectDir,
    io.stderr,
    io.homeDir,
  );
  return {
    engine: new PolicyEngine(config, { platform: options.platform }),
    cwd,
    projectDir,
  };
}

function report(decision: Decision, io: CheckIO): number {
  io.stdout.write(`${formatDecision(decision)}\n`);
  return decision.decision === PolicyDecision.BLOCK ? EXIT_BLOCK : EXIT_ALLOW;
}

/**
 * Evaluates a command line outside the hook protocol.
 *
 * @returns 2 when the command would be blocked, 0 otherwise
 */
export async function handleCheck(
  command: string,
  options: InvocationOptions,
  io: CheckIO = defaultIO(),
): Promise<number> {
  const { engine } = await createContext(options, io);
  return report(engine.evaluateCommand(command), io);
}

/**
 * Evaluates a direct edit of one path. Relative paths resolve against the
 * working directory; paths inside the project are also checked in their
 * project-relative spelling.
 */
export async function handleCheckPath(
  filePath: string,
  options: InvocationOptions,
  io: CheckIO = defaultIO(),
): Promise<number> {
  const { engine, cwd, projectDir } = await createContext(options, io);
  const target = resolveEditPath(filePath, cwd, options.platform);
  const projectPath = projectRelativePath(target, projectDir, options.platform);
  return report(evaluateEdit(target, projectPath, engine), io);
}

function words(value: unknown): string[] {
  if (Array.isArray(value)) {
    return value.map((word) => String(word));
  }
  return value === undefined ? [] : [String(value)];
}

export const checkCommand: CommandModule = {
  command: 'check <command..>',
  describe: 'Evaluate a shell command against the rules',
  builder: (yargs) =>
    yargs
      .positional('command', {
        describe: 'The command line to evaluate',
        type: 'string',
        array: true,
      })
      .example('$0 check -- rm -rf /etc', 'Quote or use -- before options'),
  handler: async (argv) => {
    const exitCode = await handleCheck(
      words(argv['command']).join(' '),
      readInvocationOptions(argv),
    );
    await exitCli(exitCode);
  },
};

export const checkPathCommand: CommandModule = {
  command: 'check-path <path>',
  describe: 'Evaluate a direct file edit against the rules',
  builder: (yargs) =>
    yargs.positional('path', {
      describe: 'The file that would be written',
      type: 'string',
    }),
  handler: async (argv) => {
    const exitCode = await handleCheckPath(
      words(argv['path']).join(' '),
      readInvocationOptions(argv),
    );
    await exitCli(exitCode);
  },
};

