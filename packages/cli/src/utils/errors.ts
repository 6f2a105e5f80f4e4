/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { FatalError } from '@shellward/core';
import type { TextSink } from '../config/invocation.js';
import { EXIT_ERROR } from '../hook/protocol.js';

/**
 * Prints an error that ended the run and returns the exit code to use.
 * `FatalError`s print their message, in red unless NO_COLOR is set; anything
 * else prints its stack.
 */
export function reportFatalError(
  error: unknown,
  stderr: TextSink = process.stderr,
  env: NodeJS.ProcessEnv = process.env,
): number {
  if (error instanceof FatalError) {
    let errorMessage = error.message;
    if (!env['NO_COLOR']) {
      errorMessage = `\x1b[31m${errorMessage}\x1b[0m`;
    }
    stderr.write(`${errorMessage}\n`);
    return error.exitCode;
  }
  stderr.write('An unexpected critical error occurred:\n');
  if (error instanceof Error) {
    stderr.write(`${error.stack ?? error.message}\n`);
  } else {
    stderr.write(`${String(error)}\n`);
  }
  return EXIT_ERROR;
}
