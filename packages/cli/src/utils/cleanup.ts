/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { getErrorMessage } from '@shellward/core';

type CleanupFn = (() => void) | (() => Promise<void>);

const cleanupFunctions: CleanupFn[] = [];
let cleanupInProgress = false;

export function registerCleanup(fn: CleanupFn) {
  cleanupFunctions.push(fn);
}

/**
 * Runs every registered cleanup function once, in registration order.
 * A failing function is reported on stderr and the rest still run.
 */
export async function runExitCleanup(
  report: (message: string) => void = (message) =>
    process.stderr.write(`${message}\n`),
) {
  if (cleanupInProgress) return;
  cleanupInProgress = true;

  for (const fn of cleanupFunctions) {
    try {
      await fn();
    } catch (error) {
      report(`Cleanup failed: ${getErrorMessage(error)}`);
    }
  }
  cleanupFunctions.length = 0;
}

/**
 * Reset cleanup state for testing purposes only.
 * @internal
 */
export function __resetCleanupStateForTesting() {
  cleanupFunctions.length = 0;
  cleanupInProgress = false;
}
