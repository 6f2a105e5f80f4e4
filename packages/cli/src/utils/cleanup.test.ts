/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { beforeEach, describe, expect, it } from 'vitest';
import {
  __resetCleanupStateForTesting,
  registerCleanup,
  runExitCleanup,
} from './cleanup.js';

describe('cleanup', () => {
  beforeEach(() => {
    __resetCleanupStateForTesting();
  });

  it('should execute registered functions in order', async () => {
    const executionOrder: number[] = [];

    registerCleanup(() => {
      executionOrder.push(1);
    });
    registerCleanup(async () => {
      executionOrder.push(2);
    });

    await runExitCleanup();

    expect(executionOrder).toEqual([1, 2]);
  });

  it('should report a failing function and keep going', async () => {
    const reports: string[] = [];
    let secondRan = false;

    registerCleanup(() => {
      throw new Error('flush failed');
    });
    registerCleanup(() => {
      secondRan = true;
    });

    await runExitCleanup((message) => reports.push(message));

    expect(secondRan).toBe(true);
    expect(reports).toEqual(['Cleanup failed: flush failed']);
  });

  it('should run only once', async () => {
    let runs = 0;
    registerCleanup(() => {
      runs += 1;
    });

    await runExitCleanup();
    await runExitCleanup();

    expect(runs).toBe(1);
  });
});
