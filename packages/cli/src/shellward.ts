/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { hideBin } from 'yargs/helpers';
import { DebugLogger } from '@shellward/core';
import { createParser } from './config/parser.js';
import { registerCleanup } from './utils/cleanup.js';
import { getCliVersion } from './utils/version.js';

export async function main(args: string[] = hideBin(process.argv)) {
  registerCleanup(() => DebugLogger.flush());
  const parser = createParser(args, await getCliVersion());
  await parser.parseAsync();
}
