/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import * as os from 'node:os';
import * as path from 'node:path';

export const SHELLWARD_DIR = '.shellward';

/**
 * Directory holding per-user rules, settings and debug logs.
 * Falls back to the working directory when no home is available.
 */
export function getUserShellwardDir(homeDir: string = os.homedir()): string {
  return homeDir
    ? path.join(homeDir, SHELLWARD_DIR)
    : path.join(process.cwd(), SHELLWARD_DIR);
}
