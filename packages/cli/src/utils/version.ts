/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

const PackageJsonSchema = z.object({ version: z.string() });

// Source layout first, then the compiled layout under dist/
const PACKAGE_JSON_CANDIDATES = ['../../package.json', '../../../package.json'];

export async function getCliVersion(): Promise<string> {
  for (const candidate of PACKAGE_JSON_CANDIDATES) {
    const file = fileURLToPath(new URL(candidate, import.meta.url));
    if (existsSync(file)) {
      const parsed = PackageJsonSchema.safeParse(
        JSON.parse(await readFile(file, 'utf8')),
      );
      if (parsed.success) {
        return parsed.data.version;
      }
    }
  }
  return 'unknown';
}
