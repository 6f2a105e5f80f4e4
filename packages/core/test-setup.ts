/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

// Debug settings from the developer's shell would leak into logger tests
for (const name of [
  'DEBUG',
  'SHELLWARD_DEBUG',
  'SHELLWARD_DEBUG_LEVEL',
  'SHELLWARD_DEBUG_OUTPUT',
]) {
  delete process.env[name];
}
