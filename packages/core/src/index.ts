/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

// Export policy engine
export * from './policy/types.js';
export * from './policy/path-matcher.js';
export * from './policy/command-patterns.js';
export * from './policy/config.js';
export * from './policy/policy-engine.js';
export * from './policy/toml-loader.js';
export * from './policy/rule-sources.js';

// Export utilities
export * from './utils/paths.js';
export * from './utils/errors.js';

// Export debug logging
export * from './debug/types.js';
export { DebugLogger } from './debug/DebugLogger.js';
export { ConfigurationManager } from './debug/ConfigurationManager.js';
export { FileOutput } from './debug/FileOutput.js';
