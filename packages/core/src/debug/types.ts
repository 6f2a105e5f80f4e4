/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface DebugOutputConfig {
  /** Comma separated sinks: "stderr", "file" or "file,stderr". */
  target: string;
  directory?: string;
}

export interface DebugSettings {
  enabled: boolean;
  namespaces: string[];
  level: LogLevel;
  output: DebugOutputConfig;
  redactPatterns: string[];
}

export interface LogEntry {
  timestamp: string;
  namespace: string;
  level: LogLevel;
  message: string;
  args?: unknown[];
  runId: string;
  pid: number;
}
