/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import createDebug from 'debug';
import type { Debugger } from 'debug';
import { ConfigurationManager } from './ConfigurationManager.js';
import { FileOutput } from './FileOutput.js';
import type { LogEntry, LogLevel } from './types.js';

type MessageOrFn = string | (() => string);

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export class DebugLogger {
  private static instances: Map<string, DebugLogger> = new Map();

  private debugInstance: Debugger;
  private _namespace: string;
  private _configManager: ConfigurationManager;
  private _fileOutput: FileOutput;
  private _enabled: boolean;
  private boundOnConfigChange: () => void;

  /**
   * Returns the cached logger for a namespace, creating it on first use.
   */
  static getLogger(namespace: string): DebugLogger {
    let logger = DebugLogger.instances.get(namespace);
    if (!logger) {
      logger = new DebugLogger(namespace);
      DebugLogger.instances.set(namespace, logger);
    }
    return logger;
  }

  /**
   * Unsubscribes and forgets every cached logger.
   */
  static disposeAll(): void {
    for (const logger of DebugLogger.instances.values()) {
      logger._configManager.unsubscribe(logger.boundOnConfigChange);
    }
    DebugLogger.instances.clear();
  }

  /**
   * Waits for queued file output to be written.
   */
  static async flush(): Promise<void> {
    await FileOutput.getInstance().flush();
  }

  constructor(namespace: string) {
    this._namespace = namespace;
    this.debugInstance = createDebug(namespace);
    this._configManager = ConfigurationManager.getInstance();
    this._fileOutput = FileOutput.getInstance();
    this._enabled = this.checkEnabled();
    // debug's own DEBUG filter would otherwise drop our stderr output
    this.debugInstance.enabled = this._enabled;
    this.boundOnConfigChange = () => this.onConfigChange();
    this._configManager.subscribe(this.boundOnConfigChange);
    this.applyOutputDirectory();
  }

  get namespace(): string {
    return this._namespace;
  }

  get configManager(): ConfigurationManager {
    return this._configManager;
  }

  get fileOutput(): FileOutput {
    return this._fileOutput;
  }

  get enabled(): boolean {
    return this._enabled;
  }

  set enabled(value: boolean) {
    this._enabled = value;
    this.debugInstance.enabled = value;
  }

  debug(messageOrFn: MessageOrFn, ...args: unknown[]): void {
    this.emit('debug', messageOrFn, args);
  }

  log(messageOrFn: MessageOrFn, ...args: unknown[]): void {
    this.emit('info', messageOrFn, args);
  }

  warn(messageOrFn: MessageOrFn, ...args: unknown[]): void {
    this.emit('warn', messageOrFn, args);
  }

  error(messageOrFn: MessageOrFn, ...args: unknown[]): void {
    this.emit('error', messageOrFn, args);
  }

  private emit(level: LogLevel, messageOrFn: MessageOrFn, args: unknown[]): void {
    if (!this._enabled) {
      return;
    }
    const config = this._configManager.getEffectiveConfig();
    if (LEVEL_RANK[level] < LEVEL_RANK[config.level]) {
      return;
    }

    let message: string;
    if (typeof messageOrFn === 'function') {
      try {
        message = messageOrFn();
      } catch (_error) {
        message = '[Error evaluating log function]';
      }
    } else {
      message = messageOrFn;
    }
    message = this.redactSensitive(message);

    const target = this._configManager.getOutputTarget();
    if (target.includes('file')) {
      const entry: LogEntry = {
        timestamp: new Date().toISOString(),
        namespace: this._namespace,
        level,
        message,
        args: args.length > 0 ? args : undefined,
        runId: this._fileOutput.runId,
        pid: process.pid,
      };
      this._fileOutput.write(entry);
    }

    if (target.includes('stderr')) {
      this.debugInstance(`[${level}] ${message}`, ...args);
    }
  }

  checkEnabled(): boolean {
    const config = this._configManager.getEffectiveConfig();
    if (!config.enabled) {
      return false;
    }
    return config.namespaces.some((pattern) =>
      this.matchesPattern(this._namespace, pattern),
    );
  }

  private matchesPattern(namespace: string, pattern: string): boolean {
    if (pattern === namespace) {
      return true;
    }
    if (pattern.includes('*')) {
      const regexPattern = pattern
        .replace(/[.+?^${}()|[\]\\]/g, '\\$&')
        .replace(/\*/g, '.*');
      return new RegExp(`^${regexPattern}$`).test(namespace);
    }
    return false;
  }

  private redactSensitive(message: string): string {
    let result = message;
    for (const pattern of this._configManager.getRedactPatterns()) {
      const regex = new RegExp(`${pattern}["']?[:=]\\s*["']?([^"'\\s]+)`, 'gi');
      result = result.replace(regex, `${pattern}: [REDACTED]`);
    }
    return result;
  }

  private applyOutputDirectory(): void {
    const directory = this._configManager.getEffectiveConfig().output.directory;
    if (directory) {
      this._fileOutput.setDirectory(directory);
    }
  }

  private onConfigChange(): void {
    this.enabled = this.checkEnabled();
    this.applyOutputDirectory();
  }
}
