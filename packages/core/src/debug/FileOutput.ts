/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { promises as fs } from 'node:fs';
import { join } from 'node:path';
import { getUserShellwardDir } from '../utils/paths.js';
import type { LogEntry } from './types.js';

const LOG_FILE_DATE_LENGTH = 10;

/**
 * Batches log entries and appends them as JSON lines. Hook processes are
 * short-lived, so callers flush before exiting.
 */
export class FileOutput {
  private static instance: FileOutput | undefined;
  private debugDir: string;
  private currentLogFile: string;
  private writeQueue: LogEntry[] = [];
  private pendingFlush: Promise<void> | null = null;
  private flushTimeout: NodeJS.Timeout | null = null;
  private disposed = false;
  private readonly maxQueueSize = 1000;
  private readonly flushInterval = 250;
  private readonly debugRunId: string;

  private constructor(debugDir?: string) {
    this.debugDir = debugDir ?? join(getUserShellwardDir(), 'debug');
    this.debugRunId =
      process.env['SHELLWARD_DEBUG_RUN_ID'] || String(process.pid);
    this.currentLogFile = this.generateLogFileName();
  }

  get runId(): string {
    return this.debugRunId;
  }

  get logFile(): string {
    return this.currentLogFile;
  }

  static getInstance(): FileOutput {
    if (!FileOutput.instance) {
      FileOutput.instance = new FileOutput();
    }
    return FileOutput.instance;
  }

  static resetForTesting(debugDir?: string): FileOutput {
    FileOutput.instance = new FileOutput(debugDir);
    return FileOutput.instance;
  }

  /**
   * Points subsequent writes at a different directory.
   */
  setDirectory(directory: string): void {
    if (directory !== this.debugDir) {
      this.debugDir = directory;
      this.currentLogFile = this.generateLogFileName();
    }
  }

  write(entry: LogEntry): void {
    if (this.disposed) {
      return;
    }
    this.writeQueue.push(entry);
    if (this.writeQueue.length > this.maxQueueSize) {
      this.writeQueue = this.writeQueue.slice(-this.maxQueueSize);
    }
    this.scheduleFlush();
  }

  async flush(): Promise<void> {
    if (this.flushTimeout) {
      clearTimeout(this.flushTimeout);
      this.flushTimeout = null;
    }
    while (this.pendingFlush || this.writeQueue.length > 0) {
      if (this.pendingFlush) {
        await this.pendingFlush;
        continue;
      }
      this.pendingFlush = this.flushQueue().finally(() => {
        this.pendingFlush = null;
      });
    }
  }

  async dispose(): Promise<void> {
    await this.flush();
    this.disposed = true;
  }

  private scheduleFlush(): void {
    if (this.flushTimeout) {
      return;
    }
    this.flushTimeout = setTimeout(() => {
      this.flushTimeout = null;
      this.flush().catch((error: unknown) => {
        process.stderr.write(`FileOutput: flush failed: ${String(error)}\n`);
      });
    }, this.flushInterval);
    // A pending flush must not keep a finished hook process alive
    this.flushTimeout.unref();
  }

  private async flushQueue(): Promise<void> {
    const entries = this.writeQueue.splice(0, this.writeQueue.length);
    if (entries.length === 0) {
      return;
    }
    const jsonl = entries.map((entry) => JSON.stringify(entry)).join('\n');
    try {
      await fs.mkdir(this.debugDir, { recursive: true, mode: 0o700 });
      await fs.appendFile(this.currentLogFile, jsonl + '\n', {
        encoding: 'utf8',
        mode: 0o600,
      });
    } catch (error) {
      // Report and drop the batch
      process.stderr.write(
        `FileOutput: failed to write ${entries.length} log entries: ${String(error)}\n`,
      );
    }
  }

  private generateLogFileName(): string {
    const datePart = new Date().toISOString().slice(0, LOG_FILE_DATE_LENGTH);
    return join(
      this.debugDir,
      `shellward-debug-${datePart}-${this.debugRunId}.jsonl`,
    );
  }
}
