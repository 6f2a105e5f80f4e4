/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { z } from 'zod';
import { getUserShellwardDir } from '../utils/paths.js';
import type { DebugSettings, LogLevel } from './types.js';

const LEVELS = ['debug', 'info', 'warn', 'error'] as const;

const DebugSettingsFileSchema = z
  .object({
    enabled: z.boolean(),
    namespaces: z.array(z.string()),
    level: z.enum(LEVELS),
    output: z.object({
      target: z.string(),
      directory: z.string().optional(),
    }),
    redactPatterns: z.array(z.string()),
  })
  .partial();

const SettingsFileSchema = z.object({
  debug: DebugSettingsFileSchema.optional(),
});

function isLogLevel(value: string): value is LogLevel {
  return (LEVELS as readonly string[]).includes(value);
}

/**
 * Resolves debug settings from defaults, ~/.shellward/settings.json, the
 * environment and the command line, in increasing priority.
 */
export class ConfigurationManager {
  private static instance: ConfigurationManager | undefined;

  private readonly defaultConfig: DebugSettings;
  private userConfig: Partial<DebugSettings> | null = null;
  private envConfig: Partial<DebugSettings> | null = null;
  private cliConfig: Partial<DebugSettings> | null = null;
  private ephemeralConfig: Partial<DebugSettings> | null = null;
  private mergedConfig: DebugSettings;
  private listeners: Set<() => void> = new Set();

  static getInstance(): ConfigurationManager {
    if (!ConfigurationManager.instance) {
      ConfigurationManager.instance = new ConfigurationManager();
    }
    return ConfigurationManager.instance;
  }

  static resetForTesting(): void {
    ConfigurationManager.instance = undefined;
  }

  private constructor() {
    this.defaultConfig = {
      enabled: false,
      namespaces: [],
      level: 'debug',
      output: {
        target: 'stderr',
        directory: path.join(getUserShellwardDir(), 'debug'),
      },
      redactPatterns: ['token', 'password', 'secret'],
    };
    this.loadUserConfig();
    this.loadEnvironmentConfig();
    this.mergedConfig = this.merge();
  }

  private loadEnvironmentConfig(): void {
    let config: Partial<DebugSettings> = {};

    // DEBUG is shared with other tools; only our namespaces count
    const debugEnv = process.env['DEBUG'];
    if (debugEnv) {
      const namespaces = this.parseNamespaces(debugEnv).filter(
        (ns) => ns.startsWith('shellward') || ns === '*',
      );
      if (namespaces.length > 0) {
        config = { enabled: true, namespaces };
      }
    }

    const shellwardDebug = process.env['SHELLWARD_DEBUG'];
    if (shellwardDebug) {
      config = {
        enabled: true,
        namespaces: this.parseNamespaces(shellwardDebug),
      };
    }

    const level = process.env['SHELLWARD_DEBUG_LEVEL'];
    if (level && isLogLevel(level)) {
      config = { ...config, level };
    }

    const output = process.env['SHELLWARD_DEBUG_OUTPUT'];
    if (output) {
      config = {
        ...config,
        output: { ...this.defaultConfig.output, target: output },
      };
    }

    this.envConfig = Object.keys(config).length > 0 ? config : null;
  }

  private loadUserConfig(): void {
    const configPath = path.join(getUserShellwardDir(), 'settings.json');
    if (!fs.existsSync(configPath)) {
      return;
    }
    try {
      const parsed = SettingsFileSchema.safeParse(
        JSON.parse(fs.readFileSync(configPath, 'utf8')),
      );
      if (parsed.success && parsed.data.debug) {
        const { output, ...rest } = parsed.data.debug;
        this.userConfig = output
          ? { ...rest, output: { ...this.defaultConfig.output, ...output } }
          : rest;
      } else if (!parsed.success) {
        console.warn(`Ignoring invalid debug settings in ${configPath}`);
      }
    } catch (error) {
      console.warn(`Failed to load debug settings from ${configPath}:`, error);
    }
  }

  private merge(): DebugSettings {
    return [
      this.userConfig,
      this.envConfig,
      this.cliConfig,
      this.ephemeralConfig,
    ].reduce<DebugSettings>(
      (merged, config) => (config ? { ...merged, ...config } : merged),
      this.defaultConfig,
    );
  }

  private mergeConfigurations(): void {
    this.mergedConfig = this.merge();
    this.listeners.forEach((listener) => listener());
  }

  setCliConfig(config: Partial<DebugSettings>): void {
    this.cliConfig = config;
    this.mergeConfigurations();
  }

  setEphemeralConfig(config: Partial<DebugSettings>): void {
    this.ephemeralConfig = { ...this.ephemeralConfig, ...config };
    this.mergeConfigurations();
  }

  getEffectiveConfig(): DebugSettings {
    return this.mergedConfig;
  }

  getOutputTarget(): string {
    return this.mergedConfig.output.target;
  }

  getRedactPatterns(): string[] {
    return this.mergedConfig.redactPatterns;
  }

  subscribe(listener: () => void): void {
    this.listeners.add(listener);
  }

  unsubscribe(listener: () => void): void {
    this.listeners.delete(listener);
  }

  private parseNamespaces(value: string): string[] {
    return value
      .split(',')
      .map((s) => s.trim())
      .filter(Boolean);
  }
}
