/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import * as fs from 'node:fs';
import stripJsonComments from 'strip-json-comments';
import { z } from 'zod';
import { getUserSettingsPath } from '../utils/paths.js';
import type { DebugSettings } from './types.js';

const DebugSettingsFileSchema = z
  .object({
    enabled: z.boolean(),
    namespaces: z.array(z.string()),
    level: z.enum(['debug', 'log', 'warn', 'error']),
    redactPatterns: z.array(z.string()),
  })
  .partial();

export const DEFAULT_REDACT_PATTERNS = [
  'access_token',
  'refresh_token',
  'id_token',
  'code',
  'client_secret',
  'code_verifier',
  'device_code',
  'password',
];

/**
 * Merges debug settings from defaults, the user settings file, the
 * environment and runtime overrides, in that order of precedence.
 */
export class ConfigurationManager {
  private static instance: ConfigurationManager | undefined;

  private readonly defaultConfig: DebugSettings = {
    enabled: false,
    namespaces: [],
    level: 'debug',
    redactPatterns: DEFAULT_REDACT_PATTERNS,
  };
  private userConfig: Partial<DebugSettings> | null = null;
  private envConfig: Partial<DebugSettings> | null = null;
  private ephemeralConfig: Partial<DebugSettings> | null = null;
  private mergedConfig: DebugSettings;
  private readonly listeners: Set<() => void> = new Set();

  static getInstance(): ConfigurationManager {
    if (!ConfigurationManager.instance) {
      ConfigurationManager.instance = new ConfigurationManager();
    }
    return ConfigurationManager.instance;
  }

  private constructor() {
    this.loadConfigurations();
    this.mergedConfig = this.merge();
  }

  loadConfigurations(): void {
    this.loadEnvironmentConfig();
    this.loadUserConfig();
  }

  private loadEnvironmentConfig(): void {
    this.envConfig = null;

    if (process.env['DEBUG']) {
      const namespaces = parseNamespaceList(process.env['DEBUG']).filter(
        (ns) => ns.startsWith('tokenloom') || ns === '*',
      );
      if (namespaces.length > 0) {
        this.envConfig = { enabled: true, namespaces };
      }
    }

    if (process.env['TOKENLOOM_DEBUG']) {
      this.envConfig = {
        enabled: true,
        namespaces: parseNamespaceList(process.env['TOKENLOOM_DEBUG']),
      };
    }

    const level = process.env['DEBUG_LEVEL'];
    if (
      level === 'debug' ||
      level === 'log' ||
      level === 'warn' ||
      level === 'error'
    ) {
      this.envConfig = { ...this.envConfig, level };
    }
  }

  private loadUserConfig(): void {
    this.userConfig = null;
    let configPath: string;
    try {
      configPath = getUserSettingsPath();
    } catch {
      // No resolvable home directory; run on defaults.
      return;
    }
    if (!fs.existsSync(configPath)) {
      return;
    }
    try {
      const parsed: unknown = JSON.parse(
        stripJsonComments(fs.readFileSync(configPath, 'utf8')),
      );
      const debugBlock = z
        .object({ debug: DebugSettingsFileSchema.optional() })
        .passthrough()
        .safeParse(parsed);
      if (debugBlock.success && debugBlock.data.debug) {
        this.userConfig = debugBlock.data.debug;
      }
    } catch (error) {
      console.warn('Failed to load debug settings:', error);
    }
  }

  private merge(): DebugSettings {
    return {
      ...this.defaultConfig,
      ...this.userConfig,
      ...this.envConfig,
      ...this.ephemeralConfig,
    };
  }

  private mergeConfigurations(): void {
    this.mergedConfig = this.merge();
    this.listeners.forEach((listener) => listener());
  }

  setEphemeralConfig(config: Partial<DebugSettings>): void {
    this.ephemeralConfig = {
      ...this.ephemeralConfig,
      ...config,
    };
    this.mergeConfigurations();
  }

  clearEphemeralConfig(): void {
    this.ephemeralConfig = null;
    this.mergeConfigurations();
  }

  getEffectiveConfig(): DebugSettings {
    return this.mergedConfig;
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
}

function parseNamespaceList(value: string): string[] {
  return value
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean);
}
