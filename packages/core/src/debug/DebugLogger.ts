/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import createDebug from 'debug';
import type { Debugger } from 'debug';
import { ConfigurationManager } from './ConfigurationManager.js';
import type { LogEntry, LogLevel, LogOutput } from './types.js';

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 0,
  log: 1,
  warn: 2,
  error: 3,
};

/**
 * Forwards entries to the `debug` package, which writes to stderr.
 */
class DebugPackageOutput implements LogOutput {
  constructor(private readonly debugInstance: Debugger) {}

  write(entry: LogEntry): void {
    const prefix =
      entry.level === 'warn' || entry.level === 'error'
        ? `[${entry.level}] `
        : '';
    this.debugInstance(`${prefix}${entry.message}`, ...(entry.args ?? []));
  }
}

export class DebugLogger {
  private static instances: Map<string, DebugLogger> = new Map();

  private readonly debugInstance: Debugger;
  private readonly _namespace: string;
  private readonly _configManager: ConfigurationManager;
  private _output: LogOutput;
  private _enabled: boolean;
  private _level: LogLevel;
  private readonly boundOnConfigChange: () => void;

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

  static disposeAll(): void {
    for (const logger of DebugLogger.instances.values()) {
      logger._configManager.unsubscribe(logger.boundOnConfigChange);
    }
    DebugLogger.instances.clear();
  }

  constructor(namespace: string) {
    this._namespace = namespace;
    this.debugInstance = createDebug(namespace);
    this._configManager = ConfigurationManager.getInstance();
    this._output = new DebugPackageOutput(this.debugInstance);
    this._level = this._configManager.getEffectiveConfig().level;
    this._enabled = this.checkEnabled();
    this.debugInstance.enabled = this._enabled;
    this.boundOnConfigChange = () => this.onConfigChange();
    this._configManager.subscribe(this.boundOnConfigChange);
  }

  get namespace(): string {
    return this._namespace;
  }

  get enabled(): boolean {
    return this._enabled;
  }

  set enabled(value: boolean) {
    this._enabled = value;
    this.debugInstance.enabled = value;
  }

  get level(): LogLevel {
    return this._level;
  }

  set level(value: LogLevel) {
    this._level = value;
  }

  get configManager(): ConfigurationManager {
    return this._configManager;
  }

  get output(): LogOutput {
    return this._output;
  }

  set output(value: LogOutput) {
    this._output = value;
  }

  debug(messageOrFn: string | (() => string), ...args: unknown[]): void {
    this.write('debug', messageOrFn, args);
  }

  log(messageOrFn: string | (() => string), ...args: unknown[]): void {
    this.write('log', messageOrFn, args);
  }

  warn(messageOrFn: string | (() => string), ...args: unknown[]): void {
    this.write('warn', messageOrFn, args);
  }

  error(messageOrFn: string | (() => string), ...args: unknown[]): void {
    this.write('error', messageOrFn, args);
  }

  private write(
    level: LogLevel,
    messageOrFn: string | (() => string),
    args: unknown[],
  ): void {
    if (!this._enabled || LEVEL_RANK[level] < LEVEL_RANK[this._level]) {
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

    this._output.write({
      timestamp: new Date().toISOString(),
      namespace: this._namespace,
      level,
      message: this.redactSensitive(message),
      args: args.length > 0 ? args : undefined,
      pid: process.pid,
    });
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
      const escaped = pattern.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
      const regex = new RegExp(
        `(${escaped}["']?\\s*[:=]\\s*["']?)[^"'\\s&,}]+`,
        'gi',
      );
      result = result.replace(regex, '$1[REDACTED]');
    }
    return result;
  }

  private onConfigChange(): void {
    this._level = this._configManager.getEffectiveConfig().level;
    this.enabled = this.checkEnabled();
  }

  dispose(): void {
    this._configManager.unsubscribe(this.boundOnConfigChange);
    if (DebugLogger.instances.get(this._namespace) === this) {
      DebugLogger.instances.delete(this._namespace);
    }
  }
}
