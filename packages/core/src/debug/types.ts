/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export type LogLevel = 'debug' | 'log' | 'warn' | 'error';

export interface DebugSettings {
  enabled: boolean;
  namespaces: string[];
  level: LogLevel;
  redactPatterns: string[];
}

export interface LogEntry {
  timestamp: string;
  namespace: string;
  level: LogLevel;
  message: string;
  args?: unknown[];
  pid: number;
}

/**
 * Destination for formatted log entries.
 */
export interface LogOutput {
  write(entry: LogEntry): void;
}
