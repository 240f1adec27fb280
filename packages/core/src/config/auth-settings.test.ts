/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { loadAuthSettings, parseAuthSettings } from './auth-settings.js';
import { ConfigurationError } from '../auth/oauth-errors.js';

describe('parseAuthSettings', () => {
  it('fills in defaults', () => {
    const settings = parseAuthSettings({});

    expect(settings).toEqual({
      loopbackTimeoutMs: 300000,
      deviceCodeTimeoutMs: 900000,
      refreshLeadTimeMs: 300000,
      refreshJitterMs: 0,
      maxRefreshAttempts: 3,
      refreshRetry: {
        baseDelayMs: 1000,
        backoffMultiplier: 2,
        maxDelayMs: 30000,
        jitter: true,
      },
      expirySkewMs: 30000,
      preferredFlow: 'auto',
      loopbackPort: 0,
      providers: {},
    });
  });

  it('rejects invalid values with the offending path', () => {
    expect(() => parseAuthSettings({ maxRefreshAttempts: 0 })).toThrow(
      /^Invalid settings: maxRefreshAttempts: /,
    );
  });
});

describe('loadAuthSettings', () => {
  let tempDir: string;
  let settingsPath: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'tokenloom-settings-'));
    settingsPath = path.join(tempDir, 'settings.json');
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('uses defaults when the file does not exist', () => {
    const settings = loadAuthSettings({ path: settingsPath, env: {} });

    expect(settings.preferredFlow).toBe('auto');
    expect(settings.loopbackPort).toBe(0);
  });

  it('reads the auth block and tolerates comments', () => {
    fs.writeFileSync(
      settingsPath,
      `{
        // prefer the device flow on this machine
        "auth": {
          "preferredFlow": "device_code",
          "providers": { "github": { "clientId": "test-client" } }
        },
        "debug": { "enabled": false }
      }`,
    );

    const settings = loadAuthSettings({ path: settingsPath, env: {} });

    expect(settings.preferredFlow).toBe('device_code');
    expect(settings.providers).toEqual({ github: { clientId: 'test-client' } });
  });

  it('applies environment overrides', () => {
    const settings = loadAuthSettings({
      path: settingsPath,
      env: {
        TOKENLOOM_PREFERRED_FLOW: 'loopback',
        TOKENLOOM_LOOPBACK_PORT: '8765',
      },
    });

    expect(settings.preferredFlow).toBe('loopback');
    expect(settings.loopbackPort).toBe(8765);
  });

  it('rejects an invalid environment override', () => {
    expect(() =>
      loadAuthSettings({
        path: settingsPath,
        env: { TOKENLOOM_LOOPBACK_PORT: 'eighty' },
      }),
    ).toThrow('TOKENLOOM_LOOPBACK_PORT must be a port number (got "eighty")');
  });

  it('names the file when it cannot be parsed', () => {
    fs.writeFileSync(settingsPath, '{ "auth": ');

    expect(() => loadAuthSettings({ path: settingsPath, env: {} })).toThrow(
      ConfigurationError,
    );
    expect(() => loadAuthSettings({ path: settingsPath, env: {} })).toThrow(
      `Failed to read settings from ${settingsPath}`,
    );
  });
});
