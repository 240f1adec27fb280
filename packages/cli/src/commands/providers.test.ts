/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import {
  describe,
  it,
  expect,
  vi,
  beforeEach,
  afterEach,
  type MockInstance,
} from 'vitest';
import {
  createAuthenticationService,
  getUserSettingsPath,
  parseAuthSettings,
  type AuthenticationService,
} from '@tokenloom/core';
import { handleProviders } from './providers.js';

describe('handleProviders', () => {
  let consoleLogSpy: MockInstance<typeof console.log>;
  let service: AuthenticationService | undefined;

  beforeEach(() => {
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(async () => {
    await service?.dispose();
    vi.restoreAllMocks();
  });

  function createService(providers: Record<string, unknown>) {
    service = createAuthenticationService({
      presenter: { presentDeviceCode: vi.fn(), openSignIn: vi.fn() },
      settings: parseAuthSettings({ providers }),
    });
    return service;
  }

  it('lists each provider with its flows', () => {
    handleProviders(
      createService({
        github: { clientId: 'test-client' },
        acme: {
          clientId: 'test-client',
          authorizationEndpoint: 'https://auth.example.test/authorize',
          tokenEndpoint: 'https://auth.example.test/token',
        },
      }),
    );

    expect(consoleLogSpy.mock.calls.map(([line]) => line)).toEqual([
      'github GitHub (loopback, device_code)',
      'acme (loopback)',
    ]);
  });

  it('explains where to configure providers when there are none', () => {
    handleProviders(createService({}));

    expect(consoleLogSpy).toHaveBeenCalledWith(
      `No providers configured. Add a clientId under auth.providers in ${getUserSettingsPath()}.`,
    );
  });
});
