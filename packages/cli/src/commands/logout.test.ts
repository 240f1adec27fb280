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
  type AuthenticationService,
} from '@tokenloom/core';
import { handleLogout } from './logout.js';
import { exitCli } from './utils.js';

vi.mock('./utils.js', async (importOriginal) => {
  const actual = await importOriginal<typeof import('./utils.js')>();
  return { ...actual, exitCli: vi.fn() };
});

describe('handleLogout', () => {
  let consoleLogSpy: MockInstance<typeof console.log>;
  let consoleErrorSpy: MockInstance<typeof console.error>;
  let service: AuthenticationService;

  beforeEach(() => {
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    consoleErrorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    service = createAuthenticationService({
      presenter: { presentDeviceCode: vi.fn(), openSignIn: vi.fn() },
    });
    service.registerProvider({
      id: 'acme',
      authorizationEndpoint: 'https://auth.example.test/authorize',
      tokenEndpoint: 'https://auth.example.test/token',
      clientId: 'test-client',
    });
  });

  afterEach(async () => {
    await service.dispose();
    vi.restoreAllMocks();
    vi.mocked(exitCli).mockClear();
  });

  it('signs out of a cached session', async () => {
    const provider = service.listProviders()[0];
    vi.spyOn(provider, 'startFlow').mockResolvedValue({
      accessToken: 'test-access',
      expiresAt: Date.now() + 60 * 60 * 1000,
    });
    await service.acquireSession('acme', 'read');

    await handleLogout(service, { provider: 'acme', scopes: ['read'] });

    expect(consoleLogSpy).toHaveBeenCalledWith(
      'Signed out of acme (default).',
    );
    expect(service.getSessions()).toEqual([]);
  });

  it('says so when there is nothing to sign out', async () => {
    await handleLogout(service, { provider: 'acme', scopes: [] });

    expect(consoleLogSpy).toHaveBeenCalledWith('No stored session for acme.');
    expect(exitCli).not.toHaveBeenCalled();
  });

  it('reports other failures and exits with status 1', async () => {
    await handleLogout(service, { provider: 'nope', scopes: [] });

    expect(consoleErrorSpy).toHaveBeenCalledWith(
      'Logout failed: Unknown provider: nope',
    );
    expect(exitCli).toHaveBeenCalledWith(1);
  });
});
