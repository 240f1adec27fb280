/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { parseAuthSettings } from '../config/auth-settings.js';
import { InMemorySecureStorage } from '../storage/secure-storage.js';
import {
  startOAuthTestServer,
  type OAuthTestServer,
} from '../test-utils/oauth-test-server.js';
import {
  createAuthenticationService,
  type AuthenticationService,
} from './authentication-service.js';
import {
  AuthenticationRequiredError,
  CancelledError,
} from './oauth-errors.js';
import type { DeviceCodePrompt, SessionChangeEvent } from './types.js';

const NOW = 1_000_000;

describe('createAuthenticationService', () => {
  let server: OAuthTestServer;
  let service: AuthenticationService;
  let storage: InMemorySecureStorage;
  let prompts: DeviceCodePrompt[];

  beforeEach(async () => {
    server = await startOAuthTestServer();
    storage = new InMemorySecureStorage();
    prompts = [];
    service = createAuthenticationService({
      presenter: {
        presentDeviceCode: (prompt) => {
          prompts.push(prompt);
        },
        openSignIn: vi.fn(),
      },
      settings: parseAuthSettings({
        providers: {
          acme: {
            clientId: 'test-client',
            authorizationEndpoint: 'https://auth.example.test/authorize',
            tokenEndpoint: `${server.url}/token`,
            deviceCodeEndpoint: `${server.url}/device`,
            revocationEndpoint: `${server.url}/revoke`,
          },
        },
      }),
      storage,
      providerOptions: {
        now: () => NOW,
        deviceCode: { sleep: async () => undefined },
      },
      canLaunchBrowser: () => false,
    });
  });

  afterEach(async () => {
    await service.dispose();
    await server.close();
  });

  function replyWithDeviceGrant(): void {
    server.reply('/device', {
      status: 200,
      body: {
        device_code: 'device-123',
        user_code: 'WDJB-MJHT',
        verification_uri: 'https://auth.example.test/device',
        expires_in: 900,
      },
    });
    server.reply('/token', {
      status: 200,
      body: {
        access_token: 'test-access',
        refresh_token: 'test-refresh',
        expires_in: 3600,
      },
    });
  }

  it('registers only the providers that have a client id', () => {
    expect(service.listProviders().map((provider) => provider.id)).toEqual([
      'acme',
    ]);
  });

  it('signs in with the device code flow when headless', async () => {
    replyWithDeviceGrant();
    const events: SessionChangeEvent[] = [];
    service.onDidChangeSessions((event) => events.push(event));

    const session = await service.acquireSession('acme', 'write read', true);

    expect(session).toMatchObject({
      providerId: 'acme',
      account: 'default',
      accessToken: 'test-access',
      refreshToken: 'test-refresh',
      expiresAt: NOW + 3_600_000,
    });
    expect(session.scopes.canonical).toBe('read write');
    expect(prompts.map((prompt) => prompt.userCode)).toEqual(['WDJB-MJHT']);
    expect(server.requests[0].form.get('scope')).toBe('read write');
    expect(service.getSessions('acme')).toEqual([session]);
    expect(events).toHaveLength(1);
  });

  it('does not sign in when not interactive', async () => {
    await expect(
      service.acquireSession('acme', 'read', false),
    ).rejects.toBeInstanceOf(AuthenticationRequiredError);
    expect(server.requests).toEqual([]);
  });

  it('removes a session and revokes its refresh token', async () => {
    replyWithDeviceGrant();
    server.reply('/revoke', { status: 200, body: {} });
    const session = await service.acquireSession('acme', 'read');

    expect(await service.removeSession(session.id)).toBe(true);

    expect(service.getSessions()).toEqual([]);
    expect(storage.keys()).toEqual([]);
    const revocation = server.requests.at(-1);
    expect(revocation?.path).toBe('/revoke');
    expect(revocation?.form.get('token')).toBe('test-refresh');
    expect(await service.removeSession(session.id)).toBe(false);
  });

  it('registers providers at run time', () => {
    service.registerProvider({
      id: 'contoso',
      authorizationEndpoint: 'https://login.example.test/authorize',
      tokenEndpoint: 'https://login.example.test/token',
      clientId: 'test-client',
    });

    expect(service.listProviders().map((provider) => provider.id)).toEqual([
      'acme',
      'contoso',
    ]);
    expect(() =>
      service.registerProvider({
        id: 'acme',
        authorizationEndpoint: 'https://login.example.test/authorize',
        tokenEndpoint: 'https://login.example.test/token',
        clientId: 'test-client',
      }),
    ).toThrow('Provider acme is already registered');
  });

  it('refuses work after dispose', async () => {
    await service.dispose();

    await expect(service.acquireSession('acme', 'read')).rejects.toBeInstanceOf(
      CancelledError,
    );
  });
});
