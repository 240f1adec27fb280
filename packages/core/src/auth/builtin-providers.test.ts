/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, it, expect } from 'vitest';
import { parseAuthSettings } from '../config/auth-settings.js';
import { resolveProviderConfigs } from './builtin-providers.js';
import { ConfigurationError } from './oauth-errors.js';
import { normalizeScopes } from './scope-normalizer.js';
import { resolveEndpoints } from './token-client.js';

function resolve(providers: Record<string, unknown>) {
  return resolveProviderConfigs(parseAuthSettings({ providers }).providers);
}

describe('resolveProviderConfigs', () => {
  it('skips built-in templates without a client id', () => {
    expect(resolve({})).toEqual([]);
    expect(resolve({ github: { displayName: 'GitHub Enterprise' } })).toEqual(
      [],
    );
  });

  it('completes a built-in template with the configured client id', () => {
    const [github] = resolve({ github: { clientId: 'test-client' } });

    expect(github).toMatchObject({
      id: 'github',
      clientId: 'test-client',
      tokenEndpoint: 'https://github.com/login/oauth/access_token',
      deviceCodeEndpoint: 'https://github.com/login/device/code',
      defaultScopes: [],
    });
  });

  it('lets settings override template fields', () => {
    const [microsoft] = resolve({
      microsoft: { clientId: 'test-client', defaultTenant: 'contoso' },
    });

    expect(microsoft.defaultScopes).toEqual([
      'openid',
      'profile',
      'offline_access',
      'email',
    ]);
    const endpoints = resolveEndpoints(
      microsoft,
      normalizeScopes(microsoft, 'User.Read'),
    );
    expect(endpoints.tokenEndpoint).toBe(
      'https://login.microsoftonline.com/contoso/oauth2/v2.0/token',
    );
  });

  it('accepts a complete custom provider', () => {
    const configs = resolve({
      acme: {
        clientId: 'test-client',
        authorizationEndpoint: 'https://auth.example.test/authorize',
        tokenEndpoint: 'https://auth.example.test/token',
      },
    });

    expect(configs.map((config) => config.id)).toEqual(['acme']);
  });

  it('rejects an incomplete custom provider', () => {
    expect(() =>
      resolve({ acme: { tokenEndpoint: 'https://auth.example.test/token' } }),
    ).toThrow(
      'Provider acme in settings needs at least a clientId and endpoints',
    );
    expect(() => resolve({ acme: { clientId: 'test-client' } })).toThrow(
      ConfigurationError,
    );
  });
});
