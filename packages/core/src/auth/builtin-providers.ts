/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { ProviderOverride } from '../config/auth-settings.js';
import { ConfigurationError } from './oauth-errors.js';
import { parseProviderConfig } from './provider-registry.js';
import type { ProviderConfig, ProviderConfigInput } from './types.js';

/**
 * Endpoint templates for well-known providers. They carry no client id;
 * one must come from settings before the provider can be registered.
 */
export const BUILTIN_PROVIDER_TEMPLATES: Readonly<
  Record<string, Omit<ProviderConfigInput, 'clientId'>>
> = {
  github: {
    id: 'github',
    displayName: 'GitHub',
    authorizationEndpoint: 'https://github.com/login/oauth/authorize',
    tokenEndpoint: 'https://github.com/login/oauth/access_token',
    deviceCodeEndpoint: 'https://github.com/login/device/code',
  },
  microsoft: {
    id: 'microsoft',
    displayName: 'Microsoft',
    authorizationEndpoint:
      'https://login.microsoftonline.com/{tenant}/oauth2/v2.0/authorize',
    tokenEndpoint:
      'https://login.microsoftonline.com/{tenant}/oauth2/v2.0/token',
    deviceCodeEndpoint:
      'https://login.microsoftonline.com/{tenant}/oauth2/v2.0/devicecode',
    defaultScopes: ['openid', 'profile', 'offline_access', 'email'],
    defaultTenant: 'organizations',
  },
  google: {
    id: 'google',
    displayName: 'Google',
    authorizationEndpoint: 'https://accounts.google.com/o/oauth2/v2/auth',
    tokenEndpoint: 'https://oauth2.googleapis.com/token',
    deviceCodeEndpoint: 'https://oauth2.googleapis.com/device/code',
    revocationEndpoint: 'https://oauth2.googleapis.com/revoke',
    defaultScopes: ['openid', 'email'],
  },
};

function definedEntries(override: ProviderOverride): Record<string, unknown> {
  return Object.fromEntries(
    Object.entries(override).filter(([, value]) => value !== undefined),
  );
}

/**
 * Turns the `providers` settings block into registrable configs. Built-in
 * templates without a client id are skipped; any other id must describe a
 * complete provider.
 */
export function resolveProviderConfigs(
  overrides: Readonly<Record<string, ProviderOverride>>,
): ProviderConfig[] {
  const configs: ProviderConfig[] = [];
  for (const [id, template] of Object.entries(BUILTIN_PROVIDER_TEMPLATES)) {
    const override = overrides[id];
    if (override?.clientId === undefined) {
      continue;
    }
    configs.push(
      parseProviderConfig({ ...template, ...definedEntries(override), id }),
    );
  }

  for (const [id, override] of Object.entries(overrides)) {
    if (id in BUILTIN_PROVIDER_TEMPLATES) {
      continue;
    }
    if (override.clientId === undefined) {
      throw new ConfigurationError(
        `Provider ${id} in settings needs at least a clientId and endpoints`,
        { provider: id },
      );
    }
    configs.push(parseProviderConfig({ ...definedEntries(override), id }));
  }
  return configs;
}
