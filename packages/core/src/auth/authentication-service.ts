/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import {
  parseAuthSettings,
  type AuthSettings,
} from '../config/auth-settings.js';
import { DebugLogger } from '../debug/index.js';
import {
  InMemorySecureStorage,
  type SecureStorage,
} from '../storage/secure-storage.js';
import { resolveProviderConfigs } from './builtin-providers.js';
import {
  ProviderRegistry,
  type AuthProvider,
  type OAuthProviderOptions,
  type RegisterOptions,
} from './provider-registry.js';
import { SessionStore, type AcquireOptions } from './session-store.js';
import type {
  AuthPresenter,
  ProviderConfigInput,
  Session,
  SessionChangeEvent,
} from './types.js';

const logger = DebugLogger.getLogger('tokenloom:auth:service');

/**
 * The surface a host application talks to. Sessions come from the store;
 * providers from the registry.
 */
export class AuthenticationService {
  constructor(
    private readonly registry: ProviderRegistry,
    private readonly store: SessionStore,
  ) {}

  /**
   * Returns a session whose scopes cover `scopes`. With `interactive`
   * false only cached and stored credentials are used, and a missing
   * session is an AuthenticationRequiredError.
   */
  acquireSession(
    providerId: string,
    scopes: string | readonly string[],
    interactive = true,
    options: Omit<AcquireOptions, 'interactive'> = {},
  ): Promise<Session> {
    return this.store.acquire(providerId, scopes, { ...options, interactive });
  }

  getSessions(providerId?: string): Session[] {
    return this.store.getSessions(providerId);
  }

  /** Signs the session out. False when no session has that id. */
  async removeSession(sessionId: string): Promise<boolean> {
    const session = this.store.getSession(sessionId);
    if (!session) {
      return false;
    }
    return this.store.revoke(session);
  }

  registerProvider(
    provider: AuthProvider | ProviderConfigInput,
    options?: RegisterOptions,
  ): AuthProvider {
    return this.registry.register(provider, options);
  }

  listProviders(): AuthProvider[] {
    return this.registry.list();
  }

  onDidChangeSessions(
    listener: (event: SessionChangeEvent) => void,
  ): () => void {
    return this.store.onDidChangeSessions(listener);
  }

  dispose(): Promise<void> {
    return this.store.dispose();
  }
}

export interface AuthenticationServiceOptions {
  presenter: AuthPresenter;
  /** Defaults to the schema defaults, without any configured providers */
  settings?: AuthSettings;
  /** Defaults to in-memory storage; nothing survives the process */
  storage?: SecureStorage;
  providerOptions?: OAuthProviderOptions;
  canLaunchBrowser?: () => boolean;
}

/**
 * Wires a registry holding the built-in and configured providers to a
 * session store. Flow timeouts and the loopback port come from settings.
 */
export function createAuthenticationService(
  options: AuthenticationServiceOptions,
): AuthenticationService {
  const settings = options.settings ?? parseAuthSettings();
  const providerOptions = options.providerOptions ?? {};

  const registry = new ProviderRegistry({
    ...providerOptions,
    loopback: {
      timeoutMs: settings.loopbackTimeoutMs,
      port: settings.loopbackPort,
      ...providerOptions.loopback,
    },
    deviceCode: {
      timeoutMs: settings.deviceCodeTimeoutMs,
      ...providerOptions.deviceCode,
    },
  });
  for (const config of resolveProviderConfigs(settings.providers)) {
    registry.register(config);
  }
  logger.debug(
    () =>
      `configured providers: ${
        registry
          .list()
          .map((provider) => provider.id)
          .join(', ') || '(none)'
      }`,
  );

  const store = new SessionStore({
    registry,
    storage: options.storage ?? new InMemorySecureStorage(),
    presenter: options.presenter,
    settings,
    now: providerOptions.now,
    canLaunchBrowser: options.canLaunchBrowser,
  });
  return new AuthenticationService(registry, store);
}
