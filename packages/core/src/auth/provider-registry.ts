/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { DebugLogger } from '../debug/index.js';
import {
  AuthorizationCodeFlow,
  type AuthorizationCodeFlowOptions,
} from './authorization-code-flow.js';
import {
  DeviceCodeFlow,
  type DeviceCodeFlowOptions,
} from './device-code-flow.js';
import { ConfigurationError, UnknownProviderError } from './oauth-errors.js';
import { TokenClient, type TokenClientOptions } from './token-client.js';
import {
  ProviderConfigSchema,
  type AuthPresenter,
  type DeviceCodePrompt,
  type FlowKind,
  type ProviderConfig,
  type ProviderConfigInput,
  type ScopeSet,
  type TokenSet,
} from './types.js';

export interface FlowContext {
  presenter: AuthPresenter;
  signal?: AbortSignal;
  accountHint?: string;
}

/**
 * What the session store needs from a provider. Providers are variants of
 * this capability set; OAuthProvider is the standard one.
 */
export interface AuthProvider {
  readonly id: string;
  getConfig(): ProviderConfig;
  /** Flows this provider can run, in order of preference */
  supportedFlows(): readonly FlowKind[];
  startFlow(
    kind: FlowKind,
    scopes: ScopeSet,
    context: FlowContext,
  ): Promise<TokenSet>;
  refresh(
    scopes: ScopeSet,
    refreshToken: string,
    signal?: AbortSignal,
  ): Promise<TokenSet>;
  revoke?(
    scopes: ScopeSet,
    refreshToken: string,
    signal?: AbortSignal,
  ): Promise<void>;
}

export interface OAuthProviderOptions extends TokenClientOptions {
  deviceCode?: DeviceCodeFlowOptions;
  loopback?: AuthorizationCodeFlowOptions;
}

/**
 * Standard OAuth 2.0 provider: device code and loopback authorization code
 * flows over the endpoints of one ProviderConfig.
 */
export class OAuthProvider implements AuthProvider {
  private readonly client: TokenClient;
  private readonly deviceCodeFlow: DeviceCodeFlow;
  private readonly authorizationCodeFlow: AuthorizationCodeFlow;
  private readonly logger: DebugLogger;

  constructor(
    private readonly config: ProviderConfig,
    options: OAuthProviderOptions = {},
  ) {
    this.client = new TokenClient(config, options);
    this.deviceCodeFlow = new DeviceCodeFlow(this.client, {
      now: options.now,
      ...options.deviceCode,
    });
    this.authorizationCodeFlow = new AuthorizationCodeFlow(
      this.client,
      options.loopback,
    );
    this.logger = DebugLogger.getLogger(
      `tokenloom:auth:provider:${config.id}`,
    );
  }

  get id(): string {
    return this.config.id;
  }

  getConfig(): ProviderConfig {
    return this.config;
  }

  supportedFlows(): readonly FlowKind[] {
    return this.config.deviceCodeEndpoint === undefined
      ? ['loopback']
      : ['loopback', 'device_code'];
  }

  async startFlow(
    kind: FlowKind,
    scopes: ScopeSet,
    context: FlowContext,
  ): Promise<TokenSet> {
    if (!this.supportedFlows().includes(kind)) {
      throw new ConfigurationError(
        `Provider ${this.id} does not support the ${kind} flow`,
        { provider: this.id },
      );
    }
    this.logger.debug(() => `starting ${kind} flow for [${scopes.canonical}]`);

    if (kind === 'loopback') {
      return this.authorizationCodeFlow.run(scopes, context);
    }

    const session = await this.deviceCodeFlow.start(scopes, context.signal);
    const [tokens] = await Promise.all([
      session.result,
      this.presentDeviceCode(context.presenter, {
        providerId: this.id,
        userCode: session.userCode,
        verificationUri: session.verificationUri,
        verificationUriComplete: session.verificationUriComplete,
        expiresAt: session.expiresAt,
      }),
    ]);
    return tokens;
  }

  private async presentDeviceCode(
    presenter: AuthPresenter,
    prompt: DeviceCodePrompt,
  ): Promise<void> {
    try {
      await presenter.presentDeviceCode(prompt);
    } catch (error) {
      this.logger.warn(
        () =>
          `presenter failed to show the device code: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
  }

  refresh(
    scopes: ScopeSet,
    refreshToken: string,
    signal?: AbortSignal,
  ): Promise<TokenSet> {
    return this.client.refresh(scopes, refreshToken, signal);
  }

  async revoke(
    scopes: ScopeSet,
    refreshToken: string,
    signal?: AbortSignal,
  ): Promise<void> {
    const revoked = await this.client.revoke(scopes, refreshToken, signal);
    this.logger.debug(() => `revocation ${revoked ? 'sent' : 'unsupported'}`);
  }
}

function isAuthProvider(
  value: AuthProvider | ProviderConfigInput,
): value is AuthProvider {
  return 'startFlow' in value && typeof value.startFlow === 'function';
}

export interface RegisterOptions {
  /** Replace an existing provider with the same id */
  replace?: boolean;
}

/**
 * Provider id to provider. Configs are validated and frozen on
 * registration.
 */
export class ProviderRegistry {
  private readonly providers = new Map<string, AuthProvider>();
  private readonly logger = DebugLogger.getLogger('tokenloom:auth:registry');

  constructor(private readonly providerOptions: OAuthProviderOptions = {}) {}

  register(
    provider: AuthProvider | ProviderConfigInput,
    options: RegisterOptions = {},
  ): AuthProvider {
    const registered = isAuthProvider(provider)
      ? provider
      : new OAuthProvider(parseProviderConfig(provider), this.providerOptions);

    if (this.providers.has(registered.id) && !options.replace) {
      throw new ConfigurationError(
        `Provider ${registered.id} is already registered`,
        { provider: registered.id },
      );
    }
    this.providers.set(registered.id, registered);
    this.logger.debug(() => `registered provider ${registered.id}`);
    return registered;
  }

  get(id: string): AuthProvider {
    const provider = this.providers.get(id);
    if (!provider) {
      throw new UnknownProviderError(id);
    }
    return provider;
  }

  has(id: string): boolean {
    return this.providers.has(id);
  }

  list(): AuthProvider[] {
    return [...this.providers.values()];
  }

  unregister(id: string): boolean {
    return this.providers.delete(id);
  }
}

export function parseProviderConfig(input: unknown): ProviderConfig {
  const result = ProviderConfigSchema.safeParse(input);
  if (!result.success) {
    const id =
      typeof input === 'object' && input !== null && 'id' in input
        ? String(input.id)
        : '<unnamed>';
    throw new ConfigurationError(
      `Invalid configuration for provider ${id}: ${result.error.issues
        .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ')}`,
    );
  }
  const config = result.data;
  Object.freeze(config.defaultScopes);
  Object.freeze(config.internalScopes);
  return Object.freeze(config);
}
