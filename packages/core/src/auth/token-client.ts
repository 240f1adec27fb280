/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { z } from 'zod';
import { DebugLogger } from '../debug/index.js';
import {
  AuthErrorFactory,
  CancelledError,
  ConfigurationError,
  NetworkError,
  ProviderResponseError,
  type AuthError,
} from './oauth-errors.js';
import {
  DeviceCodeResponseSchema,
  OAuthErrorResponseSchema,
  TENANT_TEMPLATE,
  TokenResponseSchema,
  type OAuthErrorResponse,
  type ProviderConfig,
  type ScopeSet,
  type TokenSet,
} from './types.js';

const DEVICE_CODE_GRANT = 'urn:ietf:params:oauth:grant-type:device_code';
const DEFAULT_EXPIRES_IN_SECONDS = 3600;

/** OAuth error codes that describe a temporary server condition */
const TRANSIENT_OAUTH_ERRORS = new Set([
  'temporarily_unavailable',
  'server_error',
]);

const SlowDownBodySchema = z.object({
  interval: z.coerce.number().positive().optional(),
});

export interface ResolvedEndpoints {
  authorizationEndpoint: string;
  tokenEndpoint: string;
  deviceCodeEndpoint?: string;
  revocationEndpoint?: string;
  clientId: string;
  clientSecret?: string;
}

/**
 * Applies the tenant template and the client id selected by reserved
 * scopes. A client id override drops the configured secret, which belongs
 * to the configured client.
 */
export function resolveEndpoints(
  config: ProviderConfig,
  scopeSet: ScopeSet,
): ResolvedEndpoints {
  const tenant = scopeSet.tenantId ?? config.defaultTenant;
  const expand = (endpoint: string): string => {
    if (!endpoint.includes(TENANT_TEMPLATE)) {
      return endpoint;
    }
    if (tenant === undefined) {
      throw new ConfigurationError(
        `Provider ${config.id} needs a tenant for ${endpoint}`,
        { provider: config.id },
      );
    }
    return endpoint.replaceAll(TENANT_TEMPLATE, encodeURIComponent(tenant));
  };

  const overridden =
    scopeSet.clientId !== undefined && scopeSet.clientId !== config.clientId;
  const resolved: ResolvedEndpoints = {
    authorizationEndpoint: expand(config.authorizationEndpoint),
    tokenEndpoint: expand(config.tokenEndpoint),
    clientId: scopeSet.clientId ?? config.clientId,
  };
  if (config.deviceCodeEndpoint !== undefined) {
    resolved.deviceCodeEndpoint = expand(config.deviceCodeEndpoint);
  }
  if (config.revocationEndpoint !== undefined) {
    resolved.revocationEndpoint = expand(config.revocationEndpoint);
  }
  if (!overridden && config.clientSecret !== undefined) {
    resolved.clientSecret = config.clientSecret;
  }
  return resolved;
}

export interface DeviceAuthorization {
  deviceCode: string;
  userCode: string;
  verificationUri: string;
  verificationUriComplete?: string;
  /** Epoch milliseconds */
  expiresAt: number;
  /** Provider-specified poll interval */
  intervalMs?: number;
}

export type DevicePollOutcome =
  | { status: 'success'; tokens: TokenSet }
  | { status: 'authorization_pending' }
  | { status: 'slow_down'; intervalMs?: number }
  | { status: 'expired_token' }
  | { status: 'access_denied'; description?: string };

export interface AuthorizationCodeExchange {
  code: string;
  redirectUri: string;
  codeVerifier: string;
}

export interface TokenClientOptions {
  fetch?: typeof fetch;
  now?: () => number;
}

interface ProviderReply {
  status: number;
  body: unknown;
}

/**
 * Form-encoded requests against one provider's OAuth endpoints.
 */
export class TokenClient {
  private readonly fetchFn: typeof fetch;
  private readonly now: () => number;
  private readonly logger: DebugLogger;

  constructor(
    private readonly config: ProviderConfig,
    options: TokenClientOptions = {},
  ) {
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
    this.now = options.now ?? Date.now;
    this.logger = DebugLogger.getLogger(
      `tokenloom:auth:token-client:${config.id}`,
    );
  }

  get providerId(): string {
    return this.config.id;
  }

  endpoints(scopeSet: ScopeSet): ResolvedEndpoints {
    return resolveEndpoints(this.config, scopeSet);
  }

  async requestDeviceCode(
    scopeSet: ScopeSet,
    signal?: AbortSignal,
  ): Promise<DeviceAuthorization> {
    const endpoints = this.endpoints(scopeSet);
    if (endpoints.deviceCodeEndpoint === undefined) {
      throw new ConfigurationError(
        `Provider ${this.config.id} has no device authorization endpoint`,
        { provider: this.config.id },
      );
    }

    const params = new URLSearchParams({ client_id: endpoints.clientId });
    if (scopeSet.canonical !== '') {
      params.set('scope', scopeSet.canonical);
    }
    const reply = await this.post(endpoints.deviceCodeEndpoint, params, signal);
    this.throwOnError(reply);

    const parsed = DeviceCodeResponseSchema.safeParse(reply.body);
    if (!parsed.success) {
      throw this.invalidResponse('device authorization', parsed.error);
    }
    const data = parsed.data;
    const verificationUri = data.verification_uri ?? data.verification_url;
    if (verificationUri === undefined) {
      throw new ProviderResponseError(
        'invalid_response',
        'device authorization response has no verification_uri',
        { provider: this.config.id, status: reply.status },
      );
    }

    this.logger.debug(
      () =>
        `device code issued, expires_in=${data.expires_in}s interval=${data.interval ?? 'default'}`,
    );
    const authorization: DeviceAuthorization = {
      deviceCode: data.device_code,
      userCode: data.user_code,
      verificationUri,
      expiresAt: this.now() + data.expires_in * 1000,
    };
    if (data.verification_uri_complete !== undefined) {
      authorization.verificationUriComplete = data.verification_uri_complete;
    }
    if (data.interval !== undefined) {
      authorization.intervalMs = data.interval * 1000;
    }
    return authorization;
  }

  /**
   * One poll of the token endpoint. Pending, slow-down, expiry and denial
   * are outcomes rather than errors; anything else throws.
   */
  async pollDeviceToken(
    scopeSet: ScopeSet,
    deviceCode: string,
    signal?: AbortSignal,
  ): Promise<DevicePollOutcome> {
    const endpoints = this.endpoints(scopeSet);
    const params = new URLSearchParams({
      grant_type: DEVICE_CODE_GRANT,
      device_code: deviceCode,
      client_id: endpoints.clientId,
    });
    this.addClientSecret(params, endpoints);

    const reply = await this.post(endpoints.tokenEndpoint, params, signal);
    const oauthError = OAuthErrorResponseSchema.safeParse(reply.body);
    if (oauthError.success) {
      switch (oauthError.data.error) {
        case 'authorization_pending':
          return { status: 'authorization_pending' };
        case 'slow_down': {
          const slowDown = SlowDownBodySchema.safeParse(reply.body);
          const interval = slowDown.success
            ? slowDown.data.interval
            : undefined;
          return interval === undefined
            ? { status: 'slow_down' }
            : { status: 'slow_down', intervalMs: interval * 1000 };
        }
        case 'expired_token':
          return { status: 'expired_token' };
        case 'access_denied':
          return oauthError.data.error_description === undefined
            ? { status: 'access_denied' }
            : {
                status: 'access_denied',
                description: oauthError.data.error_description,
              };
        default:
          throw this.oauthFailure(oauthError.data, reply.status);
      }
    }

    return { status: 'success', tokens: this.readTokens(reply) };
  }

  async exchangeAuthorizationCode(
    scopeSet: ScopeSet,
    exchange: AuthorizationCodeExchange,
    signal?: AbortSignal,
  ): Promise<TokenSet> {
    const endpoints = this.endpoints(scopeSet);
    const params = new URLSearchParams({
      grant_type: 'authorization_code',
      code: exchange.code,
      redirect_uri: exchange.redirectUri,
      client_id: endpoints.clientId,
      code_verifier: exchange.codeVerifier,
    });
    this.addClientSecret(params, endpoints);

    const reply = await this.post(endpoints.tokenEndpoint, params, signal);
    return this.readTokens(reply);
  }

  /**
   * Redeems a refresh token. Providers that do not rotate refresh tokens
   * omit one from the response; the old one stays valid.
   */
  async refresh(
    scopeSet: ScopeSet,
    refreshToken: string,
    signal?: AbortSignal,
  ): Promise<TokenSet> {
    const endpoints = this.endpoints(scopeSet);
    const params = new URLSearchParams({
      grant_type: 'refresh_token',
      refresh_token: refreshToken,
      client_id: endpoints.clientId,
    });
    if (scopeSet.canonical !== '') {
      params.set('scope', scopeSet.canonical);
    }
    this.addClientSecret(params, endpoints);

    const reply = await this.post(endpoints.tokenEndpoint, params, signal);
    const tokens = this.readTokens(reply);
    return tokens.refreshToken === undefined
      ? { ...tokens, refreshToken }
      : tokens;
  }

  /**
   * RFC 7009 revocation. Resolves false when the provider has no
   * revocation endpoint.
   */
  async revoke(
    scopeSet: ScopeSet,
    token: string,
    signal?: AbortSignal,
  ): Promise<boolean> {
    const endpoints = this.endpoints(scopeSet);
    if (endpoints.revocationEndpoint === undefined) {
      return false;
    }
    const params = new URLSearchParams({
      token,
      token_type_hint: 'refresh_token',
      client_id: endpoints.clientId,
    });
    this.addClientSecret(params, endpoints);

    const reply = await this.post(endpoints.revocationEndpoint, params, signal);
    this.throwOnError(reply);
    return true;
  }

  private addClientSecret(
    params: URLSearchParams,
    endpoints: ResolvedEndpoints,
  ): void {
    if (endpoints.clientSecret !== undefined) {
      params.set('client_secret', endpoints.clientSecret);
    }
  }

  private async post(
    url: string,
    params: URLSearchParams,
    signal?: AbortSignal,
  ): Promise<ProviderReply> {
    let response: Response;
    let text: string;
    try {
      response = await this.fetchFn(url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/x-www-form-urlencoded',
          Accept: 'application/json',
        },
        body: params.toString(),
        signal,
      });
      text = await response.text();
    } catch (error) {
      if (signal?.aborted) {
        throw new CancelledError('Request was cancelled', {
          provider: this.config.id,
          cause: error,
        });
      }
      throw AuthErrorFactory.fromUnknown(
        error,
        `POST ${url}`,
        this.config.id,
      );
    }

    this.logger.debug(() => `POST ${url} -> ${response.status}`);
    if (text.trim() === '') {
      return { status: response.status, body: {} };
    }
    try {
      const body: unknown = JSON.parse(text);
      return { status: response.status, body };
    } catch {
      if (response.status >= 500) {
        throw new NetworkError(`POST ${url} failed with ${response.status}`, {
          provider: this.config.id,
          status: response.status,
        });
      }
      throw new ProviderResponseError(
        'invalid_response',
        `expected JSON from ${url} (HTTP ${response.status})`,
        { provider: this.config.id, status: response.status },
      );
    }
  }

  /**
   * An `error` member is honoured whatever the HTTP status; some providers
   * report OAuth errors with 200.
   */
  private throwOnError(reply: ProviderReply): void {
    const oauthError = OAuthErrorResponseSchema.safeParse(reply.body);
    if (oauthError.success) {
      throw this.oauthFailure(oauthError.data, reply.status);
    }
    if (reply.status >= 500 || reply.status === 429) {
      throw new NetworkError(`Provider returned HTTP ${reply.status}`, {
        provider: this.config.id,
        status: reply.status,
      });
    }
    if (reply.status < 200 || reply.status >= 300) {
      throw new ProviderResponseError(`http_${reply.status}`, undefined, {
        provider: this.config.id,
        status: reply.status,
      });
    }
  }

  private readTokens(reply: ProviderReply): TokenSet {
    this.throwOnError(reply);
    const parsed = TokenResponseSchema.safeParse(reply.body);
    if (!parsed.success) {
      throw this.invalidResponse('token', parsed.error);
    }
    const data = parsed.data;
    const tokens: TokenSet = {
      accessToken: data.access_token,
      expiresAt:
        this.now() + (data.expires_in ?? DEFAULT_EXPIRES_IN_SECONDS) * 1000,
    };
    if (data.refresh_token) {
      tokens.refreshToken = data.refresh_token;
    }
    if (data.id_token) {
      tokens.idToken = data.id_token;
    }
    if (data.scope) {
      tokens.grantedScope = data.scope;
    }
    return tokens;
  }

  private oauthFailure(body: OAuthErrorResponse, status: number): AuthError {
    this.logger.debug(() => `provider error ${body.error} (HTTP ${status})`);
    if (status >= 500 || TRANSIENT_OAUTH_ERRORS.has(body.error)) {
      return new NetworkError(
        body.error_description
          ? `${body.error}: ${body.error_description}`
          : body.error,
        { provider: this.config.id, status },
      );
    }
    return new ProviderResponseError(body.error, body.error_description, {
      provider: this.config.id,
      status,
    });
  }

  private invalidResponse(what: string, error: z.ZodError): AuthError {
    return new ProviderResponseError(
      'invalid_response',
      `unexpected ${what} response: ${error.issues
        .map((issue) => `${issue.path.join('.')} ${issue.message}`)
        .join('; ')}`,
      { provider: this.config.id },
    );
  }
}
