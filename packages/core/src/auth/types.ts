/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { z } from 'zod';

export const TENANT_TEMPLATE = '{tenant}';

function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value.replaceAll(TENANT_TEMPLATE, 'tenant'));
    return url.protocol === 'https:' || url.protocol === 'http:';
  } catch {
    return false;
  }
}

const EndpointSchema = z
  .string()
  .refine(isHttpUrl, { message: 'Endpoint must be an http(s) URL' });

/**
 * Provider endpoint and client configuration schema
 */
export const ProviderConfigObjectSchema = z.object({
  id: z
    .string()
    .regex(
      /^[a-z0-9][a-z0-9._-]*$/,
      'Provider ids are lowercase letters, digits, ".", "_" and "-"',
    ),
  displayName: z.string().optional(),
  authorizationEndpoint: EndpointSchema,
  tokenEndpoint: EndpointSchema,
  deviceCodeEndpoint: EndpointSchema.optional(),
  revocationEndpoint: EndpointSchema.optional(),
  clientId: z.string().min(1),
  clientSecret: z.string().optional(),
  defaultScopes: z.array(z.string()).default([]),
  internalScopes: z.array(z.string()).default([]),
  defaultTenant: z.string().min(1).optional(),
});

export const ProviderConfigSchema = ProviderConfigObjectSchema.superRefine(
  (config, ctx) => {
    const templated = [
      config.authorizationEndpoint,
      config.tokenEndpoint,
      config.deviceCodeEndpoint,
      config.revocationEndpoint,
    ].some((endpoint) => endpoint?.includes(TENANT_TEMPLATE));
    if (templated && config.defaultTenant === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['defaultTenant'],
        message: `Endpoints using ${TENANT_TEMPLATE} require a defaultTenant`,
      });
    }
  },
);

/**
 * Device authorization response (RFC 8628 section 3.2). Google names the
 * verification URI `verification_url`.
 */
export const DeviceCodeResponseSchema = z.object({
  device_code: z.string().min(1),
  user_code: z.string().min(1),
  verification_uri: z.string().url().optional(),
  verification_url: z.string().url().optional(),
  verification_uri_complete: z.string().url().optional(),
  expires_in: z.coerce.number().positive(),
  interval: z.coerce.number().positive().optional(),
});

/**
 * Token response schema
 */
export const TokenResponseSchema = z.object({
  access_token: z.string().min(1),
  token_type: z.string().optional(),
  expires_in: z.coerce.number().optional(),
  refresh_token: z.string().optional(),
  id_token: z.string().optional(),
  scope: z.string().nullable().optional(),
});

/**
 * OAuth error response (RFC 6749 section 5.2)
 */
export const OAuthErrorResponseSchema = z.object({
  error: z.string().min(1),
  error_description: z.string().optional(),
  error_uri: z.string().optional(),
});

/**
 * The id_token claims used to name an account
 */
export const IdTokenClaimsSchema = z
  .object({
    sub: z.string().optional(),
    email: z.string().optional(),
    preferred_username: z.string().optional(),
  })
  .passthrough();

/**
 * What secure storage holds for one session key
 */
export const StoredCredentialSchema = z.object({
  account: z.string(),
  refreshToken: z.string().min(1),
  scopes: z.string(),
  savedAt: z.number(),
});

export type ProviderConfig = z.infer<typeof ProviderConfigSchema>;
export type ProviderConfigInput = z.input<typeof ProviderConfigSchema>;
export type DeviceCodeResponse = z.infer<typeof DeviceCodeResponseSchema>;
export type TokenResponse = z.infer<typeof TokenResponseSchema>;
export type OAuthErrorResponse = z.infer<typeof OAuthErrorResponseSchema>;
export type StoredCredential = z.infer<typeof StoredCredentialSchema>;

/**
 * Canonical, deduplicated, sorted scopes plus the reserved segments
 * extracted from them.
 */
export interface ScopeSet {
  /** Scopes sent to the provider, sorted by code unit */
  readonly scopes: readonly string[];
  /** `scopes` joined with single spaces */
  readonly canonical: string;
  readonly clientId?: string;
  readonly tenantId?: string;
  /** `canonical` plus the reserved segments; the cache key component */
  readonly key: string;
}

export interface TokenSet {
  accessToken: string;
  refreshToken?: string;
  /** Epoch milliseconds */
  expiresAt: number;
  idToken?: string;
  grantedScope?: string;
}

export interface Session {
  readonly id: string;
  readonly providerId: string;
  readonly account: string;
  readonly scopes: ScopeSet;
  readonly accessToken: string;
  readonly refreshToken?: string;
  readonly expiresAt: number;
  readonly createdAt: number;
}

export type FlowKind = 'loopback' | 'device_code';

export interface SessionChangeEvent {
  providerId: string;
  added: readonly Session[];
  removed: readonly Session[];
  changed: readonly Session[];
}

export interface DeviceCodePrompt {
  providerId: string;
  userCode: string;
  verificationUri: string;
  verificationUriComplete?: string;
  /** Epoch milliseconds */
  expiresAt: number;
}

/**
 * Host UI collaborator. Library code never prints; it asks the presenter.
 */
export interface AuthPresenter {
  presentDeviceCode(prompt: DeviceCodePrompt): void | Promise<void>;
  openSignIn(url: string, providerId: string): void | Promise<void>;
}
