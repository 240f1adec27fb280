/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { InvalidScopeError } from './oauth-errors.js';
import type { ProviderConfig, ScopeSet } from './types.js';

/**
 * Scopes with this prefix carry client/tenant selection and are never sent
 * to the provider, e.g. `tokenloom:tenant:contoso.onmicrosoft.com`.
 */
export const RESERVED_SCOPE_PREFIX = 'tokenloom:';

// RFC 6749 section 3.3: scope-token = 1*( %x21 / %x23-5B / %x5D-7E )
const SCOPE_TOKEN = /^[\x21\x23-\x5B\x5D-\x7E]+$/;
const SEPARATORS = /[,;]/;

type ReservedSegment = 'client_id' | 'tenant';

function isReservedSegment(name: string): name is ReservedSegment {
  return name === 'client_id' || name === 'tenant';
}

export type ScopeRules = Pick<
  ProviderConfig,
  'defaultScopes' | 'internalScopes'
>;

function tokenize(requested: string | readonly string[]): string[] {
  const items = typeof requested === 'string' ? [requested] : requested;
  return items.flatMap((item) => item.split(/\s+/)).filter((t) => t !== '');
}

function assertWellFormed(token: string): void {
  if (SEPARATORS.test(token)) {
    throw new InvalidScopeError(
      token,
      'scopes are space separated; "," and ";" are not allowed',
    );
  }
  if (!SCOPE_TOKEN.test(token)) {
    throw new InvalidScopeError(
      token,
      'contains characters outside the scope-token alphabet',
    );
  }
}

/**
 * Canonicalizes requested scopes against a provider's rules. Pure: the same
 * logical permissions always give the same `canonical` and `key`.
 */
export function normalizeScopes(
  rules: ScopeRules,
  requested: string | readonly string[],
): ScopeSet {
  const internal = new Set(rules.internalScopes);
  const reserved: Partial<Record<ReservedSegment, string>> = {};
  const scopes = new Set<string>();

  const tokens = [...tokenize(requested), ...tokenize(rules.defaultScopes)];
  for (const token of tokens) {
    assertWellFormed(token);
    if (internal.has(token)) {
      continue;
    }
    if (!token.startsWith(RESERVED_SCOPE_PREFIX)) {
      scopes.add(token);
      continue;
    }

    const body = token.slice(RESERVED_SCOPE_PREFIX.length);
    const separator = body.indexOf(':');
    const name = separator === -1 ? body : body.slice(0, separator);
    if (separator === -1 || !isReservedSegment(name)) {
      throw new InvalidScopeError(token, `unknown reserved segment "${name}"`);
    }
    const value = body.slice(separator + 1);
    if (value === '') {
      throw new InvalidScopeError(token, `reserved segment "${name}" is empty`);
    }
    const previous = reserved[name];
    if (previous !== undefined && previous !== value) {
      throw new InvalidScopeError(
        token,
        `conflicts with ${RESERVED_SCOPE_PREFIX}${name}:${previous}`,
      );
    }
    reserved[name] = value;
  }

  // Default sort compares UTF-16 code units, independent of locale.
  const sorted = [...scopes].sort();
  const canonical = sorted.join(' ');
  const keyParts = [canonical];
  if (reserved.client_id !== undefined) {
    keyParts.push(`${RESERVED_SCOPE_PREFIX}client_id:${reserved.client_id}`);
  }
  if (reserved.tenant !== undefined) {
    keyParts.push(`${RESERVED_SCOPE_PREFIX}tenant:${reserved.tenant}`);
  }

  const scopeSet: {
    -readonly [K in keyof ScopeSet]: ScopeSet[K];
  } = {
    scopes: Object.freeze(sorted),
    canonical,
    key: keyParts.filter((part) => part !== '').join(' '),
  };
  if (reserved.client_id !== undefined) {
    scopeSet.clientId = reserved.client_id;
  }
  if (reserved.tenant !== undefined) {
    scopeSet.tenantId = reserved.tenant;
  }
  return Object.freeze(scopeSet);
}

/**
 * True when `granted` covers every scope of `requested` for the same client
 * and tenant.
 */
export function isScopeSubset(requested: ScopeSet, granted: ScopeSet): boolean {
  if (
    requested.clientId !== granted.clientId ||
    requested.tenantId !== granted.tenantId
  ) {
    return false;
  }
  const available = new Set(granted.scopes);
  return requested.scopes.every((scope) => available.has(scope));
}
