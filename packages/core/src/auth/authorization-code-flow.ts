/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { DebugLogger } from '../debug/index.js';
import { LoopbackCallbackServer } from './loopback-callback-server.js';
import { generatePkcePair, generateStateNonce } from './pkce.js';
import type { TokenClient } from './token-client.js';
import type { AuthPresenter, ScopeSet, TokenSet } from './types.js';

export type AuthorizationCodeTokenClient = Pick<
  TokenClient,
  'providerId' | 'endpoints' | 'exchangeAuthorizationCode'
>;

export interface AuthorizationCodeFlowOptions {
  timeoutMs?: number;
  /** 0 picks an ephemeral port */
  port?: number;
}

export interface AuthorizationCodeFlowContext {
  presenter: Pick<AuthPresenter, 'openSignIn'>;
  signal?: AbortSignal;
  accountHint?: string;
}

export interface AuthorizationRequest {
  clientId: string;
  redirectUri: string;
  scope: string;
  state: string;
  codeChallenge: string;
  loginHint?: string;
}

export function buildAuthorizationUrl(
  authorizationEndpoint: string,
  request: AuthorizationRequest,
): string {
  const url = new URL(authorizationEndpoint);
  url.searchParams.set('response_type', 'code');
  url.searchParams.set('client_id', request.clientId);
  url.searchParams.set('redirect_uri', request.redirectUri);
  if (request.scope !== '') {
    url.searchParams.set('scope', request.scope);
  }
  url.searchParams.set('state', request.state);
  url.searchParams.set('code_challenge', request.codeChallenge);
  url.searchParams.set('code_challenge_method', 'S256');
  if (request.loginHint) {
    url.searchParams.set('login_hint', request.loginHint);
  }
  return url.toString();
}

/**
 * Authorization code grant with PKCE, receiving the redirect on a loopback
 * server that lives only for this run.
 */
export class AuthorizationCodeFlow {
  private readonly logger: DebugLogger;

  constructor(
    private readonly client: AuthorizationCodeTokenClient,
    private readonly options: AuthorizationCodeFlowOptions = {},
  ) {
    this.logger = DebugLogger.getLogger(
      `tokenloom:auth:authorization-code:${client.providerId}`,
    );
  }

  async run(
    scopeSet: ScopeSet,
    context: AuthorizationCodeFlowContext,
  ): Promise<TokenSet> {
    const endpoints = this.client.endpoints(scopeSet);
    const pkce = generatePkcePair();
    const nonce = generateStateNonce();
    const server = new LoopbackCallbackServer({
      nonce,
      port: this.options.port,
      timeoutMs: this.options.timeoutMs,
      signal: context.signal,
    });

    try {
      const started = await server.start((redirectUri) =>
        buildAuthorizationUrl(endpoints.authorizationEndpoint, {
          clientId: endpoints.clientId,
          redirectUri,
          scope: scopeSet.canonical,
          state: nonce,
          codeChallenge: pkce.challenge,
          loginHint: context.accountHint,
        }),
      );

      const [code] = await Promise.all([
        started.result,
        this.openSignIn(context, started.signInUri),
      ]);
      this.logger.debug('exchanging authorization code');
      return await this.client.exchangeAuthorizationCode(
        scopeSet,
        {
          code,
          redirectUri: started.redirectUri,
          codeVerifier: pkce.verifier,
        },
        context.signal,
      );
    } finally {
      await server.stop();
    }
  }

  /**
   * A presenter that cannot open a browser still showed the URL; the flow
   * keeps waiting for the callback.
   */
  private async openSignIn(
    context: AuthorizationCodeFlowContext,
    signInUri: string,
  ): Promise<void> {
    try {
      await context.presenter.openSignIn(signInUri, this.client.providerId);
    } catch (error) {
      this.logger.warn(
        () =>
          `presenter could not open ${signInUri}: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
  }
}
