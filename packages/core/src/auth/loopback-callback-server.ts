/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import http from 'node:http';
import { DebugLogger } from '../debug/index.js';
import {
  AuthError,
  AuthErrorType,
  CancelledError,
  CsrfMismatchError,
  DeniedError,
  MissingParameterError,
  NetworkError,
  TimeoutError,
} from './oauth-errors.js';

export const LOOPBACK_HOST = '127.0.0.1';
export const DEFAULT_LOOPBACK_TIMEOUT_MS = 5 * 60 * 1000;

/**
 * idle -> waiting -> matched | rejected -> closed. A callback with a
 * foreign `state` leaves the server waiting.
 */
export type CallbackServerState =
  | 'idle'
  | 'waiting'
  | 'matched'
  | 'rejected'
  | 'closed';

export interface LoopbackCallbackServerOptions {
  /** The nonce the authorization request carries as `state` */
  readonly nonce: string;
  /** 0 picks an ephemeral port */
  readonly port?: number;
  readonly callbackPath?: string;
  readonly signInPath?: string;
  readonly timeoutMs?: number;
  readonly signal?: AbortSignal;
}

export interface LoopbackStartResult {
  readonly redirectUri: string;
  /** Local URL that redirects to the authorization URL */
  readonly signInUri: string;
  /** Resolves with the authorization code */
  readonly result: Promise<string>;
}

const SUCCESS_HTML = buildResponseHtml(
  'Authentication Complete',
  'Authorization finished. You can close this tab and return to the terminal.',
);
const FAILURE_HTML = buildResponseHtml(
  'Authentication Failed',
  'Authorization failed. Return to the terminal and try again.',
);
const MISMATCH_HTML = buildResponseHtml(
  'Authentication Not Recognised',
  'This sign-in response does not belong to the pending request.',
);

function buildResponseHtml(title: string, message: string): string {
  return `<!doctype html>
<html lang="en">
  <head>
    <meta charset="utf-8" />
    <title>${title}</title>
    <style>
      body {
        margin: 0;
        min-height: 100vh;
        display: flex;
        align-items: center;
        justify-content: center;
        font-family: ui-monospace, Menlo, Consolas, monospace;
        text-align: center;
        padding: 2rem;
      }
      main {
        max-width: 32rem;
      }
    </style>
  </head>
  <body>
    <main>
      <h1>${title}</h1>
      <p>${message}</p>
    </main>
  </body>
</html>`;
}

/**
 * Short-lived listener on 127.0.0.1 that captures one OAuth redirect.
 * The port is released on every exit path.
 */
export class LoopbackCallbackServer {
  private readonly server = http.createServer();
  private readonly logger = DebugLogger.getLogger(
    'tokenloom:auth:loopback-server',
  );
  private readonly callbackPath: string;
  private readonly signInPath: string;
  private readonly timeoutMs: number;
  private current: CallbackServerState = 'idle';
  private authorizationUrl = '';
  private timer: NodeJS.Timeout | undefined;
  private resolveResult: ((code: string) => void) | undefined;
  private rejectResult: ((error: AuthError) => void) | undefined;
  private closing: Promise<void> | undefined;
  private readonly onAbort = () => {
    this.settle(new CancelledError());
  };

  constructor(private readonly options: LoopbackCallbackServerOptions) {
    this.callbackPath = options.callbackPath ?? '/callback';
    this.signInPath = options.signInPath ?? '/signin';
    this.timeoutMs = options.timeoutMs ?? DEFAULT_LOOPBACK_TIMEOUT_MS;
    this.server.on('request', (request, response) =>
      this.handleRequest(request, response),
    );
  }

  get state(): CallbackServerState {
    return this.current;
  }

  /**
   * Binds the port and starts waiting. `authorizationUrlFor` receives the
   * redirect URI, which is only known once the port is bound.
   */
  async start(
    authorizationUrlFor: (redirectUri: string) => string,
  ): Promise<LoopbackStartResult> {
    if (this.current !== 'idle') {
      throw new AuthError(
        AuthErrorType.UNKNOWN,
        'Loopback server can only be started once',
      );
    }
    if (this.options.signal?.aborted) {
      this.current = 'closed';
      throw new CancelledError();
    }

    const port = await this.listen(this.options.port ?? 0);
    if (this.options.signal?.aborted) {
      await this.stop();
      throw new CancelledError();
    }
    const origin = `http://${LOOPBACK_HOST}:${port}`;
    const redirectUri = `${origin}${this.callbackPath}`;
    this.authorizationUrl = authorizationUrlFor(redirectUri);

    const result = new Promise<string>((resolve, reject) => {
      this.resolveResult = resolve;
      this.rejectResult = reject;
    });
    this.current = 'waiting';
    this.timer = setTimeout(() => {
      this.settle(new TimeoutError('Loopback callback', this.timeoutMs));
    }, this.timeoutMs);
    this.options.signal?.addEventListener('abort', this.onAbort, {
      once: true,
    });
    this.logger.debug(() => `waiting for callback on ${redirectUri}`);

    return { redirectUri, signInUri: `${origin}${this.signInPath}`, result };
  }

  /**
   * Releases the port. A flow still waiting is cancelled. Idempotent.
   */
  stop(): Promise<void> {
    if (this.current === 'waiting') {
      this.settle(new CancelledError('Loopback server stopped'));
    }
    this.closing ??= new Promise<void>((resolve) => {
      this.cleanup();
      this.current = 'closed';
      if (!this.server.listening) {
        resolve();
        return;
      }
      this.server.close(() => {
        this.logger.debug('loopback server closed');
        resolve();
      });
      this.server.closeIdleConnections();
    });
    return this.closing;
  }

  private listen(port: number): Promise<number> {
    return new Promise((resolve, reject) => {
      const handleError = (error: Error) => {
        this.server.removeListener('listening', handleListening);
        this.current = 'closed';
        reject(
          new NetworkError(
            `Cannot bind loopback server on ${LOOPBACK_HOST}:${port}: ${error.message}`,
            { cause: error },
          ),
        );
      };
      const handleListening = () => {
        this.server.removeListener('error', handleError);
        const address = this.server.address();
        if (address === null || typeof address === 'string') {
          handleError(new Error('no TCP address'));
          return;
        }
        resolve(address.port);
      };
      this.server.once('error', handleError);
      this.server.once('listening', handleListening);
      this.server.listen(port, LOOPBACK_HOST);
    });
  }

  private handleRequest(
    request: http.IncomingMessage,
    response: http.ServerResponse,
  ): void {
    let url: URL;
    try {
      url = new URL(request.url ?? '/', `http://${LOOPBACK_HOST}`);
    } catch (error) {
      this.logger.warn(
        () =>
          `malformed request target ignored: ${error instanceof Error ? error.message : String(error)}`,
      );
      this.respond(response, 400, 'Bad request', 'text/plain; charset=utf-8');
      return;
    }

    const known =
      url.pathname === this.callbackPath || url.pathname === this.signInPath;
    if (!known) {
      this.respond(response, 404, 'Not found', 'text/plain; charset=utf-8');
      return;
    }
    if (request.method !== 'GET') {
      response.setHeader('Allow', 'GET');
      this.respond(response, 405, 'Method not allowed', 'text/plain');
      return;
    }
    if (url.pathname === this.signInPath) {
      response.setHeader('Location', this.authorizationUrl);
      this.respond(response, 302, '', 'text/plain');
      return;
    }
    if (this.current !== 'waiting') {
      this.respond(response, 400, FAILURE_HTML);
      return;
    }

    const params = url.searchParams;
    const state = params.get('state');
    if (state !== null && state !== this.options.nonce) {
      const mismatch = new CsrfMismatchError();
      this.logger.warn(() => `callback ignored: ${mismatch.message}`);
      this.respond(response, 400, MISMATCH_HTML);
      return;
    }

    const error = params.get('error');
    if (state !== null && error !== null) {
      const description = params.get('error_description');
      this.respondAndSettle(
        response,
        400,
        FAILURE_HTML,
        new DeniedError(description ? `${error}: ${description}` : error),
      );
      return;
    }

    const code = params.get('code');
    if (!code || state === null) {
      const missing = [
        ...(code ? [] : ['code']),
        ...(state === null ? ['state'] : []),
      ];
      this.respondAndSettle(
        response,
        400,
        FAILURE_HTML,
        new MissingParameterError(missing),
      );
      return;
    }

    this.respondAndSettle(response, 200, SUCCESS_HTML, code);
  }

  private respondAndSettle(
    response: http.ServerResponse,
    status: number,
    body: string,
    outcome: string | AuthError,
  ): void {
    this.settle(outcome, false);
    response.once('finish', () => {
      void this.stop();
    });
    this.respond(response, status, body);
  }

  private respond(
    response: http.ServerResponse,
    status: number,
    body: string,
    contentType = 'text/html; charset=utf-8',
  ): void {
    response.statusCode = status;
    response.setHeader('Content-Type', contentType);
    response.setHeader('Connection', 'close');
    response.setHeader('Cache-Control', 'no-store');
    response.end(body);
  }

  /**
   * Moves waiting -> matched | rejected. With `close` the port is released
   * immediately; callback responses release it once flushed instead.
   */
  private settle(outcome: string | AuthError, close = true): void {
    if (this.current !== 'waiting') {
      return;
    }
    const resolve = this.resolveResult;
    const reject = this.rejectResult;
    this.resolveResult = undefined;
    this.rejectResult = undefined;
    this.cleanup();

    if (typeof outcome === 'string') {
      this.current = 'matched';
      this.logger.debug('authorization code received');
      resolve?.(outcome);
    } else {
      this.current = 'rejected';
      this.logger.debug(() => `callback rejected: ${outcome.message}`);
      reject?.(outcome);
    }
    if (close) {
      void this.stop();
    }
  }

  private cleanup(): void {
    if (this.timer !== undefined) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
    this.options.signal?.removeEventListener('abort', this.onAbort);
  }
}
