/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { DebugLogger } from '../debug/index.js';
import { delay } from '../utils/delay.js';
import {
  AuthError,
  CancelledError,
  DeniedError,
  ExpiredError,
  TimeoutError,
} from './oauth-errors.js';
import type {
  DeviceAuthorization,
  DevicePollOutcome,
  TokenClient,
} from './token-client.js';
import type { ScopeSet, TokenSet } from './types.js';

export const DEFAULT_DEVICE_POLL_INTERVAL_MS = 5000;
export const DEFAULT_SLOW_DOWN_INCREMENT_MS = 5000;
export const MAX_NETWORK_BACKOFF_INTERVAL_MS = 60000;
export const DEFAULT_DEVICE_CODE_TIMEOUT_MS = 15 * 60 * 1000;

export type DeviceTokenClient = Pick<
  TokenClient,
  'providerId' | 'requestDeviceCode' | 'pollDeviceToken'
>;

export interface DeviceCodeFlowOptions {
  /** Absolute budget for the whole flow, independent of code expiry */
  timeoutMs?: number;
  /** Used when the provider does not specify an interval */
  defaultIntervalMs?: number;
  slowDownIncrementMs?: number;
  maxNetworkBackoffMs?: number;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  now?: () => number;
}

export interface DeviceCodeSession {
  userCode: string;
  verificationUri: string;
  verificationUriComplete?: string;
  /** Epoch milliseconds at which the device code stops being valid */
  expiresAt: number;
  result: Promise<TokenSet>;
}

/**
 * RFC 8628 device authorization grant: request a user code, then poll the
 * token endpoint until the user approves, denies, or the code expires.
 */
export class DeviceCodeFlow {
  private readonly timeoutMs: number;
  private readonly defaultIntervalMs: number;
  private readonly slowDownIncrementMs: number;
  private readonly maxNetworkBackoffMs: number;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  private readonly now: () => number;
  private readonly logger: DebugLogger;

  constructor(
    private readonly client: DeviceTokenClient,
    options: DeviceCodeFlowOptions = {},
  ) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_DEVICE_CODE_TIMEOUT_MS;
    this.defaultIntervalMs =
      options.defaultIntervalMs ?? DEFAULT_DEVICE_POLL_INTERVAL_MS;
    this.slowDownIncrementMs =
      options.slowDownIncrementMs ?? DEFAULT_SLOW_DOWN_INCREMENT_MS;
    this.maxNetworkBackoffMs =
      options.maxNetworkBackoffMs ?? MAX_NETWORK_BACKOFF_INTERVAL_MS;
    this.sleep = options.sleep ?? delay;
    this.now = options.now ?? Date.now;
    this.logger = DebugLogger.getLogger(
      `tokenloom:auth:device-code:${client.providerId}`,
    );
  }

  /**
   * Requests the device code. Polling starts immediately; `result` settles
   * with the tokens or the terminal error.
   */
  async start(
    scopeSet: ScopeSet,
    signal?: AbortSignal,
  ): Promise<DeviceCodeSession> {
    if (signal?.aborted) {
      throw new CancelledError();
    }
    const startedAt = this.now();
    const authorization = await this.client.requestDeviceCode(
      scopeSet,
      signal,
    );
    this.logger.debug(
      () =>
        `user code issued, expires in ${Math.round((authorization.expiresAt - startedAt) / 1000)}s`,
    );

    const session: DeviceCodeSession = {
      userCode: authorization.userCode,
      verificationUri: authorization.verificationUri,
      expiresAt: authorization.expiresAt,
      result: this.poll(
        scopeSet,
        authorization,
        startedAt + this.timeoutMs,
        signal,
      ),
    };
    if (authorization.verificationUriComplete !== undefined) {
      session.verificationUriComplete = authorization.verificationUriComplete;
    }
    return session;
  }

  private async poll(
    scopeSet: ScopeSet,
    authorization: DeviceAuthorization,
    flowDeadline: number,
    signal?: AbortSignal,
  ): Promise<TokenSet> {
    let intervalMs = authorization.intervalMs ?? this.defaultIntervalMs;
    const deadline = Math.min(authorization.expiresAt, flowDeadline);

    for (;;) {
      this.checkDeadline(authorization.expiresAt, flowDeadline);
      await this.sleep(Math.min(intervalMs, deadline - this.now()), signal);
      this.checkDeadline(authorization.expiresAt, flowDeadline);

      let outcome: DevicePollOutcome;
      try {
        outcome = await this.client.pollDeviceToken(
          scopeSet,
          authorization.deviceCode,
          signal,
        );
      } catch (error) {
        if (error instanceof AuthError && error.isRetryable) {
          intervalMs = Math.max(
            intervalMs,
            Math.min(intervalMs * 2, this.maxNetworkBackoffMs),
          );
          const reason = error.message;
          this.logger.debug(
            () => `poll failed (${reason}), next in ${intervalMs}ms`,
          );
          continue;
        }
        throw error;
      }

      switch (outcome.status) {
        case 'success':
          this.logger.debug('device authorization approved');
          return outcome.tokens;
        case 'authorization_pending':
          break;
        case 'slow_down':
          intervalMs = Math.max(
            intervalMs + this.slowDownIncrementMs,
            outcome.intervalMs ?? 0,
          );
          this.logger.debug(() => `slow_down, interval now ${intervalMs}ms`);
          break;
        case 'expired_token':
          throw new ExpiredError(undefined, {
            provider: this.client.providerId,
          });
        case 'access_denied':
          throw new DeniedError(outcome.description, {
            provider: this.client.providerId,
          });
      }
    }
  }

  /** Code expiry wins over the flow budget when both have passed. */
  private checkDeadline(expiresAt: number, flowDeadline: number): void {
    const now = this.now();
    if (now >= expiresAt) {
      throw new ExpiredError(undefined, { provider: this.client.providerId });
    }
    if (now >= flowDeadline) {
      throw new TimeoutError('Device code flow', this.timeoutMs, {
        provider: this.client.providerId,
      });
    }
  }
}
