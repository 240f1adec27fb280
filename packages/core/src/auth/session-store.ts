/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { randomUUID } from 'node:crypto';
import { EventEmitter } from 'node:events';
import {
  parseAuthSettings,
  type AuthSettings,
} from '../config/auth-settings.js';
import { DebugLogger } from '../debug/index.js';
import {
  decodeCredential,
  encodeCredential,
  type SecureStorage,
} from '../storage/secure-storage.js';
import { shouldLaunchBrowser } from '../utils/browser.js';
import {
  AuthErrorFactory,
  AuthErrorType,
  AuthenticationRequiredError,
  CancelledError,
  StorageError,
  computeBackoffDelay,
} from './oauth-errors.js';
import type { AuthProvider, ProviderRegistry } from './provider-registry.js';
import { isScopeSubset, normalizeScopes } from './scope-normalizer.js';
import {
  IdTokenClaimsSchema,
  type AuthPresenter,
  type FlowKind,
  type ScopeSet,
  type Session,
  type SessionChangeEvent,
  type StoredCredential,
  type TokenSet,
} from './types.js';

const CHANGE_EVENT = 'sessions-changed';
const ANY_ACCOUNT = '*';
const DEFAULT_ACCOUNT = 'default';
const MAX_TIMER_DELAY_MS = 2 ** 31 - 1;

export interface AcquireOptions {
  /** Defaults to true */
  interactive?: boolean;
  /** Restricts reuse to this account and is sent as `login_hint` */
  accountHint?: string;
  /** Cancels this caller's wait; the flow stops once every waiter left */
  signal?: AbortSignal;
  /** Overrides flow selection */
  flow?: FlowKind;
}

export interface SessionStoreOptions {
  registry: Pick<ProviderRegistry, 'get'>;
  storage: SecureStorage;
  presenter: AuthPresenter;
  settings?: AuthSettings;
  now?: () => number;
  random?: () => number;
  canLaunchBrowser?: () => boolean;
}

/** Mutable acquisition parameters; a later interactive waiter upgrades them */
interface AcquisitionMode {
  interactive: boolean;
  flow: FlowKind | undefined;
}

interface PendingRequest {
  key: string;
  promise: Promise<Session>;
  controller: AbortController;
  mode: AcquisitionMode;
  waiters: number;
}

interface SessionEntry {
  session: Session;
  sequence: number;
  refreshAttempts: number;
  timer: NodeJS.Timeout | undefined;
  refreshing: Promise<Session> | undefined;
}

function requestKey(
  providerId: string,
  account: string | undefined,
  scopes: ScopeSet,
): string {
  return `${providerId}|${account ?? ANY_ACCOUNT}|${scopes.key}`;
}

function accountFromIdToken(idToken: string | undefined): string | undefined {
  const payload = idToken?.split('.')[1];
  if (payload === undefined) {
    return undefined;
  }
  try {
    const claims = IdTokenClaimsSchema.safeParse(
      JSON.parse(Buffer.from(payload, 'base64url').toString('utf8')),
    );
    if (!claims.success) {
      return undefined;
    }
    return (
      claims.data.email ?? claims.data.preferred_username ?? claims.data.sub
    );
  } catch {
    return undefined;
  }
}

/**
 * Process-scoped owner of the session and pending-request tables. Every
 * mutation of either table happens synchronously between awaits, so the
 * event loop is the single writer; network waits never hold it.
 */
export class SessionStore {
  private readonly sessions = new Map<string, SessionEntry>();
  private readonly pending = new Map<string, PendingRequest>();
  private readonly emitter = new EventEmitter();
  private readonly lifetime = new AbortController();
  private readonly logger = DebugLogger.getLogger(
    'tokenloom:auth:session-store',
  );
  private readonly settings: AuthSettings;
  private readonly now: () => number;
  private readonly random: () => number;
  private readonly canLaunchBrowser: () => boolean;
  private sequence = 0;
  private disposed = false;
  private storageTail: Promise<void> = Promise.resolve();

  constructor(private readonly options: SessionStoreOptions) {
    this.settings = options.settings ?? parseAuthSettings();
    this.now = options.now ?? Date.now;
    this.random = options.random ?? Math.random;
    this.canLaunchBrowser = options.canLaunchBrowser ?? shouldLaunchBrowser;
    this.emitter.setMaxListeners(50);
  }

  /**
   * Returns a usable session for the provider and scopes: a cached one
   * covering them, a silently refreshed one, or the result of a flow shared
   * with every concurrent caller for the same key.
   */
  async acquire(
    providerId: string,
    scopes: string | readonly string[],
    options: AcquireOptions = {},
  ): Promise<Session> {
    this.assertActive();
    const provider = this.options.registry.get(providerId);
    const scopeSet = normalizeScopes(provider.getConfig(), scopes);
    if (options.signal?.aborted) {
      throw new CancelledError();
    }

    const cached = await this.reuseCached(provider, scopeSet, options);
    if (cached) {
      return cached;
    }
    this.assertActive();

    const key = requestKey(providerId, options.accountHint, scopeSet);
    let pending = this.pending.get(key);
    if (pending) {
      this.logger.debug(() => `joining pending acquisition ${key}`);
      if (options.interactive !== false) {
        pending.mode.interactive = true;
        pending.mode.flow ??= options.flow;
      }
    } else {
      pending = this.startPending(provider, scopeSet, key, options);
    }
    return this.attach(pending, options.signal);
  }

  /**
   * Redeems the session's refresh token. Concurrent calls share one
   * request. A non-retryable failure destroys the session.
   */
  async refresh(session: Session): Promise<Session> {
    this.assertActive();
    const entry = this.sessions.get(session.id);
    if (!entry) {
      throw new AuthenticationRequiredError(session.providerId);
    }
    entry.refreshing ??= this.performRefresh(entry).finally(() => {
      entry.refreshing = undefined;
    });
    return entry.refreshing;
  }

  /**
   * Signs the session out: drops it, forgets its stored refresh token, and
   * asks the provider to revoke it. False when the session is unknown.
   */
  async revoke(session: Session): Promise<boolean> {
    this.assertActive();
    const entry = this.sessions.get(session.id);
    if (!entry) {
      return false;
    }
    const current = entry.session;
    await this.destroy(entry, 'signed out');

    const provider = this.options.registry.get(current.providerId);
    if (current.refreshToken !== undefined && provider.revoke) {
      try {
        await provider.revoke(
          current.scopes,
          current.refreshToken,
          this.lifetime.signal,
        );
      } catch (error) {
        this.logger.warn(
          () =>
            `revocation for ${current.providerId} failed: ${AuthErrorFactory.fromUnknown(error).message}`,
        );
      }
    }
    return true;
  }

  getSessions(providerId?: string): Session[] {
    return [...this.sessions.values()]
      .map((entry) => entry.session)
      .filter(
        (session) =>
          providerId === undefined || session.providerId === providerId,
      );
  }

  getSession(id: string): Session | undefined {
    return this.sessions.get(id)?.session;
  }

  onDidChangeSessions(
    listener: (event: SessionChangeEvent) => void,
  ): () => void {
    this.emitter.on(CHANGE_EVENT, listener);
    return () => this.emitter.off(CHANGE_EVENT, listener);
  }

  /**
   * Aborts every pending flow, which releases loopback ports and stops
   * device polling, and cancels refresh timers. Later calls fail with
   * CancelledError.
   */
  async dispose(): Promise<void> {
    if (this.disposed) {
      return;
    }
    this.disposed = true;
    this.lifetime.abort();
    const settling = [...this.pending.values()].map((pending) => {
      pending.controller.abort();
      return pending.promise;
    });
    for (const entry of this.sessions.values()) {
      this.clearTimer(entry);
    }
    await Promise.allSettled(settling);
    await this.storageTail;
    this.sessions.clear();
    this.emitter.removeAllListeners();
    this.logger.debug('session store disposed');
  }

  private assertActive(): void {
    if (this.disposed) {
      throw new CancelledError('Session store has been disposed');
    }
  }

  private isUsable(session: Session): boolean {
    return session.expiresAt - this.settings.expirySkewMs > this.now();
  }

  /**
   * Subset reuse: among sessions of the same provider, account (when
   * hinted), client id and tenant whose scopes cover the request, the one
   * with the fewest scopes wins, then the newest.
   */
  private findCovering(
    providerId: string,
    scopeSet: ScopeSet,
    accountHint: string | undefined,
  ): SessionEntry | undefined {
    const candidates = [...this.sessions.values()].filter(
      ({ session }) =>
        session.providerId === providerId &&
        (accountHint === undefined || session.account === accountHint) &&
        isScopeSubset(scopeSet, session.scopes),
    );
    candidates.sort(
      (a, b) =>
        a.session.scopes.scopes.length - b.session.scopes.scopes.length ||
        b.session.createdAt - a.session.createdAt ||
        b.sequence - a.sequence,
    );
    return candidates[0];
  }

  private async reuseCached(
    provider: AuthProvider,
    scopeSet: ScopeSet,
    options: AcquireOptions,
  ): Promise<Session | undefined> {
    const entry = this.findCovering(
      provider.id,
      scopeSet,
      options.accountHint,
    );
    if (!entry) {
      return undefined;
    }
    if (this.isUsable(entry.session)) {
      this.logger.debug(
        () =>
          `reusing session ${entry.session.id} [${entry.session.scopes.canonical}] for [${scopeSet.canonical}]`,
      );
      return entry.session;
    }
    if (entry.session.refreshToken === undefined) {
      return undefined;
    }

    try {
      return await this.refresh(entry.session);
    } catch (error) {
      const authError = AuthErrorFactory.fromUnknown(error);
      if (authError.isRetryable || authError.type === AuthErrorType.CANCELLED) {
        throw authError;
      }
      this.logger.debug(
        () => `stale session could not be refreshed: ${authError.message}`,
      );
      return undefined;
    }
  }

  private startPending(
    provider: AuthProvider,
    scopeSet: ScopeSet,
    key: string,
    options: AcquireOptions,
  ): PendingRequest {
    const controller = new AbortController();
    const mode: AcquisitionMode = {
      interactive: options.interactive !== false,
      flow: options.flow,
    };
    const promise = this.runAcquisition(
      provider,
      scopeSet,
      options.accountHint,
      controller.signal,
      mode,
    ).finally(() => {
      if (this.pending.get(key)?.promise === promise) {
        this.pending.delete(key);
      }
    });
    const pending: PendingRequest = {
      key,
      promise,
      controller,
      mode,
      waiters: 0,
    };
    this.pending.set(key, pending);
    return pending;
  }

  /**
   * One waiter's view of a pending request. Cancelling it detaches only
   * this waiter; the last one to leave aborts the flow.
   */
  private attach(
    pending: PendingRequest,
    signal: AbortSignal | undefined,
  ): Promise<Session> {
    pending.waiters += 1;
    if (signal === undefined) {
      return pending.promise;
    }

    return new Promise<Session>((resolve, reject) => {
      const onAbort = () => {
        pending.waiters -= 1;
        reject(new CancelledError());
        if (pending.waiters === 0) {
          this.logger.debug(() => `last waiter left ${pending.key}`);
          // Callers arriving from now on start a new flow
          if (this.pending.get(pending.key) === pending) {
            this.pending.delete(pending.key);
          }
          pending.controller.abort();
        }
      };
      signal.addEventListener('abort', onAbort, { once: true });
      pending.promise.then(
        (session) => {
          signal.removeEventListener('abort', onAbort);
          resolve(session);
        },
        (error: unknown) => {
          signal.removeEventListener('abort', onAbort);
          reject(error);
        },
      );
    });
  }

  private async runAcquisition(
    provider: AuthProvider,
    scopeSet: ScopeSet,
    accountHint: string | undefined,
    signal: AbortSignal,
    mode: AcquisitionMode,
  ): Promise<Session> {
    const silent = await this.trySilent(
      provider,
      scopeSet,
      accountHint,
      signal,
    );
    if (silent) {
      return silent;
    }
    if (signal.aborted) {
      throw new CancelledError();
    }
    if (!mode.interactive) {
      throw new AuthenticationRequiredError(provider.id);
    }

    const kind = this.selectFlow(provider, mode.flow);
    this.logger.debug(
      () => `starting ${kind} flow for ${provider.id} [${scopeSet.canonical}]`,
    );
    const tokens = await provider.startFlow(kind, scopeSet, {
      presenter: this.options.presenter,
      signal,
      accountHint,
    });
    this.assertActive();
    return this.addSession(
      provider.id,
      scopeSet,
      tokens,
      accountFromIdToken(tokens.idToken) ?? accountHint ?? DEFAULT_ACCOUNT,
    );
  }

  /**
   * Redeems a refresh token persisted by an earlier run. A rejected token
   * is forgotten; transient failures propagate.
   */
  private async trySilent(
    provider: AuthProvider,
    scopeSet: ScopeSet,
    accountHint: string | undefined,
    signal: AbortSignal,
  ): Promise<Session | undefined> {
    const storageKey = requestKey(provider.id, accountHint, scopeSet);
    const stored = await this.readStored(storageKey);
    if (!stored) {
      return undefined;
    }

    let tokens: TokenSet;
    try {
      tokens = await provider.refresh(scopeSet, stored.refreshToken, signal);
    } catch (error) {
      const authError = AuthErrorFactory.fromUnknown(
        error,
        undefined,
        provider.id,
      );
      if (signal.aborted || authError.isRetryable) {
        throw authError;
      }
      this.logger.debug(
        () => `stored refresh token rejected: ${authError.message}`,
      );
      void this.enqueueStorage(() =>
        this.forget(provider.id, stored.account, scopeSet),
      );
      return undefined;
    }
    this.assertActive();
    this.logger.debug(() => `restored session for ${stored.account}`);
    return this.addSession(provider.id, scopeSet, tokens, stored.account);
  }

  /**
   * Explicit choice, then the configured preference, then loopback when a
   * browser can be launched, then device code when the provider has it.
   */
  private selectFlow(
    provider: AuthProvider,
    requested: FlowKind | undefined,
  ): FlowKind {
    if (requested) {
      return requested;
    }
    const supported = provider.supportedFlows();
    const preferred = this.settings.preferredFlow;
    if (preferred !== 'auto' && supported.includes(preferred)) {
      return preferred;
    }
    if (supported.includes('loopback') && this.canLaunchBrowser()) {
      return 'loopback';
    }
    if (supported.includes('device_code')) {
      return 'device_code';
    }
    return 'loopback';
  }

  private addSession(
    providerId: string,
    scopeSet: ScopeSet,
    tokens: TokenSet,
    account: string,
  ): Session {
    const existing = [...this.sessions.values()].find(
      ({ session }) =>
        session.providerId === providerId &&
        session.account === account &&
        session.scopes.key === scopeSet.key,
    );
    const session: Session = Object.freeze({
      id: existing?.session.id ?? randomUUID(),
      providerId,
      account,
      scopes: scopeSet,
      accessToken: tokens.accessToken,
      refreshToken: tokens.refreshToken,
      expiresAt: tokens.expiresAt,
      createdAt: this.now(),
    });

    const entry: SessionEntry = existing ?? {
      session,
      sequence: 0,
      refreshAttempts: 0,
      timer: undefined,
      refreshing: undefined,
    };
    entry.session = session;
    entry.sequence = ++this.sequence;
    entry.refreshAttempts = 0;
    this.sessions.set(session.id, entry);
    this.schedule(entry);
    this.emit(
      existing
        ? { providerId, added: [], removed: [], changed: [session] }
        : { providerId, added: [session], removed: [], changed: [] },
    );

    void this.enqueueStorage(() => this.persist(session));
    return session;
  }

  private async performRefresh(entry: SessionEntry): Promise<Session> {
    const current = entry.session;
    if (current.refreshToken === undefined) {
      throw new AuthenticationRequiredError(current.providerId);
    }
    const provider = this.options.registry.get(current.providerId);

    let tokens: TokenSet;
    try {
      tokens = await provider.refresh(
        current.scopes,
        current.refreshToken,
        this.lifetime.signal,
      );
    } catch (error) {
      const authError = AuthErrorFactory.fromUnknown(
        error,
        'Refresh',
        current.providerId,
      );
      if (!authError.isRetryable && !this.disposed) {
        await this.destroy(entry, authError.message);
      }
      throw authError;
    }

    if (this.sessions.get(current.id) !== entry) {
      throw new AuthenticationRequiredError(current.providerId);
    }
    const refreshed: Session = Object.freeze({
      ...current,
      accessToken: tokens.accessToken,
      refreshToken: tokens.refreshToken ?? current.refreshToken,
      expiresAt: tokens.expiresAt,
    });
    entry.session = refreshed;
    entry.refreshAttempts = 0;
    this.schedule(entry);
    this.logger.debug(() => `refreshed session ${refreshed.id}`);
    this.emit({
      providerId: refreshed.providerId,
      added: [],
      removed: [],
      changed: [refreshed],
    });

    if (refreshed.refreshToken !== current.refreshToken) {
      void this.enqueueStorage(() => this.persist(refreshed));
    }
    return refreshed;
  }

  /**
   * Refresh at `expiresAt - refreshLeadTimeMs - jitter`, or halfway through
   * the remaining lifetime when that moment has passed.
   */
  private schedule(entry: SessionEntry): void {
    this.clearTimer(entry);
    const { session } = entry;
    if (session.refreshToken === undefined || this.disposed) {
      return;
    }
    const now = this.now();
    const jitter =
      this.settings.refreshJitterMs > 0
        ? Math.floor(this.random() * this.settings.refreshJitterMs)
        : 0;
    const at = session.expiresAt - this.settings.refreshLeadTimeMs - jitter;
    const delayMs =
      at > now
        ? at - now
        : Math.max(0, Math.floor((session.expiresAt - now) / 2));
    this.setTimer(entry, delayMs);
  }

  private setTimer(entry: SessionEntry, delayMs: number): void {
    this.clearTimer(entry);
    const id = entry.session.id;
    // Longer delays overflow and fire immediately; re-arm instead
    const overflows = delayMs > MAX_TIMER_DELAY_MS;
    entry.timer = setTimeout(
      () => {
        entry.timer = undefined;
        if (overflows) {
          this.schedule(entry);
          return;
        }
        void this.runScheduledRefresh(id);
      },
      Math.min(delayMs, MAX_TIMER_DELAY_MS),
    );
    entry.timer.unref();
  }

  private clearTimer(entry: SessionEntry): void {
    if (entry.timer !== undefined) {
      clearTimeout(entry.timer);
      entry.timer = undefined;
    }
  }

  /**
   * Background refresh. Transient failures back off up to
   * `maxRefreshAttempts`; after that the session is destroyed.
   */
  private async runScheduledRefresh(id: string): Promise<void> {
    const entry = this.sessions.get(id);
    if (!entry || this.disposed) {
      return;
    }
    try {
      await this.refresh(entry.session);
    } catch (error) {
      if (this.disposed || this.sessions.get(id) !== entry) {
        return;
      }
      entry.refreshAttempts += 1;
      const message = error instanceof Error ? error.message : String(error);
      if (entry.refreshAttempts >= this.settings.maxRefreshAttempts) {
        this.logger.warn(
          () =>
            `giving up on session ${id} after ${entry.refreshAttempts} refresh attempts: ${message}`,
        );
        await this.destroy(entry, 'refresh retries exhausted');
        return;
      }
      const delayMs = computeBackoffDelay(
        entry.refreshAttempts,
        this.settings.refreshRetry,
        this.random,
      );
      this.logger.debug(
        () =>
          `refresh attempt ${entry.refreshAttempts} failed (${message}); retrying in ${delayMs}ms`,
      );
      this.setTimer(entry, delayMs);
    }
  }

  private async destroy(entry: SessionEntry, reason: string): Promise<void> {
    const { session } = entry;
    if (this.sessions.get(session.id) !== entry) {
      return;
    }
    this.clearTimer(entry);
    this.sessions.delete(session.id);
    this.logger.debug(() => `removed session ${session.id}: ${reason}`);
    this.emit({
      providerId: session.providerId,
      added: [],
      removed: [session],
      changed: [],
    });
    await this.enqueueStorage(() =>
      this.forget(session.providerId, session.account, session.scopes),
    );
  }

  private emit(event: SessionChangeEvent): void {
    try {
      this.emitter.emit(CHANGE_EVENT, event);
    } catch (error) {
      this.logger.error(
        () =>
          `session change listener threw: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
  }

  // Secure storage. Failures degrade to in-memory sessions and are logged.

  /**
   * Storage work runs one task at a time, in order, off the acquisition
   * path. The returned promise never rejects.
   */
  private enqueueStorage(task: () => Promise<void>): Promise<void> {
    this.storageTail = this.storageTail.then(task).catch((error: unknown) => {
      this.logStorageFailure('update', 'secure storage', error);
    });
    return this.storageTail;
  }

  private async readStored(
    storageKey: string,
  ): Promise<StoredCredential | undefined> {
    try {
      const raw = await this.options.storage.get(storageKey);
      return raw === null ? undefined : decodeCredential(raw);
    } catch (error) {
      this.logStorageFailure('read', storageKey, error);
      return undefined;
    }
  }

  /**
   * Writes under the account's key and the any-account alias used by
   * callers without an account hint.
   */
  private async persist(session: Session): Promise<void> {
    if (session.refreshToken === undefined) {
      return;
    }
    const value = encodeCredential({
      account: session.account,
      refreshToken: session.refreshToken,
      scopes: session.scopes.key,
      savedAt: this.now(),
    });
    for (const account of [session.account, undefined]) {
      const storageKey = requestKey(
        session.providerId,
        account,
        session.scopes,
      );
      try {
        await this.options.storage.set(storageKey, value);
      } catch (error) {
        this.logStorageFailure('write', storageKey, error);
      }
    }
  }

  private async forget(
    providerId: string,
    account: string,
    scopes: ScopeSet,
  ): Promise<void> {
    const accountKey = requestKey(providerId, account, scopes);
    const aliasKey = requestKey(providerId, undefined, scopes);
    const keys = [accountKey];
    const alias = await this.readStored(aliasKey);
    if (alias?.account === account) {
      keys.push(aliasKey);
    }
    for (const storageKey of keys) {
      try {
        await this.options.storage.delete(storageKey);
      } catch (error) {
        this.logStorageFailure('delete', storageKey, error);
      }
    }
  }

  private logStorageFailure(
    operation: string,
    storageKey: string,
    error: unknown,
  ): void {
    const storageError =
      error instanceof StorageError
        ? error
        : new StorageError(
            `Secure storage ${operation} failed: ${error instanceof Error ? error.message : String(error)}`,
            { cause: error, technicalDetails: { key: storageKey } },
          );
    this.logger.warn(
      () => `${storageError.message} (${storageKey}); continuing in memory`,
    );
  }
}
