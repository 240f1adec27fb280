/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Opaque get/set/delete storage for refresh tokens, with an OS keyring
 * implementation and an in-memory one for tests and keyring-less hosts.
 */

import { DebugLogger } from '../debug/index.js';
import {
  StoredCredentialSchema,
  type StoredCredential,
} from '../auth/types.js';
import { StorageError } from '../auth/oauth-errors.js';

export const KEYRING_SERVICE = 'tokenloom';

export interface SecureStorage {
  get(key: string): Promise<string | null>;
  set(key: string, value: string): Promise<void>;
  delete(key: string): Promise<void>;
}

export class InMemorySecureStorage implements SecureStorage {
  private readonly entries = new Map<string, string>();

  async get(key: string): Promise<string | null> {
    return this.entries.get(key) ?? null;
  }

  async set(key: string, value: string): Promise<void> {
    this.entries.set(key, value);
  }

  async delete(key: string): Promise<void> {
    this.entries.delete(key);
  }

  keys(): string[] {
    return [...this.entries.keys()];
  }
}

// ─── Keyring ─────────────────────────────────────────────────────────────────

export interface KeyringAdapter {
  getPassword(service: string, account: string): Promise<string | null>;
  setPassword(
    service: string,
    account: string,
    password: string,
  ): Promise<void>;
  deletePassword(service: string, account: string): Promise<boolean>;
}

export interface KeyringSecureStorageOptions {
  service?: string;
  keyringLoader?: () => Promise<KeyringAdapter | null>;
}

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    return typeof error.code === 'string' ? error.code : undefined;
  }
  return undefined;
}

/**
 * Loads @napi-rs/keyring. Resolves to null when the native module is
 * missing for this platform.
 */
export async function createDefaultKeyringAdapter(): Promise<
  KeyringAdapter | null
> {
  const logger = DebugLogger.getLogger('tokenloom:storage:keyring');
  try {
    const { AsyncEntry } = await import('@napi-rs/keyring');
    return {
      getPassword: async (service: string, account: string) => {
        const entry = new AsyncEntry(service, account);
        return (await entry.getPassword()) ?? null;
      },
      setPassword: async (
        service: string,
        account: string,
        password: string,
      ) => {
        const entry = new AsyncEntry(service, account);
        await entry.setPassword(password);
      },
      deletePassword: async (service: string, account: string) => {
        const entry = new AsyncEntry(service, account);
        return entry.deleteCredential();
      },
    };
  } catch (error) {
    const code = errorCode(error);
    const message = error instanceof Error ? error.message : String(error);
    if (
      code === 'ERR_MODULE_NOT_FOUND' ||
      code === 'MODULE_NOT_FOUND' ||
      code === 'ERR_DLOPEN_FAILED'
    ) {
      logger.debug(() => `@napi-rs/keyring not available: ${message}`);
    } else {
      logger.warn(
        () => `Unexpected error loading @napi-rs/keyring: ${message}`,
      );
    }
    return null;
  }
}

/**
 * Stores values in the OS keychain under one service name. Every failure,
 * including a missing keyring, surfaces as a StorageError.
 */
export class KeyringSecureStorage implements SecureStorage {
  private readonly service: string;
  private readonly keyringLoader: () => Promise<KeyringAdapter | null>;
  private readonly logger = DebugLogger.getLogger('tokenloom:storage:keyring');
  private adapter: Promise<KeyringAdapter | null> | undefined;

  constructor(options: KeyringSecureStorageOptions = {}) {
    this.service = options.service ?? KEYRING_SERVICE;
    this.keyringLoader = options.keyringLoader ?? createDefaultKeyringAdapter;
  }

  async get(key: string): Promise<string | null> {
    const keyring = await this.requireKeyring('read');
    try {
      const value = await keyring.getPassword(this.service, key);
      this.logger.debug(() => `[get] key='${key}' found=${value !== null}`);
      return value;
    } catch (error) {
      throw this.wrap('read', key, error);
    }
  }

  async set(key: string, value: string): Promise<void> {
    const keyring = await this.requireKeyring('write');
    try {
      await keyring.setPassword(this.service, key, value);
      this.logger.debug(() => `[set] key='${key}'`);
    } catch (error) {
      throw this.wrap('write', key, error);
    }
  }

  async delete(key: string): Promise<void> {
    const keyring = await this.requireKeyring('delete');
    try {
      const deleted = await keyring.deletePassword(this.service, key);
      this.logger.debug(() => `[delete] key='${key}' deleted=${deleted}`);
    } catch (error) {
      throw this.wrap('delete', key, error);
    }
  }

  private async requireKeyring(operation: string): Promise<KeyringAdapter> {
    this.adapter ??= this.keyringLoader().catch((error: unknown) => {
      this.logger.debug(() => `keyring load failed: ${String(error)}`);
      return null;
    });
    const keyring = await this.adapter;
    if (keyring === null) {
      throw new StorageError(`Cannot ${operation}: OS keyring is unavailable`);
    }
    return keyring;
  }

  private wrap(operation: string, key: string, error: unknown): StorageError {
    const message = error instanceof Error ? error.message : String(error);
    return new StorageError(`Keyring ${operation} failed: ${message}`, {
      cause: error,
      technicalDetails: { key },
    });
  }
}

// ─── Stored credential encoding ──────────────────────────────────────────────

export function encodeCredential(credential: StoredCredential): string {
  return JSON.stringify(credential);
}

/**
 * Parses a stored value. Corrupt values are a StorageError so callers treat
 * them like any other storage failure.
 */
export function decodeCredential(raw: string): StoredCredential {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new StorageError('Stored credential is not valid JSON', {
      cause: error,
    });
  }
  const result = StoredCredentialSchema.safeParse(parsed);
  if (!result.success) {
    throw new StorageError('Stored credential has an unexpected shape', {
      technicalDetails: { issues: result.error.issues.map((i) => i.message) },
    });
  }
  return result.data;
}
