/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, it, expect } from 'vitest';
import {
  InMemorySecureStorage,
  KeyringSecureStorage,
  decodeCredential,
  encodeCredential,
  type KeyringAdapter,
} from './secure-storage.js';
import { StorageError } from '../auth/oauth-errors.js';

// ─── Test Helpers ────────────────────────────────────────────────────────────

function createMockKeyring(): KeyringAdapter & { store: Map<string, string> } {
  const store = new Map<string, string>();
  return {
    store,
    getPassword: async (service: string, account: string) =>
      store.get(`${service}:${account}`) ?? null,
    setPassword: async (service: string, account: string, password: string) => {
      store.set(`${service}:${account}`, password);
    },
    deletePassword: async (service: string, account: string) =>
      store.delete(`${service}:${account}`),
  };
}

describe('InMemorySecureStorage', () => {
  it('stores, reads and deletes values', async () => {
    const storage = new InMemorySecureStorage();

    await storage.set('github|*|repo', 'value');
    expect(await storage.get('github|*|repo')).toBe('value');
    expect(storage.keys()).toEqual(['github|*|repo']);

    await storage.delete('github|*|repo');
    expect(await storage.get('github|*|repo')).toBeNull();
  });
});

describe('KeyringSecureStorage', () => {
  it('namespaces entries under the service name', async () => {
    const keyring = createMockKeyring();
    const storage = new KeyringSecureStorage({
      service: 'tokenloom-test',
      keyringLoader: async () => keyring,
    });

    await storage.set('key', 'secret');

    expect(keyring.store.get('tokenloom-test:key')).toBe('secret');
    expect(await storage.get('key')).toBe('secret');
    await storage.delete('key');
    expect(keyring.store.size).toBe(0);
  });

  it('loads the keyring once', async () => {
    let loads = 0;
    const keyring = createMockKeyring();
    const storage = new KeyringSecureStorage({
      keyringLoader: async () => {
        loads += 1;
        return keyring;
      },
    });

    await storage.get('a');
    await storage.set('b', 'c');

    expect(loads).toBe(1);
  });

  it('reports an unavailable keyring as a StorageError', async () => {
    const storage = new KeyringSecureStorage({
      keyringLoader: async () => null,
    });

    await expect(storage.get('key')).rejects.toThrow(
      'Cannot read: OS keyring is unavailable',
    );
  });

  it('wraps adapter failures', async () => {
    const keyring = createMockKeyring();
    keyring.setPassword = async () => {
      throw new Error('keychain locked');
    };
    const storage = new KeyringSecureStorage({
      keyringLoader: async () => keyring,
    });

    const error = await storage.set('key', 'value').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(StorageError);
    expect(error).toMatchObject({
      message: 'Keyring write failed: keychain locked',
      technicalDetails: { key: 'key' },
    });
  });
});

describe('stored credential encoding', () => {
  it('decodes what it encodes', () => {
    const credential = {
      account: 'octocat',
      refreshToken: 'test-refresh',
      scopes: 'repo',
      savedAt: 1700000000000,
    };

    expect(decodeCredential(encodeCredential(credential))).toEqual(credential);
  });

  it('rejects corrupt values', () => {
    expect(() => decodeCredential('not json')).toThrow(
      'Stored credential is not valid JSON',
    );
    expect(() => decodeCredential('{"account":"a"}')).toThrow(
      'Stored credential has an unexpected shape',
    );
  });
});
