/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

// Export public facade
export * from './auth/authentication-service.js';
export * from './auth/session-store.js';
export * from './auth/provider-registry.js';
export * from './auth/builtin-providers.js';

// Export flows
export * from './auth/device-code-flow.js';
export * from './auth/authorization-code-flow.js';
export * from './auth/loopback-callback-server.js';
export * from './auth/token-client.js';
export * from './auth/pkce.js';

// Export scopes and types
export * from './auth/scope-normalizer.js';
export * from './auth/types.js';
export * from './auth/oauth-errors.js';

// Export config and storage
export * from './config/auth-settings.js';
export * from './storage/secure-storage.js';

// Export utilities
export * from './utils/paths.js';
export * from './utils/delay.js';
export * from './debug/index.js';
