/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Error taxonomy for session acquisition, flows and refresh.
 */

/**
 * Handling categories
 */
export enum AuthErrorCategory {
  /** The user must act (sign in again, approve, restart the flow) */
  USER_ACTION_REQUIRED = 'user_action_required',
  /** Network or temporary service issues that can be retried */
  TRANSIENT = 'transient',
  /** Local problems such as an unavailable keyring */
  SYSTEM = 'system',
  /** Suspicious input: forged or stale callbacks */
  SECURITY = 'security',
  /** Caller or provider configuration problems */
  CONFIGURATION = 'configuration',
}

export enum AuthErrorType {
  INVALID_SCOPE = 'invalid_scope',
  MISSING_PARAMETER = 'missing_parameter',
  CSRF_MISMATCH = 'csrf_mismatch',
  EXPIRED = 'expired',
  DENIED = 'denied',
  TIMEOUT = 'timeout',
  NETWORK = 'network',
  STORAGE = 'storage',
  CANCELLED = 'cancelled',
  AUTHENTICATION_REQUIRED = 'authentication_required',
  UNKNOWN_PROVIDER = 'unknown_provider',
  PROVIDER_RESPONSE = 'provider_response',
  CONFIGURATION = 'configuration',
  UNKNOWN = 'unknown',
}

/**
 * Retry strategy configuration
 */
export interface RetryConfig {
  /** Base delay before the first retry in milliseconds */
  baseDelayMs: number;
  /** Multiplier for exponential backoff */
  backoffMultiplier: number;
  /** Upper bound for a single delay in milliseconds */
  maxDelayMs: number;
  /** Scale each delay to a random 50-100% of its value */
  jitter: boolean;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  baseDelayMs: 1000,
  backoffMultiplier: 2,
  maxDelayMs: 30000,
  jitter: true,
};

export interface AuthErrorOptions {
  provider?: string;
  technicalDetails?: Record<string, unknown>;
  cause?: unknown;
}

export class AuthError extends Error {
  readonly type: AuthErrorType;
  readonly category: AuthErrorCategory;
  readonly provider: string | undefined;
  readonly isRetryable: boolean;
  readonly technicalDetails: Record<string, unknown>;

  constructor(
    type: AuthErrorType,
    message: string,
    options: AuthErrorOptions = {},
  ) {
    super(
      message,
      options.cause === undefined ? undefined : { cause: options.cause },
    );
    this.name = 'AuthError';
    this.type = type;
    this.category = categorize(type);
    this.isRetryable =
      type === AuthErrorType.NETWORK || type === AuthErrorType.TIMEOUT;
    this.provider = options.provider;
    this.technicalDetails = options.technicalDetails ?? {};
  }

  /**
   * Creates a sanitized version of the error for logging
   */
  toLogEntry(): Record<string, unknown> {
    const cause = this.cause;
    return {
      name: this.name,
      type: this.type,
      category: this.category,
      provider: this.provider,
      isRetryable: this.isRetryable,
      message: this.message,
      technicalDetails: this.technicalDetails,
      cause:
        cause instanceof Error
          ? { name: cause.name, message: cause.message }
          : cause === undefined
            ? null
            : String(cause),
    };
  }
}

function categorize(type: AuthErrorType): AuthErrorCategory {
  switch (type) {
    case AuthErrorType.MISSING_PARAMETER:
    case AuthErrorType.EXPIRED:
    case AuthErrorType.DENIED:
    case AuthErrorType.CANCELLED:
    case AuthErrorType.AUTHENTICATION_REQUIRED:
      return AuthErrorCategory.USER_ACTION_REQUIRED;
    case AuthErrorType.NETWORK:
    case AuthErrorType.TIMEOUT:
      return AuthErrorCategory.TRANSIENT;
    case AuthErrorType.CSRF_MISMATCH:
      return AuthErrorCategory.SECURITY;
    case AuthErrorType.INVALID_SCOPE:
    case AuthErrorType.UNKNOWN_PROVIDER:
    case AuthErrorType.CONFIGURATION:
      return AuthErrorCategory.CONFIGURATION;
    default:
      return AuthErrorCategory.SYSTEM;
  }
}

export class InvalidScopeError extends AuthError {
  readonly scope: string;

  constructor(scope: string, reason: string, options: AuthErrorOptions = {}) {
    super(AuthErrorType.INVALID_SCOPE, `Invalid scope "${scope}": ${reason}`, {
      ...options,
      technicalDetails: { ...options.technicalDetails, scope, reason },
    });
    this.name = 'InvalidScopeError';
    this.scope = scope;
  }
}

export class MissingParameterError extends AuthError {
  readonly parameters: readonly string[];

  constructor(parameters: readonly string[], options: AuthErrorOptions = {}) {
    super(
      AuthErrorType.MISSING_PARAMETER,
      `OAuth callback missing required parameter(s): ${parameters.join(', ')}`,
      options,
    );
    this.name = 'MissingParameterError';
    this.parameters = parameters;
  }
}

export class CsrfMismatchError extends AuthError {
  constructor(options: AuthErrorOptions = {}) {
    super(
      AuthErrorType.CSRF_MISMATCH,
      'OAuth state mismatch. Possible CSRF attempt or stale browser tab.',
      options,
    );
    this.name = 'CsrfMismatchError';
  }
}

export class ExpiredError extends AuthError {
  constructor(
    message = 'The device code expired before it was approved',
    options: AuthErrorOptions = {},
  ) {
    super(AuthErrorType.EXPIRED, message, options);
    this.name = 'ExpiredError';
  }
}

export class DeniedError extends AuthError {
  constructor(
    message = 'Authorization was denied',
    options: AuthErrorOptions = {},
  ) {
    super(AuthErrorType.DENIED, message, options);
    this.name = 'DeniedError';
  }
}

export class TimeoutError extends AuthError {
  readonly timeoutMs: number;

  constructor(
    what: string,
    timeoutMs: number,
    options: AuthErrorOptions = {},
  ) {
    super(
      AuthErrorType.TIMEOUT,
      `${what} timed out after ${timeoutMs}ms`,
      options,
    );
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

export class NetworkError extends AuthError {
  readonly status: number | undefined;

  constructor(
    message: string,
    options: AuthErrorOptions & { status?: number } = {},
  ) {
    super(AuthErrorType.NETWORK, message, options);
    this.name = 'NetworkError';
    this.status = options.status;
  }
}

export class StorageError extends AuthError {
  constructor(message: string, options: AuthErrorOptions = {}) {
    super(AuthErrorType.STORAGE, message, options);
    this.name = 'StorageError';
  }
}

export class CancelledError extends AuthError {
  constructor(
    message = 'Authentication was cancelled',
    options: AuthErrorOptions = {},
  ) {
    super(AuthErrorType.CANCELLED, message, options);
    this.name = 'CancelledError';
  }
}

export class AuthenticationRequiredError extends AuthError {
  constructor(provider: string, options: AuthErrorOptions = {}) {
    super(
      AuthErrorType.AUTHENTICATION_REQUIRED,
      `No session for ${provider}; interactive sign-in is required`,
      { ...options, provider },
    );
    this.name = 'AuthenticationRequiredError';
  }
}

export class UnknownProviderError extends AuthError {
  constructor(provider: string) {
    super(AuthErrorType.UNKNOWN_PROVIDER, `Unknown provider: ${provider}`, {
      provider,
    });
    this.name = 'UnknownProviderError';
  }
}

/**
 * An OAuth error response (RFC 6749 section 5.2) or a body that failed
 * validation.
 */
export class ProviderResponseError extends AuthError {
  readonly errorCode: string;
  readonly status: number | undefined;

  constructor(
    errorCode: string,
    description: string | undefined,
    options: AuthErrorOptions & { status?: number } = {},
  ) {
    super(
      AuthErrorType.PROVIDER_RESPONSE,
      description ? `${errorCode}: ${description}` : errorCode,
      options,
    );
    this.name = 'ProviderResponseError';
    this.errorCode = errorCode;
    this.status = options.status;
  }
}

export class ConfigurationError extends AuthError {
  constructor(message: string, options: AuthErrorOptions = {}) {
    super(AuthErrorType.CONFIGURATION, message, options);
    this.name = 'ConfigurationError';
  }
}

const TRANSIENT_ERROR_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ECONNABORTED',
  'ENETUNREACH',
  'EHOSTUNREACH',
  'ETIMEDOUT',
  'EPIPE',
  'EAI_AGAIN',
  'ENOTFOUND',
  'UND_ERR_SOCKET',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_BODY_TIMEOUT',
]);

function errorCodeOf(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

export class AuthErrorFactory {
  /**
   * Classifies a foreign error. AuthErrors pass through unchanged.
   */
  static fromUnknown(
    error: unknown,
    context?: string,
    provider?: string,
  ): AuthError {
    if (error instanceof AuthError) {
      return error;
    }

    const message = error instanceof Error ? error.message : String(error);
    const prefixed = context ? `${context}: ${message}` : message;
    const options: AuthErrorOptions = { provider, cause: error };

    if (error instanceof Error && error.name === 'AbortError') {
      return new CancelledError(prefixed, options);
    }

    const codes = [errorCodeOf(error)];
    if (error instanceof Error) {
      codes.push(errorCodeOf(error.cause));
    }
    if (
      codes.some(
        (code) => code !== undefined && TRANSIENT_ERROR_CODES.has(code),
      ) ||
      /fetch failed|network|socket hang up/i.test(message)
    ) {
      return new NetworkError(prefixed, options);
    }

    return new AuthError(AuthErrorType.UNKNOWN, prefixed, options);
  }
}

/**
 * Delay before retry number `attempt` (1-based).
 */
export function computeBackoffDelay(
  attempt: number,
  config: RetryConfig = DEFAULT_RETRY_CONFIG,
  random: () => number = Math.random,
): number {
  const exponential =
    config.baseDelayMs *
    Math.pow(config.backoffMultiplier, Math.max(0, attempt - 1));
  const capped = Math.min(exponential, config.maxDelayMs);
  return config.jitter ? Math.round(capped * (0.5 + random() * 0.5)) : capped;
}
