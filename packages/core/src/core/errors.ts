/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Failure taxonomy shared by the gateway, its transport and its callers.
 */
export type ErrorKind =
  | 'ConfigurationError'
  | 'RateLimitExceeded'
  | 'TransportError'
  | 'TimeoutError'
  | 'UpstreamError'
  | 'CacheWriteError'
  | 'ProcessingError'
  | 'Cancelled'
  | 'InternalError';

/**
 * Kinds that draw on the shared retry budget of a query.
 */
export const RETRYABLE_ERROR_KINDS: ReadonlySet<ErrorKind> = new Set<ErrorKind>([
  'RateLimitExceeded',
  'TransportError',
  'TimeoutError',
  'UpstreamError',
]);

export function isRetryableKind(kind: ErrorKind): boolean {
  return RETRYABLE_ERROR_KINDS.has(kind);
}

/**
 * Base class for every error raised inside the access layer.
 */
export class GatewayError extends Error {
  constructor(
    message: string,
    public readonly kind: ErrorKind,
  ) {
    super(message);
    this.name = 'GatewayError';
  }
}

/**
 * Unknown API name, invalid registration or invalid query input. Never retried.
 */
export class ConfigurationError extends GatewayError {
  constructor(message: string) {
    super(message, 'ConfigurationError');
    this.name = 'ConfigurationError';
  }
}

export class RateLimitExceededError extends GatewayError {
  constructor(
    message: string,
    public readonly status = 429,
  ) {
    super(message, 'RateLimitExceeded');
    this.name = 'RateLimitExceededError';
  }
}

/**
 * Connection, DNS or TLS failure: no response was received.
 */
export class TransportError extends GatewayError {
  constructor(
    message: string,
    public readonly code?: string,
  ) {
    super(message, 'TransportError');
    this.name = 'TransportError';
  }
}

export class TimeoutError extends GatewayError {
  constructor(
    message: string,
    public readonly timeoutMs?: number,
  ) {
    super(message, 'TimeoutError');
    this.name = 'TimeoutError';
  }
}

/**
 * Non-2xx, non-429 response from the upstream service.
 */
export class UpstreamError extends GatewayError {
  constructor(
    message: string,
    public readonly status: number,
  ) {
    super(message, 'UpstreamError');
    this.name = 'UpstreamError';
  }
}

/**
 * Raised internally when a cache entry cannot be persisted. Always absorbed.
 */
export class CacheWriteError extends GatewayError {
  constructor(
    message: string,
    public readonly fingerprint: string,
  ) {
    super(message, 'CacheWriteError');
    this.name = 'CacheWriteError';
  }
}

/**
 * The caller's response processor threw. Never retried.
 */
export class ProcessingError extends GatewayError {
  constructor(
    message: string,
    public readonly originalError?: unknown,
  ) {
    super(message, 'ProcessingError');
    this.name = 'ProcessingError';
  }
}

export class CancelledError extends GatewayError {
  constructor(message = 'Operation was cancelled') {
    super(message, 'Cancelled');
    this.name = 'CancelledError';
  }
}

/**
 * Error that should terminate the process with a specific exit code.
 */
export class FatalError extends Error {
  constructor(
    message: string,
    public readonly exitCode: number,
  ) {
    super(message);
    this.name = 'FatalError';
  }
}

export class FatalConfigError extends FatalError {
  constructor(message: string) {
    super(message, 3);
    this.name = 'FatalConfigError';
  }
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Map an arbitrary thrown value onto the taxonomy. Anything that is not
 * a GatewayError gets `fallback`.
 */
export function toErrorKind(
  error: unknown,
  fallback: ErrorKind = 'InternalError',
): ErrorKind {
  if (error instanceof GatewayError) {
    return error.kind;
  }
  return fallback;
}
