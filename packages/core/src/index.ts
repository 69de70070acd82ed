/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * apigate core
 *
 * Rate limiting, caching, retries and call metrics for named third-party
 * APIs, behind one gateway.
 */

// Gateway
export {
  ApiGateway,
  type GatewayDependencies,
  type GatewayStats,
  type QueryFailure,
  type QueryOptions,
  type QueryResult,
  type QuerySuccess,
  type ResponseProcessor,
} from './core/apiGateway.js';

// Rate limiting
export {
  RateLimiter,
  type ApiRegistration,
  type RateLimiterOptions,
  type RateLimiterSnapshot,
  type ReleaseFn,
} from './core/rateLimiter.js';

// Caching
export {
  PersistentResponseCache,
  type CacheEntry,
  type ResponseCacheOptions,
  type ResponseCacheStats,
} from './core/responseCache.js';

export {
  BoundedCache,
  type BoundedCacheOptions,
  type BoundedCacheStats,
} from './core/boundedCache.js';

export {
  canonicalJson,
  fingerprint,
  resolveFingerprint,
  type RequestKey,
  type RequestParams,
} from './core/fingerprint.js';

// Transport
export {
  HttpTransport,
  HTTP_METHODS,
  isHttpMethod,
  type HttpMethod,
  type HttpTransportOptions,
  type Transport,
  type TransportRequest,
  type TransportResponse,
} from './core/httpTransport.js';

// Performance monitoring
export {
  PerformanceMonitor,
  type ApiCallStats,
  type CallOutcome,
  type PerformanceSummary,
} from './core/performanceMonitor.js';

// Errors
export {
  CacheWriteError,
  CancelledError,
  ConfigurationError,
  FatalConfigError,
  FatalError,
  GatewayError,
  ProcessingError,
  RateLimitExceededError,
  RETRYABLE_ERROR_KINDS,
  TimeoutError,
  TransportError,
  UpstreamError,
  getErrorMessage,
  isRetryableKind,
  toErrorKind,
  type ErrorKind,
} from './core/errors.js';

// Configuration
export {
  ApiRegistrationSchema,
  ENV_VARIABLES,
  GatewayConfigSchema,
  formatConfigIssues,
  loadGatewayConfig,
  parseGatewayConfig,
  readEnvConfig,
  type ApiRegistrationConfig,
  type GatewayConfig,
  type GatewayConfigInput,
} from './config/gatewayConfig.js';

// Utilities
export {
  ConsoleLogger,
  LogLevel,
  createLogger,
  logger,
  parseLogLevel,
  silentLogger,
  type LogData,
  type Logger,
} from './utils/logger.js';
export { sleep } from './utils/sleep.js';
export {
  formatDuration,
  formatStats,
  getStatsJson,
  getStatsText,
  type StatsOptions,
} from './utils/stats.js';
export { DEFAULT_USER_AGENT, VERSION } from './version.js';
