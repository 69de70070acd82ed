/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Single entry point for calls to named third-party APIs.
 *
 * A query is answered from the persistent cache when possible; otherwise it
 * runs up to `maxRetries` rate-limited attempts through the shared transport.
 * Every outcome, failures included, comes back as a {@link QueryResult}.
 *
 * @example
 * ```typescript
 * const gateway = new ApiGateway({
 *   apis: [{ name: 'places', callsPerSecond: 0.5, maxConcurrent: 3 }],
 * });
 * const result = await gateway.query('places', 'https://places.test/search', {
 *   q: 'bakery',
 * });
 * if (result.success) {
 *   console.log(result.data);
 * }
 * gateway.close();
 * ```
 */

import { BoundedCache, type BoundedCacheStats } from './boundedCache.js';
import {
  getErrorMessage,
  isRetryableKind,
  toErrorKind,
  type ErrorKind,
} from './errors.js';
import { fingerprint, type RequestParams } from './fingerprint.js';
import {
  HttpTransport,
  isHttpMethod,
  type HttpMethod,
  type Transport,
  type TransportResponse,
} from './httpTransport.js';
import {
  PerformanceMonitor,
  type PerformanceSummary,
} from './performanceMonitor.js';
import {
  RateLimiter,
  type RateLimiterSnapshot,
  type ReleaseFn,
} from './rateLimiter.js';
import {
  PersistentResponseCache,
  type ResponseCacheStats,
} from './responseCache.js';
import {
  parseGatewayConfig,
  type GatewayConfig,
  type GatewayConfigInput,
} from '../config/gatewayConfig.js';
import { logger as defaultLogger, type Logger } from '../utils/logger.js';
import { linkSignals } from '../utils/signals.js';
import { sleep } from '../utils/sleep.js';

export interface GatewayDependencies {
  /** Replaces the shared HTTP connection pool */
  transport?: Transport;
  logger?: Logger;
  monitor?: PerformanceMonitor;
}

export type ResponseProcessor<T> = (payload: unknown) => T;

export interface QueryOptions<T = unknown> {
  /** HTTP method, `GET` by default */
  method?: string;
  /** Consult and fill the persistent cache (GET only) */
  useCache?: boolean;
  /** Applied to the raw payload on both the live and the cached path */
  processor?: ResponseProcessor<T>;
  headers?: Record<string, string>;
  timeoutMs?: number;
  signal?: AbortSignal;
}

export interface QuerySuccess<T> {
  success: true;
  data: T;
  /** HTTP status of the live response, null for cache hits */
  status: number | null;
  errorKind: null;
  detail: null;
  fromCache: boolean;
  /** Transport calls made; 0 for cache hits */
  attempts: number;
  latencyMs: number;
}

export interface QueryFailure {
  success: false;
  data: null;
  status: number | null;
  errorKind: ErrorKind;
  detail: string;
  fromCache: false;
  attempts: number;
  latencyMs: number;
}

export type QueryResult<T> = QuerySuccess<T> | QueryFailure;

export interface GatewayStats {
  performance: PerformanceSummary;
  rateLimits: Record<string, RateLimiterSnapshot>;
  responseCache: ResponseCacheStats;
  boundedCaches: Record<string, BoundedCacheStats>;
}

type AttemptOutcome =
  | { ok: true; status: number; payload: unknown }
  | { ok: false; kind: ErrorKind; detail: string; status: number | null };

interface QueryContext<T> {
  apiName: string;
  method: HttpMethod;
  target: string;
  params: RequestParams;
  options: QueryOptions<T>;
  /** Response cache fingerprint, null when the request is not cacheable */
  cacheKey: string | null;
  startedAt: number;
}

const CLOSED_DURING_QUERY = 'Gateway was closed during the query';

const identity = (payload: unknown): unknown => payload;

function classifyResponse(
  response: TransportResponse,
  target: string,
): AttemptOutcome {
  const { status } = response;
  if (status >= 200 && status < 300) {
    return { ok: true, status, payload: response.data };
  }
  if (status === 429) {
    return {
      ok: false,
      kind: 'RateLimitExceeded',
      detail: `Rate limited by ${target} (HTTP 429)`,
      status,
    };
  }
  return {
    ok: false,
    kind: 'UpstreamError',
    detail: `HTTP ${status} from ${target}`,
    status,
  };
}

export class ApiGateway {
  private readonly config: GatewayConfig;
  private readonly limiter: RateLimiter;
  private readonly responseCache: PersistentResponseCache;
  private readonly boundedCaches = new Map<string, BoundedCache<string, unknown>>();
  private readonly monitor: PerformanceMonitor;
  private readonly transport: Transport;
  private readonly log: Logger;
  private closed = false;
  private readonly shutdown = new AbortController();

  constructor(config: GatewayConfigInput = {}, deps: GatewayDependencies = {}) {
    this.config = parseGatewayConfig(config);
    const logger = deps.logger ?? defaultLogger;
    this.log = logger.child('gateway');

    this.limiter = new RateLimiter(
      {
        backoffMultiplier: this.config.backoffMultiplier,
        maxBackoffMultiplier: this.config.maxBackoffMultiplier,
        successStreakThreshold: this.config.successStreakThreshold,
        accelerationFactor: this.config.accelerationFactor,
        autoRegisterDefaults: this.config.autoRegisterDefaults,
        defaultCallsPerSecond: this.config.defaultCallsPerSecond,
        defaultMaxConcurrent: this.config.defaultMaxConcurrent,
      },
      logger,
    );
    this.responseCache = new PersistentResponseCache(
      {
        directory: this.config.cacheDir,
        ttlSeconds: this.config.cacheTtlSeconds,
        enabled: this.config.cacheEnabled,
      },
      logger,
    );
    this.monitor = deps.monitor ?? new PerformanceMonitor();
    this.transport =
      deps.transport ??
      new HttpTransport({
        timeoutMs: this.config.requestTimeoutMs,
        maxSockets: this.config.maxSockets,
        userAgent: this.config.userAgent,
      });

    for (const api of this.config.apis) {
      this.registerApi(api.name, api.callsPerSecond, api.maxConcurrent);
    }
  }

  registerApi(name: string, callsPerSecond: number, maxConcurrent: number): void {
    this.limiter.register(name, callsPerSecond, maxConcurrent);
  }

  isRegistered(name: string): boolean {
    return this.limiter.isRegistered(name);
  }

  /**
   * Run one logical request against `apiName`. Never rejects.
   */
  query<T>(
    apiName: string,
    target: string,
    params: RequestParams,
    options: QueryOptions<T> & { processor: ResponseProcessor<T> },
  ): Promise<QueryResult<T>>;
  query(
    apiName: string,
    target: string,
    params?: RequestParams,
    options?: QueryOptions,
  ): Promise<QueryResult<unknown>>;
  async query(
    apiName: string,
    target: string,
    params: RequestParams = {},
    options: QueryOptions = {},
  ): Promise<QueryResult<unknown>> {
    const startedAt = Date.now();
    try {
      return await this.runQuery(apiName, target, params, options, startedAt);
    } catch (error) {
      this.log.error('Unexpected failure while querying', {
        api: apiName,
        error: getErrorMessage(error),
      });
      return this.failure(toErrorKind(error), getErrorMessage(error), {
        status: null,
        attempts: 0,
        startedAt,
      });
    }
  }

  /**
   * Per-run LRU cache for the given namespace, created on first use
   */
  getBoundedCache(namespace: string): BoundedCache<string, unknown> {
    let cache = this.boundedCaches.get(namespace);
    if (!cache) {
      cache = new BoundedCache<string, unknown>({
        maxSize: this.config.boundedCacheMaxSize,
      });
      this.boundedCaches.set(namespace, cache);
    }
    return cache;
  }

  getResponseCache(): PersistentResponseCache {
    return this.responseCache;
  }

  getMonitor(): PerformanceMonitor {
    return this.monitor;
  }

  getConfig(): Readonly<GatewayConfig> {
    return this.config;
  }

  getStats(): GatewayStats {
    const boundedCaches: Record<string, BoundedCacheStats> = {};
    for (const [namespace, cache] of this.boundedCaches) {
      boundedCaches[namespace] = cache.getStats();
    }
    return {
      performance: this.monitor.getSummary(),
      rateLimits: this.limiter.getStats(),
      responseCache: this.responseCache.getStats(),
      boundedCaches,
    };
  }

  isClosed(): boolean {
    return this.closed;
  }

  /**
   * Release the connection pool and in-memory state. Safe to call repeatedly.
   */
  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.shutdown.abort();
    this.limiter.reset();
    for (const cache of this.boundedCaches.values()) {
      cache.clear();
    }
    this.boundedCaches.clear();
    this.transport.close();
    this.log.debug('Gateway closed');
  }

  private async runQuery(
    apiName: string,
    target: string,
    params: RequestParams,
    options: QueryOptions,
    startedAt: number,
  ): Promise<QueryResult<unknown>> {
    const method = (options.method ?? 'GET').toUpperCase();
    const rejected = this.validate(apiName, target);
    if (rejected !== null) {
      return this.failure('ConfigurationError', rejected, {
        status: null,
        attempts: 0,
        startedAt,
      });
    }
    if (!isHttpMethod(method)) {
      return this.failure('ConfigurationError', `Unsupported method "${method}"`, {
        status: null,
        attempts: 0,
        startedAt,
      });
    }
    if (options.signal?.aborted) {
      return this.failure('Cancelled', 'Query was cancelled', {
        status: null,
        attempts: 0,
        startedAt,
      });
    }

    const cacheable =
      method === 'GET' &&
      (options.useCache ?? true) &&
      this.responseCache.isEnabled();
    const context: QueryContext<unknown> = {
      apiName,
      method,
      target,
      params,
      options,
      cacheKey: cacheable ? this.cacheKeyFor(apiName, target, params) : null,
      startedAt,
    };

    if (context.cacheKey !== null) {
      const cached = this.responseCache.get(context.cacheKey);
      if (cached !== null) {
        this.monitor.recordCacheHit(apiName);
        this.log.debug('Cache hit', { api: apiName, target });
        return this.deliver(context, cached, {
          status: null,
          attempts: 0,
          fromCache: true,
        });
      }
    }

    return this.execute(context);
  }

  private cacheKeyFor(
    apiName: string,
    target: string,
    params: RequestParams,
  ): string | null {
    try {
      return fingerprint(target, params);
    } catch (error) {
      this.log.warn('Parameters cannot be fingerprinted, bypassing the cache', {
        api: apiName,
        error: getErrorMessage(error),
      });
      return null;
    }
  }

  private validate(apiName: string, target: string): string | null {
    if (this.closed) {
      return 'Gateway is closed';
    }
    if (target.trim().length === 0) {
      return 'Target must not be empty';
    }
    if (!this.limiter.isRegistered(apiName) && !this.config.autoRegisterDefaults) {
      return `API "${apiName}" is not registered`;
    }
    return null;
  }

  private async execute(context: QueryContext<unknown>): Promise<QueryResult<unknown>> {
    const linked = linkSignals(context.options.signal, this.shutdown.signal);
    try {
      return await this.attempt(context, linked.signal);
    } finally {
      linked.dispose();
    }
  }

  /**
   * The retry loop. `signal` aborts on caller cancellation and on close().
   */
  private async attempt(
    context: QueryContext<unknown>,
    signal: AbortSignal,
  ): Promise<QueryResult<unknown>> {
    const { apiName, target, options, startedAt } = context;
    const maxAttempts = this.config.maxRetries;
    let last: Extract<AttemptOutcome, { ok: false }> = {
      ok: false,
      kind: 'TransportError',
      detail: 'No attempt was made',
      status: null,
    };

    for (let attempt = 0; attempt < maxAttempts; attempt++) {
      if (this.closed) {
        return this.failure('Cancelled', CLOSED_DURING_QUERY, {
          status: last.status,
          attempts: attempt,
          startedAt,
        });
      }

      let release: ReleaseFn;
      try {
        release = await this.limiter.acquire(apiName, signal);
      } catch (error) {
        const detail = this.closed ? CLOSED_DURING_QUERY : getErrorMessage(error);
        return this.failure(toErrorKind(error), detail, {
          status: last.status,
          attempts: attempt,
          startedAt,
        });
      }

      const callStartedAt = Date.now();
      let outcome: AttemptOutcome;
      try {
        const response = await this.transport.send({
          method: context.method,
          url: target,
          params: context.params,
          headers: options.headers,
          timeoutMs: options.timeoutMs,
          signal,
        });
        outcome = classifyResponse(response, target);
      } catch (error) {
        outcome = {
          ok: false,
          kind: toErrorKind(error, 'TransportError'),
          detail: getErrorMessage(error),
          status: null,
        };
      } finally {
        release();
      }
      const latency = Date.now() - callStartedAt;

      if (outcome.ok) {
        this.feedback(apiName, true);
        this.monitor.recordCall(true, latency, { apiName });
        return this.deliver(context, outcome.payload, {
          status: outcome.status,
          attempts: attempt + 1,
          fromCache: false,
        });
      }

      if (outcome.kind === 'Cancelled') {
        const detail = this.closed ? CLOSED_DURING_QUERY : outcome.detail;
        return this.failure('Cancelled', detail, {
          status: null,
          attempts: attempt + 1,
          startedAt,
        });
      }

      this.feedback(apiName, false);
      this.monitor.recordCall(false, latency, {
        apiName,
        errorKind: outcome.kind,
      });
      last = outcome;

      if (!isRetryableKind(outcome.kind)) {
        return this.failure(outcome.kind, outcome.detail, {
          status: outcome.status,
          attempts: attempt + 1,
          startedAt,
        });
      }

      if (attempt + 1 < maxAttempts) {
        const delayMs = this.config.baseRetryDelayMs * 2 ** attempt;
        this.log.debug('Retrying after failure', {
          api: apiName,
          attempt: attempt + 1,
          errorKind: outcome.kind,
          delayMs,
        });
        try {
          await sleep(delayMs, signal);
        } catch (error) {
          const detail = this.closed ? CLOSED_DURING_QUERY : getErrorMessage(error);
          return this.failure('Cancelled', detail, {
            status: outcome.status,
            attempts: attempt + 1,
            startedAt,
          });
        }
      }
    }

    this.log.warn('Query failed after all attempts', {
      api: apiName,
      attempts: maxAttempts,
      errorKind: last.kind,
      status: last.status,
    });
    return this.failure(last.kind, last.detail, {
      status: last.status,
      attempts: maxAttempts,
      startedAt,
    });
  }

  /**
   * Report an outcome to the limiter. After close() the limiter has been
   * reset and the outcome only reaches the monitor.
   */
  private feedback(apiName: string, success: boolean): void {
    if (!this.limiter.isRegistered(apiName)) {
      return;
    }
    if (success) {
      this.limiter.recordSuccess(apiName);
    } else {
      this.limiter.recordError(apiName);
    }
  }

  /**
   * Apply the processor and build the success result. The raw payload is
   * cached only once the processor has accepted it.
   */
  private deliver(
    context: QueryContext<unknown>,
    payload: unknown,
    meta: { status: number | null; attempts: number; fromCache: boolean },
  ): QueryResult<unknown> {
    const processor = context.options.processor ?? identity;

    let data: unknown;
    try {
      data = processor(payload);
    } catch (error) {
      this.log.warn('Response processor failed', {
        api: context.apiName,
        error: getErrorMessage(error),
      });
      return this.failure(
        'ProcessingError',
        `Response processor failed: ${getErrorMessage(error)}`,
        { status: meta.status, attempts: meta.attempts, startedAt: context.startedAt },
      );
    }

    if (context.cacheKey !== null && !meta.fromCache) {
      this.responseCache.set(context.cacheKey, payload);
    }

    return {
      success: true,
      data,
      status: meta.status,
      errorKind: null,
      detail: null,
      fromCache: meta.fromCache,
      attempts: meta.attempts,
      latencyMs: Date.now() - context.startedAt,
    };
  }

  private failure(
    errorKind: ErrorKind,
    detail: string,
    meta: { status: number | null; attempts: number; startedAt: number },
  ): QueryFailure {
    return {
      success: false,
      data: null,
      status: meta.status,
      errorKind,
      detail,
      fromCache: false,
      attempts: meta.attempts,
      latencyMs: Date.now() - meta.startedAt,
    };
  }
}
