/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import axios, { AxiosError, type AxiosAdapter, type AxiosInstance } from 'axios';
import http from 'node:http';
import https from 'node:https';
import {
  CancelledError,
  GatewayError,
  TimeoutError,
  TransportError,
  getErrorMessage,
} from './errors.js';
import type { RequestParams } from './fingerprint.js';
import { DEFAULT_USER_AGENT } from '../version.js';

export const HTTP_METHODS = [
  'GET',
  'HEAD',
  'DELETE',
  'POST',
  'PUT',
  'PATCH',
] as const;

export type HttpMethod = (typeof HTTP_METHODS)[number];

/**
 * Methods whose parameters travel in the query string rather than the body
 */
const QUERY_STRING_METHODS: ReadonlySet<HttpMethod> = new Set<HttpMethod>([
  'GET',
  'HEAD',
  'DELETE',
]);

export function isHttpMethod(value: string): value is HttpMethod {
  return HTTP_METHODS.some((method) => method === value);
}

export interface TransportRequest {
  method: HttpMethod;
  url: string;
  params?: RequestParams;
  headers?: Record<string, string>;
  timeoutMs?: number;
  signal?: AbortSignal;
}

export interface TransportResponse {
  status: number;
  data: unknown;
  /** Lower-cased header names */
  headers: Record<string, string>;
}

/**
 * Anything able to carry a request to an upstream service. Resolves for every
 * HTTP status; rejects only when no response was obtained.
 */
export interface Transport {
  send(request: TransportRequest): Promise<TransportResponse>;
  close(): void;
}

export interface HttpTransportOptions {
  /** Default per-request timeout */
  timeoutMs: number;
  /** Connection pool size per host */
  maxSockets: number;
  userAgent: string;
  /** Replaces the network layer, mainly for tests */
  adapter?: AxiosAdapter;
}

const DEFAULT_OPTIONS: HttpTransportOptions = {
  timeoutMs: 30000,
  maxSockets: 20,
  userAgent: DEFAULT_USER_AGENT,
};

function normalizeHeaders(headers: object): Record<string, string> {
  const normalized: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    const raw: unknown = value;
    if (raw === undefined || raw === null) {
      continue;
    }
    normalized[name.toLowerCase()] = Array.isArray(raw)
      ? raw.join(', ')
      : String(raw);
  }
  return normalized;
}

/**
 * Shared connection pool for every upstream call made by a gateway.
 * One axios instance over keep-alive agents, created once and destroyed by
 * {@link HttpTransport.close}.
 */
export class HttpTransport implements Transport {
  private readonly client: AxiosInstance;
  private readonly httpAgent: http.Agent;
  private readonly httpsAgent: https.Agent;
  private readonly options: HttpTransportOptions;
  private closed = false;

  constructor(options: Partial<HttpTransportOptions> = {}) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
    const { maxSockets } = this.options;

    this.httpAgent = new http.Agent({
      keepAlive: true,
      keepAliveMsecs: 1000,
      maxSockets,
      maxFreeSockets: 5,
    });
    this.httpsAgent = new https.Agent({
      keepAlive: true,
      keepAliveMsecs: 1000,
      maxSockets,
      maxFreeSockets: 5,
    });

    this.client = axios.create({
      timeout: this.options.timeoutMs,
      // Status classification belongs to the gateway
      validateStatus: () => true,
      httpAgent: this.httpAgent,
      httpsAgent: this.httpsAgent,
      adapter: this.options.adapter,
      headers: {
        'User-Agent': this.options.userAgent,
        Accept: 'application/json',
      },
    });
  }

  async send(request: TransportRequest): Promise<TransportResponse> {
    if (this.closed) {
      throw new TransportError('Transport is closed');
    }

    const inQuery = QUERY_STRING_METHODS.has(request.method);
    const timeoutMs = request.timeoutMs ?? this.options.timeoutMs;

    try {
      const response = await this.client.request<unknown>({
        method: request.method,
        url: request.url,
        params: inQuery ? request.params : undefined,
        data: inQuery ? undefined : (request.params ?? {}),
        headers: request.headers,
        timeout: timeoutMs,
        signal: request.signal,
      });
      return {
        status: response.status,
        data: response.data,
        headers: normalizeHeaders(response.headers),
      };
    } catch (error) {
      throw this.classify(error, request, timeoutMs);
    }
  }

  isClosed(): boolean {
    return this.closed;
  }

  /**
   * Destroy pooled sockets. Safe to call more than once.
   */
  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.httpAgent.destroy();
    this.httpsAgent.destroy();
  }

  private classify(
    error: unknown,
    request: TransportRequest,
    timeoutMs: number,
  ): GatewayError {
    if (error instanceof GatewayError) {
      return error;
    }
    if (axios.isCancel(error) || request.signal?.aborted) {
      return new CancelledError(`Request to ${request.url} was cancelled`);
    }
    if (error instanceof AxiosError) {
      if (
        error.code === AxiosError.ECONNABORTED ||
        error.code === AxiosError.ETIMEDOUT
      ) {
        return new TimeoutError(
          `Request to ${request.url} timed out after ${timeoutMs}ms`,
          timeoutMs,
        );
      }
      return new TransportError(
        `Request to ${request.url} failed: ${error.message}`,
        error.code,
      );
    }
    return new TransportError(
      `Request to ${request.url} failed: ${getErrorMessage(error)}`,
    );
  }
}
