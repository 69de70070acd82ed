/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Call outcome counters for the gateway.
 * Tracks success/failure totals, latency, cache hits and error kinds, overall
 * and per API.
 */

import type { ErrorKind } from './errors.js';
import { formatDuration } from '../utils/stats.js';

export interface CallOutcome {
  apiName?: string;
  /** Failure classification; ignored for successful calls */
  errorKind?: ErrorKind;
}

export interface ApiCallStats {
  calls: number;
  successes: number;
  failures: number;
  cacheHits: number;
  totalLatency: number;
  averageLatency: number;
}

export interface PerformanceSummary {
  totalCalls: number;
  successCount: number;
  failCount: number;
  /** successCount / totalCalls, 0 before the first call */
  successRate: number;
  averageLatency: number;
  totalLatency: number;
  cacheHits: number;
  errorsByKind: Partial<Record<ErrorKind, number>>;
  byApi: Record<string, ApiCallStats>;
  /** Milliseconds since construction or the last reset */
  uptimeSinceReset: number;
}

interface Counters {
  calls: number;
  successes: number;
  failures: number;
  cacheHits: number;
  totalLatency: number;
}

function emptyCounters(): Counters {
  return { calls: 0, successes: 0, failures: 0, cacheHits: 0, totalLatency: 0 };
}

function sanitizeLatency(latencyMs: number): number {
  return Number.isFinite(latencyMs) && latencyMs > 0 ? latencyMs : 0;
}

/**
 * Aggregate counters only; no per-call history is retained, so memory use
 * does not grow with traffic.
 */
export class PerformanceMonitor {
  private totals = emptyCounters();
  private errorsByKind = new Map<ErrorKind, number>();
  private perApi = new Map<string, Counters>();
  private startedAt = Date.now();

  /**
   * Record one upstream call outcome
   */
  recordCall(success: boolean, latencyMs: number, outcome: CallOutcome = {}): void {
    const latency = sanitizeLatency(latencyMs);
    const api = outcome.apiName ? this.countersFor(outcome.apiName) : undefined;

    for (const counters of api ? [this.totals, api] : [this.totals]) {
      counters.calls++;
      counters.totalLatency += latency;
      if (success) {
        counters.successes++;
      } else {
        counters.failures++;
      }
    }

    if (!success && outcome.errorKind) {
      this.errorsByKind.set(
        outcome.errorKind,
        (this.errorsByKind.get(outcome.errorKind) ?? 0) + 1,
      );
    }
  }

  /**
   * Record a query answered from the persistent cache
   */
  recordCacheHit(apiName?: string): void {
    this.totals.cacheHits++;
    if (apiName) {
      this.countersFor(apiName).cacheHits++;
    }
  }

  getSummary(): PerformanceSummary {
    const byApi: Record<string, ApiCallStats> = {};
    for (const [name, counters] of this.perApi) {
      byApi[name] = {
        ...counters,
        averageLatency: average(counters),
      };
    }

    return {
      totalCalls: this.totals.calls,
      successCount: this.totals.successes,
      failCount: this.totals.failures,
      successRate:
        this.totals.calls > 0 ? this.totals.successes / this.totals.calls : 0,
      averageLatency: average(this.totals),
      totalLatency: this.totals.totalLatency,
      cacheHits: this.totals.cacheHits,
      errorsByKind: Object.fromEntries(this.errorsByKind),
      byApi,
      uptimeSinceReset: Date.now() - this.startedAt,
    };
  }

  /**
   * Format summary for display
   */
  formatSummary(): string {
    const summary = this.getSummary();
    const errors = Object.entries(summary.errorsByKind)
      .map(([kind, count]) => `${kind}=${count}`)
      .join(', ');

    const lines = [
      '📊 API Performance',
      '━━━━━━━━━━━━━━━━━━━━━━',
      `Calls:         ${summary.totalCalls} (${summary.successCount} ok, ${summary.failCount} failed)`,
      `Success Rate:  ${(summary.successRate * 100).toFixed(1)}%`,
      `Cache Hits:    ${summary.cacheHits}`,
      `Avg Latency:   ${formatDuration(summary.averageLatency)}`,
      `Uptime:        ${formatDuration(summary.uptimeSinceReset)}`,
    ];
    if (errors) {
      lines.push(`Errors:        ${errors}`);
    }
    for (const [name, api] of Object.entries(summary.byApi)) {
      lines.push(
        `  ${name}: ${api.calls} calls, ${api.failures} failed, ${api.cacheHits} cached, avg ${formatDuration(api.averageLatency)}`,
      );
    }
    return lines.join('\n');
  }

  /**
   * Zero every counter and restart the uptime clock
   */
  reset(): void {
    this.totals = emptyCounters();
    this.errorsByKind = new Map();
    this.perApi = new Map();
    this.startedAt = Date.now();
  }

  private countersFor(apiName: string): Counters {
    let counters = this.perApi.get(apiName);
    if (!counters) {
      counters = emptyCounters();
      this.perApi.set(apiName, counters);
    }
    return counters;
  }
}

function average(counters: Counters): number {
  return counters.calls > 0 ? counters.totalLatency / counters.calls : 0;
}
