/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { GatewayStats } from '../core/apiGateway.js';

/**
 * Gateway stats rendering for the command line.
 */
export interface StatsOptions {
  /** Include rate limiter and bounded cache breakdowns */
  detailed?: boolean;
  /** Output format */
  format?: 'text' | 'json';
}

/**
 * Format duration to human readable
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms.toFixed(0)}ms`;
  if (ms < 60000) return `${(ms / 1000).toFixed(1)}s`;
  return `${(ms / 60000).toFixed(1)}m`;
}

function formatPercent(ratio: number): string {
  return `${(ratio * 100).toFixed(1)}%`;
}

/**
 * Get gateway stats as text
 */
export function getStatsText(
  stats: GatewayStats,
  options: StatsOptions = {},
): string {
  const { performance, responseCache } = stats;
  const errorKinds = Object.entries(performance.errorsByKind);

  const lines: string[] = [
    '📊 API Calls',
    `   Total Calls:         ${performance.totalCalls}`,
    `   Succeeded:           ${performance.successCount} (${formatPercent(performance.successRate)})`,
    `   Failed:              ${performance.failCount}`,
    `   Cache Hits:          ${performance.cacheHits}`,
    '',
    '⏱️  Latency',
    `   Average:             ${formatDuration(performance.averageLatency)}`,
    `   Total:               ${formatDuration(performance.totalLatency)}`,
    `   Since Reset:         ${formatDuration(performance.uptimeSinceReset)}`,
    '',
    '💾 Response Cache',
    `   Enabled:             ${responseCache.enabled ? 'yes' : 'no'}`,
    `   Entries:             ${responseCache.entries}`,
    `   TTL:                 ${responseCache.ttlSeconds}s`,
    `   Directory:           ${responseCache.directory}`,
  ];

  if (errorKinds.length > 0) {
    lines.push('', '🔧 Errors');
    for (const [kind, count] of errorKinds) {
      lines.push(`   ${kind.padEnd(21)}${count}`);
    }
  }

  if (options.detailed) {
    const limits = Object.values(stats.rateLimits);
    if (limits.length > 0) {
      lines.push('', '🚦 Rate Limits');
      for (const limit of limits) {
        lines.push(
          `   ${limit.name}: ${limit.callsPerSecond}/s, ${limit.active}/${limit.maxConcurrent} active, ${limit.waiting} waiting, interval ${formatDuration(limit.intervalMs)}`,
        );
      }
    }

    const caches = Object.entries(stats.boundedCaches);
    if (caches.length > 0) {
      lines.push('', '🧠 Memory Caches');
      for (const [namespace, cache] of caches) {
        lines.push(
          `   ${namespace}: ${cache.size}/${cache.maxSize} entries, hit rate ${formatPercent(cache.hitRate)}`,
        );
      }
    }
  }

  return lines.join('\n');
}

/**
 * Get gateway stats as JSON
 */
export function getStatsJson(stats: GatewayStats): string {
  return JSON.stringify({ ...stats, timestamp: Date.now() }, null, 2);
}

export function formatStats(
  stats: GatewayStats,
  options: StatsOptions = {},
): string {
  return options.format === 'json'
    ? getStatsJson(stats)
    : getStatsText(stats, options);
}
