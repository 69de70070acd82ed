/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { ConfigurationError } from './errors.js';

/**
 * Options for configuring a bounded cache
 */
export interface BoundedCacheOptions {
  /** Maximum number of entries held at once */
  maxSize: number;
}

export interface BoundedCacheStats {
  size: number;
  maxSize: number;
  hits: number;
  misses: number;
  /** hits / (hits + misses), 0 before the first lookup */
  hitRate: number;
  /** size / maxSize */
  utilization: number;
}

function assertMaxSize(maxSize: number): void {
  if (!Number.isInteger(maxSize) || maxSize < 1) {
    throw new ConfigurationError(
      `BoundedCache maxSize must be a positive integer, got ${maxSize}`,
    );
  }
}

interface Slot<V> {
  value: V;
}

/**
 * LRU (Least Recently Used) cache with a hard entry limit, for ephemeral
 * per-run results such as domain validations.
 *
 * The Map's insertion order doubles as the recency order: the first key is
 * the least recently used one. Every structural change happens inside a
 * single synchronous method, so the key set and the order can never drift.
 */
export class BoundedCache<K = string, V = unknown> {
  private entries = new Map<K, Slot<V>>();
  private maxSize: number;
  private hits = 0;
  private misses = 0;

  constructor(options: Partial<BoundedCacheOptions> = {}) {
    const maxSize = options.maxSize ?? 1000;
    assertMaxSize(maxSize);
    this.maxSize = maxSize;
  }

  /**
   * Look up a value, marking it most recently used on a hit
   */
  get(key: K): V | undefined {
    const slot = this.entries.get(key);
    if (!slot) {
      this.misses++;
      return undefined;
    }

    this.touch(key, slot);
    this.hits++;
    return slot.value;
  }

  /**
   * Read a value without affecting recency or hit/miss counters
   */
  peek(key: K): V | undefined {
    return this.entries.get(key)?.value;
  }

  has(key: K): boolean {
    return this.entries.has(key);
  }

  /**
   * Insert or replace a value. Inserting a new key into a full cache evicts
   * the least recently used key first.
   */
  set(key: K, value: V): void {
    if (this.entries.has(key)) {
      this.touch(key, { value });
      return;
    }

    if (this.entries.size >= this.maxSize) {
      this.evictOldest();
    }
    this.entries.set(key, { value });
  }

  delete(key: K): boolean {
    return this.entries.delete(key);
  }

  /**
   * Keys from least to most recently used
   */
  keys(): K[] {
    return Array.from(this.entries.keys());
  }

  size(): number {
    return this.entries.size;
  }

  /**
   * Drop every entry and zero the hit/miss counters
   */
  clear(): void {
    this.entries = new Map<K, Slot<V>>();
    this.hits = 0;
    this.misses = 0;
  }

  getStats(): BoundedCacheStats {
    const lookups = this.hits + this.misses;
    return {
      size: this.entries.size,
      maxSize: this.maxSize,
      hits: this.hits,
      misses: this.misses,
      hitRate: lookups > 0 ? this.hits / lookups : 0,
      utilization: this.entries.size / this.maxSize,
    };
  }

  /**
   * Change the capacity, evicting least recently used entries if it shrank
   */
  resize(maxSize: number): void {
    assertMaxSize(maxSize);
    this.maxSize = maxSize;
    while (this.entries.size > this.maxSize) {
      this.evictOldest();
    }
  }

  private touch(key: K, slot: Slot<V>): void {
    this.entries.delete(key);
    this.entries.set(key, slot);
  }

  private evictOldest(): void {
    const oldest = this.entries.keys().next();
    if (!oldest.done) {
      this.entries.delete(oldest.value);
    }
  }
}
