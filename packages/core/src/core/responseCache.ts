/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { CacheWriteError, getErrorMessage } from './errors.js';
import { resolveFingerprint, type RequestKey } from './fingerprint.js';
import { logger as defaultLogger, type Logger } from '../utils/logger.js';

/**
 * Options for the persistent response cache
 */
export interface ResponseCacheOptions {
  /** Directory holding one JSON file per fingerprint */
  directory: string;
  /** Maximum age of an entry, measured from its write time */
  ttlSeconds: number;
  /** When false every lookup misses and writes are dropped */
  enabled: boolean;
}

/**
 * Stored form of a cached response
 */
export interface CacheEntry<T = unknown> {
  fingerprint: string;
  payload: T;
  /** Epoch milliseconds at write time */
  storedAt: number;
}

export interface ResponseCacheStats {
  enabled: boolean;
  directory: string;
  ttlSeconds: number;
  entries: number;
}

const DEFAULT_OPTIONS: ResponseCacheOptions = {
  directory: path.join('.apigate', 'cache'),
  ttlSeconds: 24 * 60 * 60,
  enabled: true,
};

const ENTRY_SUFFIX = '.json';

/** Fingerprints are hex digests; raw string keys must also be file-name safe */
const KEY_PATTERN = /^[A-Za-z0-9_-]+$/;

function isCacheEntry(value: unknown): value is CacheEntry {
  if (value === null || typeof value !== 'object') {
    return false;
  }
  return (
    typeof Reflect.get(value, 'fingerprint') === 'string' &&
    typeof Reflect.get(value, 'storedAt') === 'number' &&
    Reflect.has(value, 'payload')
  );
}

/**
 * TTL cache for idempotent API responses that survives process restarts.
 *
 * Entries are plain JSON files named after the request fingerprint. All file
 * access is synchronous so a cache lookup is never a suspension point of the
 * calling task. Failures on either path are logged and treated as a miss:
 * the cache is an optimization and must never fail a request.
 */
export class PersistentResponseCache {
  private readonly options: ResponseCacheOptions;
  private readonly log: Logger;

  constructor(
    options: Partial<ResponseCacheOptions> = {},
    logger: Logger = defaultLogger,
  ) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
    this.log = logger.child('response-cache');
    if (this.options.enabled) {
      this.ensureDirectory();
    }
  }

  /**
   * Return the cached payload, or null when absent, unreadable or stale
   */
  get(key: string | RequestKey): unknown {
    const fingerprint = this.resolveKey(key);
    const entry = fingerprint === null ? null : this.readEntry(fingerprint);
    return entry ? entry.payload : null;
  }

  has(key: string | RequestKey): boolean {
    const fingerprint = this.resolveKey(key);
    return fingerprint !== null && this.readEntry(fingerprint) !== null;
  }

  /**
   * Persist a payload. Never throws.
   */
  set(key: string | RequestKey, payload: unknown): void {
    if (!this.options.enabled) {
      return;
    }

    const fingerprint = this.resolveKey(key);
    if (fingerprint === null) {
      return;
    }
    try {
      if (payload === undefined) {
        throw new CacheWriteError('Payload is undefined', fingerprint);
      }
      const entry: CacheEntry = { fingerprint, payload, storedAt: Date.now() };
      const encoded = JSON.stringify(entry);
      this.ensureDirectory();
      fs.writeFileSync(this.getEntryPath(fingerprint), encoded, 'utf-8');
      this.log.debug('Cached response', { fingerprint });
    } catch (error) {
      this.log.warn('Failed to write cache entry', {
        fingerprint,
        error: getErrorMessage(error),
      });
    }
  }

  delete(key: string | RequestKey): boolean {
    const fingerprint = this.resolveKey(key);
    return fingerprint !== null && this.removeFile(this.getEntryPath(fingerprint));
  }

  /**
   * Remove expired or unreadable entries
   *
   * @returns number of files removed
   */
  prune(): number {
    let removed = 0;
    for (const file of this.listEntryFiles()) {
      const fingerprint = file.slice(0, -ENTRY_SUFFIX.length);
      const filePath = path.join(this.options.directory, file);
      const entry = this.parseFile(filePath);
      if ((!entry || this.isExpired(entry)) && this.removeFile(filePath)) {
        removed++;
        this.log.debug('Pruned cache entry', { fingerprint });
      }
    }
    return removed;
  }

  /**
   * Remove every entry
   *
   * @returns number of files removed
   */
  clear(): number {
    let removed = 0;
    for (const file of this.listEntryFiles()) {
      if (this.removeFile(path.join(this.options.directory, file))) {
        removed++;
      }
    }
    return removed;
  }

  getStats(): ResponseCacheStats {
    return {
      enabled: this.options.enabled,
      directory: this.options.directory,
      ttlSeconds: this.options.ttlSeconds,
      entries: this.listEntryFiles().length,
    };
  }

  isEnabled(): boolean {
    return this.options.enabled;
  }

  private readEntry(fingerprint: string): CacheEntry | null {
    if (!this.options.enabled) {
      return null;
    }

    const filePath = this.getEntryPath(fingerprint);
    if (!fs.existsSync(filePath)) {
      return null;
    }

    const entry = this.parseFile(filePath);
    if (!entry || entry.fingerprint !== fingerprint) {
      this.removeFile(filePath);
      return null;
    }

    if (this.isExpired(entry)) {
      this.log.debug('Cache entry expired', { fingerprint });
      this.removeFile(filePath);
      return null;
    }

    return entry;
  }

  private parseFile(filePath: string): CacheEntry | null {
    try {
      const parsed: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
      return isCacheEntry(parsed) ? parsed : null;
    } catch (error) {
      this.log.warn('Failed to read cache entry', {
        file: filePath,
        error: getErrorMessage(error),
      });
      return null;
    }
  }

  private isExpired(entry: CacheEntry): boolean {
    return Date.now() - entry.storedAt > this.options.ttlSeconds * 1000;
  }

  /**
   * The fingerprint for `key`, or null when it cannot name an entry file
   */
  private resolveKey(key: string | RequestKey): string | null {
    let fingerprint: string;
    try {
      fingerprint = resolveFingerprint(key);
    } catch (error) {
      this.log.warn('Cache key cannot be fingerprinted', {
        error: getErrorMessage(error),
      });
      return null;
    }
    if (!KEY_PATTERN.test(fingerprint)) {
      this.log.warn('Invalid cache key', { key: fingerprint });
      return null;
    }
    return fingerprint;
  }

  private getEntryPath(fingerprint: string): string {
    return path.join(this.options.directory, `${fingerprint}${ENTRY_SUFFIX}`);
  }

  private listEntryFiles(): string[] {
    try {
      return fs
        .readdirSync(this.options.directory)
        .filter((file) => file.endsWith(ENTRY_SUFFIX));
    } catch {
      // Directory does not exist yet
      return [];
    }
  }

  private removeFile(filePath: string): boolean {
    try {
      fs.unlinkSync(filePath);
      return true;
    } catch (error) {
      this.log.debug('Could not remove cache file', {
        file: filePath,
        error: getErrorMessage(error),
      });
      return false;
    }
  }

  private ensureDirectory(): void {
    try {
      fs.mkdirSync(this.options.directory, { recursive: true });
    } catch (error) {
      this.log.warn('Cache directory is not usable', {
        directory: this.options.directory,
        error: getErrorMessage(error),
      });
    }
  }
}
