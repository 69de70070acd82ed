/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import crypto from 'node:crypto';

export type RequestParams = Record<string, unknown>;

/**
 * A request identified by what it targets rather than by a precomputed hash.
 */
export interface RequestKey {
  target: string;
  params?: RequestParams;
}

/**
 * Serialize a value to JSON with object keys sorted at every depth, so that
 * two structurally equal values always produce the same string regardless of
 * key insertion order. `undefined` members are dropped as JSON.stringify does.
 *
 * Values with a `toJSON` method (dates, URLs) are serialized through it.
 * Other non-plain objects such as maps, sets and class instances, cyclic
 * values and bigints throw a TypeError.
 */
export function canonicalJson(value: unknown): string {
  return JSON.stringify(normalize(value, new Set())) ?? 'null';
}

function isPlainObject(value: object): boolean {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function normalize(value: unknown, ancestors: Set<object>): unknown {
  if (typeof value === 'bigint') {
    throw new TypeError('Cannot fingerprint a bigint');
  }
  if (value === null || typeof value !== 'object') {
    return value;
  }
  if (ancestors.has(value)) {
    throw new TypeError('Cannot fingerprint a cyclic value');
  }

  const toJSON: unknown = Reflect.get(value, 'toJSON');
  if (typeof toJSON === 'function') {
    const json: unknown = Reflect.apply(toJSON, value, []);
    return normalize(json, ancestors);
  }

  ancestors.add(value);
  try {
    if (Array.isArray(value)) {
      return value.map((item: unknown) =>
        item === undefined ? null : normalize(item, ancestors),
      );
    }
    if (!isPlainObject(value)) {
      throw new TypeError(
        `Cannot fingerprint a ${value.constructor.name || 'non-plain'} object`,
      );
    }
    const sorted: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort()) {
      const member: unknown = Reflect.get(value, key);
      if (member !== undefined) {
        sorted[key] = normalize(member, ancestors);
      }
    }
    return sorted;
  } finally {
    ancestors.delete(value);
  }
}

/**
 * Deterministic cache key for a request target plus its parameters.
 */
export function fingerprint(target: string, params: RequestParams = {}): string {
  return crypto
    .createHash('sha256')
    .update(`${target}:${canonicalJson(params)}`)
    .digest('hex');
}

export function resolveFingerprint(key: string | RequestKey): string {
  return typeof key === 'string' ? key : fingerprint(key.target, key.params);
}
