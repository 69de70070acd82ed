/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { CancelledError } from '../core/errors.js';
import { sleep } from './sleep.js';

describe('sleep', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should resolve after the delay', async () => {
    let done = false;
    const pending = sleep(500).then(() => {
      done = true;
    });

    await vi.advanceTimersByTimeAsync(499);
    expect(done).toBe(false);
    await vi.advanceTimersByTimeAsync(1);
    await pending;
    expect(done).toBe(true);
  });

  it('should resolve at once for non-positive delays', async () => {
    await expect(sleep(0)).resolves.toBeUndefined();
    await expect(sleep(-5)).resolves.toBeUndefined();
  });

  it('should reject when the signal aborts', async () => {
    const controller = new AbortController();
    const pending = sleep(1000, controller.signal);

    controller.abort();

    await expect(pending).rejects.toBeInstanceOf(CancelledError);
    expect(vi.getTimerCount()).toBe(0);
  });

  it('should reject immediately for an aborted signal', async () => {
    await expect(sleep(1000, AbortSignal.abort())).rejects.toBeInstanceOf(
      CancelledError,
    );
  });
});
