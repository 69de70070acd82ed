/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, it, expect, beforeEach, vi, afterEach } from 'vitest';
import { RateLimiter } from './rateLimiter.js';
import { CancelledError, ConfigurationError } from './errors.js';
import { sleep } from '../utils/sleep.js';
import type { Logger } from '../utils/logger.js';

function createMockLogger() {
  const log = {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    child: vi.fn<(scope: string) => Logger>(),
  };
  log.child.mockReturnValue(log);
  return log;
}

describe('RateLimiter', () => {
  let log: ReturnType<typeof createMockLogger>;
  let limiter: RateLimiter;

  beforeEach(() => {
    vi.useFakeTimers();
    log = createMockLogger();
    limiter = new RateLimiter({}, log);
  });

  afterEach(() => {
    limiter.reset();
    vi.useRealTimers();
  });

  describe('register()', () => {
    it('should expose the registration', () => {
      limiter.register('places', 0.5, 3);

      expect(limiter.isRegistered('places')).toBe(true);
      expect(limiter.getRegistration('places')).toEqual({
        name: 'places',
        callsPerSecond: 0.5,
        maxConcurrent: 3,
      });
      expect(limiter.listRegistrations().map((r) => r.name)).toEqual([
        'places',
      ]);
    });

    it('should reject invalid limits', () => {
      expect(() => limiter.register('a', 0, 1)).toThrow(ConfigurationError);
      expect(() => limiter.register('b', -1, 1)).toThrow(ConfigurationError);
      expect(() => limiter.register('c', 1, 0)).toThrow(ConfigurationError);
      expect(() => limiter.register('d', 1, 1.5)).toThrow(ConfigurationError);
      expect(() => limiter.register(' ', 1, 1)).toThrow(ConfigurationError);
      expect(limiter.listRegistrations()).toEqual([]);
    });

    it('should reject a second registration of the same name', () => {
      limiter.register('places', 1, 1);
      expect(() => limiter.register('places', 2, 2)).toThrow(
        'API "places" is already registered',
      );
      expect(limiter.getRegistration('places')?.callsPerSecond).toBe(1);
    });
  });

  describe('adaptive interval', () => {
    beforeEach(() => {
      limiter.register('svc', 2, 1);
    });

    it('should start at the inverse of the call rate', () => {
      expect(limiter.getInterval('svc')).toBe(500);
    });

    it('should grow geometrically with consecutive errors', () => {
      limiter.recordError('svc');
      expect(limiter.getInterval('svc')).toBeCloseTo(750);

      limiter.recordError('svc');
      expect(limiter.getInterval('svc')).toBeCloseTo(1125);

      limiter.recordError('svc');
      limiter.recordError('svc');
      limiter.recordError('svc');
      expect(limiter.getInterval('svc')).toBeCloseTo(3796.875);
    });

    it('should cap the backoff factor', () => {
      for (let i = 0; i < 6; i++) {
        limiter.recordError('svc');
      }
      expect(limiter.getInterval('svc')).toBe(4000);

      for (let i = 0; i < 10; i++) {
        limiter.recordError('svc');
      }
      expect(limiter.getInterval('svc')).toBe(4000);
    });

    it('should return to the base interval after one success', () => {
      limiter.recordError('svc');
      limiter.recordError('svc');
      limiter.recordSuccess('svc');

      expect(limiter.getInterval('svc')).toBe(500);
      expect(limiter.getSnapshot('svc').consecutiveErrors).toBe(0);
    });

    it('should accelerate only once the streak exceeds the threshold', () => {
      for (let i = 0; i < 5; i++) {
        limiter.recordSuccess('svc');
      }
      expect(limiter.getInterval('svc')).toBe(500);

      limiter.recordSuccess('svc');
      expect(limiter.getInterval('svc')).toBeCloseTo(400);
    });

    it('should end a success streak on error', () => {
      for (let i = 0; i < 6; i++) {
        limiter.recordSuccess('svc');
      }
      limiter.recordError('svc');

      expect(limiter.getSnapshot('svc').successStreak).toBe(0);
      expect(limiter.getInterval('svc')).toBeCloseTo(750);
    });
  });

  describe('acquire()', () => {
    it('should grant the first call immediately', async () => {
      limiter.register('svc', 1, 1);
      const start = Date.now();

      const release = await limiter.acquire('svc');

      expect(Date.now() - start).toBe(0);
      expect(limiter.getSnapshot('svc').active).toBe(1);
      release();
      expect(limiter.getSnapshot('svc').active).toBe(0);
    });

    it('should space grants by the interval', async () => {
      limiter.register('svc', 2, 1);
      const start = Date.now();
      const grants: number[] = [];

      const tasks = Array.from({ length: 5 }, async () => {
        const release = await limiter.acquire('svc');
        grants.push(Date.now() - start);
        release();
      });
      await vi.runAllTimersAsync();
      await Promise.all(tasks);

      expect(grants).toEqual([0, 500, 1000, 1500, 2000]);
    });

    it('should space grants even when slots are free', async () => {
      limiter.register('svc', 4, 10);
      const start = Date.now();
      const grants: number[] = [];

      const tasks = Array.from({ length: 3 }, async () => {
        const release = await limiter.acquire('svc');
        grants.push(Date.now() - start);
        release();
      });
      await vi.runAllTimersAsync();
      await Promise.all(tasks);

      expect(grants).toEqual([0, 250, 500]);
    });

    it('should apply the backoff interval to the next grant', async () => {
      limiter.register('svc', 2, 1);
      const start = Date.now();

      (await limiter.acquire('svc'))();
      limiter.recordError('svc');

      const next = limiter.acquire('svc');
      await vi.runAllTimersAsync();
      (await next)();

      expect(Date.now() - start).toBe(750);
    });

    it('should never exceed the concurrency cap', async () => {
      limiter.register('busy', 100, 3);
      let current = 0;
      let peak = 0;

      const tasks = Array.from({ length: 10 }, () =>
        limiter.withPermit('busy', async () => {
          current++;
          peak = Math.max(peak, current);
          await sleep(50);
          current--;
        }),
      );
      await vi.runAllTimersAsync();
      await Promise.all(tasks);

      expect(peak).toBe(3);
      expect(limiter.getSnapshot('busy').active).toBe(0);
    });

    it('should queue callers beyond the cap until a slot is released', async () => {
      limiter.register('svc', 1000, 2);
      const first = limiter.acquire('svc');
      const second = limiter.acquire('svc');
      let thirdGranted = false;
      const third = limiter.acquire('svc').then((release) => {
        thirdGranted = true;
        return release;
      });

      await vi.advanceTimersByTimeAsync(100);
      expect(limiter.getSnapshot('svc')).toMatchObject({
        active: 2,
        waiting: 1,
      });
      expect(thirdGranted).toBe(false);

      (await first)();
      await vi.advanceTimersByTimeAsync(100);

      expect(thirdGranted).toBe(true);
      expect(limiter.getSnapshot('svc')).toMatchObject({
        active: 2,
        waiting: 0,
      });
      (await second)();
      (await third)();
      expect(limiter.getSnapshot('svc').active).toBe(0);
    });

    it('should ignore repeated calls of the same release function', async () => {
      limiter.register('svc', 1, 2);
      const release = await limiter.acquire('svc');

      release();
      release();

      expect(limiter.getSnapshot('svc').active).toBe(0);
      expect(log.warn).not.toHaveBeenCalled();
    });

    it('should warn when releasing without an active slot', () => {
      limiter.register('svc', 1, 1);

      limiter.release('svc');

      expect(limiter.getSnapshot('svc').active).toBe(0);
      expect(log.warn).toHaveBeenCalledWith(
        'Release without an active slot ignored',
        { api: 'svc' },
      );
    });
  });

  describe('cancellation', () => {
    it('should remove an aborted waiter from the queue', async () => {
      limiter.register('svc', 1, 1);
      const release = await limiter.acquire('svc');
      const controller = new AbortController();

      const pending = limiter.acquire('svc', controller.signal);
      expect(limiter.getSnapshot('svc').waiting).toBe(1);

      controller.abort();
      await expect(pending).rejects.toBeInstanceOf(CancelledError);

      expect(limiter.getSnapshot('svc')).toMatchObject({
        active: 1,
        waiting: 0,
      });
      release();
      expect(limiter.getSnapshot('svc').active).toBe(0);
    });

    it('should free the slot when aborted during the pacing delay', async () => {
      limiter.register('svc', 1, 1);
      (await limiter.acquire('svc'))();
      const controller = new AbortController();

      const pending = limiter.acquire('svc', controller.signal);
      await vi.advanceTimersByTimeAsync(100);
      expect(limiter.getSnapshot('svc').active).toBe(1);

      controller.abort();
      await expect(pending).rejects.toBeInstanceOf(CancelledError);
      expect(limiter.getSnapshot('svc').active).toBe(0);
    });

    it('should reject immediately for an already aborted signal', async () => {
      limiter.register('svc', 1, 1);
      const controller = new AbortController();
      controller.abort();

      await expect(
        limiter.acquire('svc', controller.signal),
      ).rejects.toBeInstanceOf(CancelledError);
      expect(limiter.getSnapshot('svc').active).toBe(0);
    });

    it('should reject waiters on reset', async () => {
      limiter.register('svc', 1, 1);
      await limiter.acquire('svc');
      const pending = limiter.acquire('svc');

      limiter.reset();

      await expect(pending).rejects.toThrow('Rate limiter was reset');
      expect(limiter.isRegistered('svc')).toBe(false);
    });
  });

  describe('unregistered APIs', () => {
    it('should fail by default', async () => {
      await expect(limiter.acquire('unknown')).rejects.toBeInstanceOf(
        ConfigurationError,
      );
      expect(() => limiter.recordSuccess('unknown')).toThrow(
        ConfigurationError,
      );
    });

    it('should auto-register with defaults when enabled', async () => {
      const lenient = new RateLimiter({ autoRegisterDefaults: true }, log);

      const release = await lenient.acquire('unknown');
      release();

      expect(lenient.getRegistration('unknown')).toEqual({
        name: 'unknown',
        callsPerSecond: 1,
        maxConcurrent: 5,
      });
      expect(log.warn).toHaveBeenCalledWith(
        'Auto-registering unknown API with default limits',
        { api: 'unknown', callsPerSecond: 1, maxConcurrent: 5 },
      );
    });
  });

  it('should report a snapshot per API', async () => {
    limiter.register('a', 1, 1);
    limiter.register('b', 2, 2);
    await limiter.acquire('a');

    const stats = limiter.getStats();

    expect(Object.keys(stats)).toEqual(['a', 'b']);
    expect(stats['a']).toEqual({
      name: 'a',
      callsPerSecond: 1,
      maxConcurrent: 1,
      active: 1,
      waiting: 0,
      consecutiveErrors: 0,
      successStreak: 0,
      intervalMs: 1000,
      lastCallTime: Date.now(),
    });
  });
});
