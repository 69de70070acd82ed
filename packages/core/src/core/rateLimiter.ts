/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Adaptive per-API rate limiter.
 * Paces calls to each registered API, bounds how many run at once, and
 * slows down or speeds up according to the outcomes reported back to it.
 */

import { CancelledError, ConfigurationError } from './errors.js';
import { sleep } from '../utils/sleep.js';
import { logger as defaultLogger, type Logger } from '../utils/logger.js';

export interface RateLimiterOptions {
  /** Interval growth per consecutive error */
  backoffMultiplier: number;
  /** Upper bound on the backoff factor */
  maxBackoffMultiplier: number;
  /** Successes in a row needed before the interval shrinks */
  successStreakThreshold: number;
  /** Interval factor applied during a success streak, in (0, 1) */
  accelerationFactor: number;
  /** Register unknown APIs on first use instead of failing */
  autoRegisterDefaults: boolean;
  defaultCallsPerSecond: number;
  defaultMaxConcurrent: number;
}

const DEFAULT_OPTIONS: RateLimiterOptions = {
  backoffMultiplier: 1.5,
  maxBackoffMultiplier: 8,
  successStreakThreshold: 5,
  accelerationFactor: 0.8,
  autoRegisterDefaults: false,
  defaultCallsPerSecond: 1,
  defaultMaxConcurrent: 5,
};

export interface ApiRegistration {
  readonly name: string;
  readonly callsPerSecond: number;
  readonly maxConcurrent: number;
}

export interface RateLimiterSnapshot extends ApiRegistration {
  active: number;
  waiting: number;
  consecutiveErrors: number;
  successStreak: number;
  intervalMs: number;
  /** Epoch milliseconds of the latest reserved grant, null before the first */
  lastCallTime: number | null;
}

/**
 * Function returned by {@link RateLimiter.acquire}. Safe to call more than once.
 */
export type ReleaseFn = () => void;

interface Waiter {
  resolve: () => void;
  reject: (error: Error) => void;
}

interface ApiState {
  registration: ApiRegistration;
  lastCallTime: number | null;
  consecutiveErrors: number;
  successStreak: number;
  active: number;
  waiters: Waiter[];
}

function validateRegistration(
  name: string,
  callsPerSecond: number,
  maxConcurrent: number,
): void {
  if (name.trim().length === 0) {
    throw new ConfigurationError('API name must not be empty');
  }
  if (!Number.isFinite(callsPerSecond) || callsPerSecond <= 0) {
    throw new ConfigurationError(
      `callsPerSecond for "${name}" must be greater than 0, got ${callsPerSecond}`,
    );
  }
  if (!Number.isInteger(maxConcurrent) || maxConcurrent < 1) {
    throw new ConfigurationError(
      `maxConcurrent for "${name}" must be a positive integer, got ${maxConcurrent}`,
    );
  }
}

export class RateLimiter {
  private readonly states = new Map<string, ApiState>();
  private readonly options: RateLimiterOptions;
  private readonly log: Logger;

  constructor(
    options: Partial<RateLimiterOptions> = {},
    logger: Logger = defaultLogger,
  ) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
    this.log = logger.child('rate-limiter');
  }

  /**
   * Register an API with its sustained rate and concurrency cap
   */
  register(name: string, callsPerSecond: number, maxConcurrent: number): void {
    validateRegistration(name, callsPerSecond, maxConcurrent);
    if (this.states.has(name)) {
      throw new ConfigurationError(`API "${name}" is already registered`);
    }

    this.states.set(name, {
      registration: Object.freeze({ name, callsPerSecond, maxConcurrent }),
      lastCallTime: null,
      consecutiveErrors: 0,
      successStreak: 0,
      active: 0,
      waiters: [],
    });
    this.log.debug('Registered API', { api: name, callsPerSecond, maxConcurrent });
  }

  isRegistered(name: string): boolean {
    return this.states.has(name);
  }

  getRegistration(name: string): ApiRegistration | undefined {
    return this.states.get(name)?.registration;
  }

  listRegistrations(): ApiRegistration[] {
    return Array.from(this.states.values(), (state) => state.registration);
  }

  /**
   * Wait for a concurrency slot and for the pacing interval, then grant.
   *
   * The grant time is reserved before sleeping, so callers that hold slots
   * at the same time are still spaced one interval apart.
   *
   * @returns a function that frees the slot; call it on every exit path
   */
  async acquire(name: string, signal?: AbortSignal): Promise<ReleaseFn> {
    const state = this.resolveForAcquire(name);
    if (signal?.aborted) {
      throw new CancelledError();
    }

    await this.waitForSlot(state, signal);

    try {
      const now = Date.now();
      const grantAt =
        state.lastCallTime === null
          ? now
          : Math.max(now, state.lastCallTime + this.computeInterval(state));
      state.lastCallTime = grantAt;
      await sleep(grantAt - now, signal);
    } catch (error) {
      this.freeSlot(state);
      throw error;
    }

    let released = false;
    return () => {
      if (!released) {
        released = true;
        this.freeSlot(state);
      }
    };
  }

  /**
   * Free one slot of `name`, handing it to the next waiter if there is one
   */
  release(name: string): void {
    this.freeSlot(this.getState(name));
  }

  /**
   * Run `fn` while holding a slot of `name`
   */
  async withPermit<T>(
    name: string,
    fn: () => Promise<T>,
    signal?: AbortSignal,
  ): Promise<T> {
    const release = await this.acquire(name, signal);
    try {
      return await fn();
    } finally {
      release();
    }
  }

  recordSuccess(name: string): void {
    const state = this.getState(name);
    state.consecutiveErrors = 0;
    state.successStreak++;
  }

  recordError(name: string): void {
    const state = this.getState(name);
    state.consecutiveErrors++;
    state.successStreak = 0;
    this.log.debug('Backing off', {
      api: name,
      consecutiveErrors: state.consecutiveErrors,
      intervalMs: this.computeInterval(state),
    });
  }

  /**
   * Current minimum spacing between grants, in milliseconds
   */
  getInterval(name: string): number {
    return this.computeInterval(this.getState(name));
  }

  getSnapshot(name: string): RateLimiterSnapshot {
    return this.toSnapshot(this.getState(name));
  }

  getStats(): Record<string, RateLimiterSnapshot> {
    const stats: Record<string, RateLimiterSnapshot> = {};
    for (const [name, state] of this.states) {
      stats[name] = this.toSnapshot(state);
    }
    return stats;
  }

  /**
   * Drop every registration. Pending waiters are rejected.
   */
  reset(): void {
    for (const state of this.states.values()) {
      const waiters = state.waiters.splice(0);
      for (const waiter of waiters) {
        waiter.reject(new CancelledError('Rate limiter was reset'));
      }
    }
    this.states.clear();
  }

  private computeInterval(state: ApiState): number {
    const baseMs = 1000 / state.registration.callsPerSecond;

    if (state.consecutiveErrors > 0) {
      const factor = Math.min(
        Math.pow(this.options.backoffMultiplier, state.consecutiveErrors),
        this.options.maxBackoffMultiplier,
      );
      return baseMs * factor;
    }

    if (state.successStreak > this.options.successStreakThreshold) {
      return baseMs * this.options.accelerationFactor;
    }

    return baseMs;
  }

  private waitForSlot(state: ApiState, signal?: AbortSignal): Promise<void> {
    if (
      state.waiters.length === 0 &&
      state.active < state.registration.maxConcurrent
    ) {
      state.active++;
      return Promise.resolve();
    }

    return new Promise((resolve, reject) => {
      const onAbort = () => {
        const index = state.waiters.indexOf(waiter);
        if (index !== -1) {
          state.waiters.splice(index, 1);
        }
        reject(new CancelledError());
      };
      const waiter: Waiter = {
        resolve: () => {
          signal?.removeEventListener('abort', onAbort);
          resolve();
        },
        reject: (error) => {
          signal?.removeEventListener('abort', onAbort);
          reject(error);
        },
      };
      state.waiters.push(waiter);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  private freeSlot(state: ApiState): void {
    const next = state.waiters.shift();
    if (next) {
      // The slot passes straight to the next waiter; active stays the same
      next.resolve();
      return;
    }

    if (state.active === 0) {
      this.log.warn('Release without an active slot ignored', {
        api: state.registration.name,
      });
      return;
    }
    state.active--;
  }

  private resolveForAcquire(name: string): ApiState {
    const existing = this.states.get(name);
    if (existing) {
      return existing;
    }

    if (!this.options.autoRegisterDefaults) {
      throw new ConfigurationError(`API "${name}" is not registered`);
    }

    this.log.warn('Auto-registering unknown API with default limits', {
      api: name,
      callsPerSecond: this.options.defaultCallsPerSecond,
      maxConcurrent: this.options.defaultMaxConcurrent,
    });
    this.register(
      name,
      this.options.defaultCallsPerSecond,
      this.options.defaultMaxConcurrent,
    );
    return this.getState(name);
  }

  private getState(name: string): ApiState {
    const state = this.states.get(name);
    if (!state) {
      throw new ConfigurationError(`API "${name}" is not registered`);
    }
    return state;
  }

  private toSnapshot(state: ApiState): RateLimiterSnapshot {
    return {
      ...state.registration,
      active: state.active,
      waiting: state.waiters.length,
      consecutiveErrors: state.consecutiveErrors,
      successStreak: state.successStreak,
      intervalMs: this.computeInterval(state),
      lastCallTime: state.lastCallTime,
    };
  }
}
