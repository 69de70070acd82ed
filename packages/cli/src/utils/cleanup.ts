/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { getErrorMessage, logger } from '@apigate/core';

export type CleanupFn = () => void | Promise<void>;

const cleanupFunctions: CleanupFn[] = [];

/**
 * Register work to run before the process exits, such as closing a gateway.
 */
export function registerCleanup(fn: CleanupFn): void {
  cleanupFunctions.push(fn);
}

/**
 * Run and forget every registered cleanup function, in registration order.
 * A failing function is logged and does not stop the others.
 */
export async function runExitCleanup(): Promise<void> {
  const pending = cleanupFunctions.splice(0);
  for (const fn of pending) {
    try {
      await fn();
    } catch (error) {
      logger.warn('Cleanup step failed', { error: getErrorMessage(error) });
    }
  }
}

export function pendingCleanupCount(): number {
  return cleanupFunctions.length;
}
