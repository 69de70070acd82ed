/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export interface LinkedSignal {
  signal: AbortSignal;
  /** Detach from the source signals */
  dispose: () => void;
}

/**
 * One signal that aborts as soon as any of `sources` does.
 */
export function linkSignals(
  ...sources: Array<AbortSignal | undefined>
): LinkedSignal {
  const controller = new AbortController();
  const attached: AbortSignal[] = [];
  const onAbort = () => controller.abort();

  for (const source of sources) {
    if (!source) {
      continue;
    }
    if (source.aborted) {
      controller.abort();
      break;
    }
    source.addEventListener('abort', onAbort, { once: true });
    attached.push(source);
  }

  return {
    signal: controller.signal,
    dispose: () => {
      for (const source of attached) {
        source.removeEventListener('abort', onAbort);
      }
    },
  };
}
