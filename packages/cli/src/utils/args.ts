/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { z } from 'zod';
import { FatalError, formatConfigIssues } from '@apigate/core';
import { EXIT_CODES } from '../constants/index.js';

/**
 * Validate parsed yargs arguments against a command's schema.
 */
export function parseCommandArgs<S extends z.ZodTypeAny>(
  schema: S,
  argv: unknown,
): z.output<S> {
  const result = schema.safeParse(argv);
  if (!result.success) {
    throw new FatalError(
      `Invalid arguments: ${formatConfigIssues(result.error)}`,
      EXIT_CODES.USAGE,
    );
  }
  return result.data;
}

/**
 * Parse repeated `key=value` pairs. The value may itself contain `=`;
 * a later pair overrides an earlier one with the same key.
 */
export function parseParams(pairs: readonly string[]): Record<string, string> {
  const params: Record<string, string> = {};
  for (const pair of pairs) {
    const separator = pair.indexOf('=');
    const key = separator === -1 ? '' : pair.slice(0, separator).trim();
    if (key === '') {
      throw new FatalError(
        `Invalid parameter "${pair}", expected key=value`,
        EXIT_CODES.USAGE,
      );
    }
    params[key] = pair.slice(separator + 1);
  }
  return params;
}
