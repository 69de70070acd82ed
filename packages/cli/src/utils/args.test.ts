/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { FatalError } from '@apigate/core';
import { parseCommandArgs, parseParams } from './args.js';

describe('parseParams', () => {
  it('should split key=value pairs', () => {
    expect(parseParams(['q=coffee shop', 'page=2'])).toEqual({
      q: 'coffee shop',
      page: '2',
    });
  });

  it('should keep = signs inside the value', () => {
    expect(parseParams(['filter=a=b'])).toEqual({ filter: 'a=b' });
  });

  it('should accept empty values', () => {
    expect(parseParams(['cursor='])).toEqual({ cursor: '' });
  });

  it('should let a later pair override an earlier one', () => {
    expect(parseParams(['page=1', 'page=3'])).toEqual({ page: '3' });
  });

  it('should reject a pair without a separator', () => {
    expect(() => parseParams(['novalue'])).toThrow(
      'Invalid parameter "novalue", expected key=value',
    );
  });

  it('should reject a pair without a key', () => {
    try {
      parseParams(['=value']);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(FatalError);
      expect(error).toMatchObject({ exitCode: 2 });
    }
  });
});

describe('parseCommandArgs', () => {
  const schema = z.object({ limit: z.number(), verbose: z.boolean().default(false) });

  it('should return the parsed arguments with defaults', () => {
    expect(parseCommandArgs(schema, { limit: 5, _: [], $0: 'apigate' })).toEqual({
      limit: 5,
      verbose: false,
    });
  });

  it('should throw a usage error for invalid arguments', () => {
    expect(() => parseCommandArgs(schema, { limit: 'five' })).toThrow(
      'Invalid arguments: limit: Expected number, received string',
    );
  });
});
