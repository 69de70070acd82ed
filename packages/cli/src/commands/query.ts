/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { CommandModule } from 'yargs';
import process from 'node:process';
import { z } from 'zod';
import { formatStats, type ApiGateway } from '@apigate/core';
import { EXIT_CODES } from '../constants/index.js';
import { loadCommandConfig } from '../config/settings.js';
import { initializeGateway } from '../gateway/gateway-lifecycle.js';
import { parseCommandArgs, parseParams } from '../utils/args.js';

const QueryArgsSchema = z.object({
  api: z.string().min(1),
  target: z.string().min(1),
  param: z.array(z.string()).default([]),
  method: z.string().default('GET'),
  cache: z.boolean().default(true),
  stats: z.boolean().default(false),
  timeout: z.number().int().positive().optional(),
  config: z.string().optional(),
});

export type QueryArgs = z.output<typeof QueryArgsSchema>;

/**
 * Run one query, print the result as JSON and return the exit code.
 */
export async function runQuery(
  gateway: ApiGateway,
  args: QueryArgs,
  print: (text: string) => void = console.log,
): Promise<number> {
  const params = parseParams(args.param);
  const result = await gateway.query(args.api, args.target, params, {
    method: args.method,
    useCache: args.cache,
    timeoutMs: args.timeout,
  });

  print(JSON.stringify(result, null, 2));
  if (args.stats) {
    print(formatStats(gateway.getStats()));
  }
  return result.success ? EXIT_CODES.SUCCESS : EXIT_CODES.ERROR;
}

export const queryCommand: CommandModule = {
  command: 'query <api> <target>',
  describe: 'Send one request through the gateway',
  builder: (yargs) =>
    yargs
      .positional('api', {
        type: 'string',
        describe: 'Registered API name (e.g. google_places)',
      })
      .positional('target', {
        type: 'string',
        describe: 'Endpoint URL',
      })
      .option('param', {
        alias: 'p',
        type: 'string',
        array: true,
        description: 'Request parameter as key=value, repeatable',
      })
      .option('method', {
        alias: 'm',
        type: 'string',
        description: 'HTTP method',
        default: 'GET',
      })
      .option('cache', {
        type: 'boolean',
        description: 'Use the response cache (--no-cache to bypass)',
        default: true,
      })
      .option('timeout', {
        type: 'number',
        description: 'Per-attempt timeout in milliseconds',
      })
      .option('stats', {
        type: 'boolean',
        description: 'Print gateway statistics after the result',
        default: false,
      }),
  handler: async (argv) => {
    const args = parseCommandArgs(QueryArgsSchema, argv);
    const gateway = initializeGateway(loadCommandConfig(args.config));
    process.exitCode = await runQuery(gateway, args);
  },
};
