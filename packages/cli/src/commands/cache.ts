/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { CommandModule } from 'yargs';
import { z } from 'zod';
import {
  PersistentResponseCache,
  logger,
  type GatewayConfig,
} from '@apigate/core';
import { loadCommandConfig } from '../config/settings.js';
import { parseCommandArgs } from '../utils/args.js';

const CacheArgsSchema = z.object({
  config: z.string().optional(),
});

export type CacheAction = 'stats' | 'prune' | 'clear';

/**
 * The on-disk response cache described by `config`, opened even when
 * the gateway itself runs with caching disabled.
 */
export function openResponseCache(
  config: GatewayConfig,
): PersistentResponseCache {
  return new PersistentResponseCache(
    {
      directory: config.cacheDir,
      ttlSeconds: config.cacheTtlSeconds,
      enabled: true,
    },
    logger,
  );
}

export function runCacheAction(
  action: CacheAction,
  cache: PersistentResponseCache,
  print: (text: string) => void = console.log,
): void {
  switch (action) {
    case 'stats': {
      const stats = cache.getStats();
      print(`Directory: ${stats.directory}`);
      print(`Entries:   ${stats.entries}`);
      print(`TTL:       ${stats.ttlSeconds}s`);
      return;
    }
    case 'prune':
      print(`Removed ${cache.prune()} expired or unreadable entries.`);
      return;
    case 'clear':
      print(`Removed ${cache.clear()} entries.`);
      return;
    default: {
      const unreachable: never = action;
      throw new Error(`Unknown cache action: ${String(unreachable)}`);
    }
  }
}

function cacheSubcommand(action: CacheAction, describe: string): CommandModule {
  return {
    command: action,
    describe,
    handler: (argv) => {
      const args = parseCommandArgs(CacheArgsSchema, argv);
      runCacheAction(action, openResponseCache(loadCommandConfig(args.config)));
    },
  };
}

export const cacheCommand: CommandModule = {
  command: 'cache <command>',
  describe: 'Inspect and maintain the response cache',
  builder: (yargs) =>
    yargs
      .command(cacheSubcommand('stats', 'Show cache location and size'))
      .command(cacheSubcommand('prune', 'Remove expired and unreadable entries'))
      .command(cacheSubcommand('clear', 'Remove every cached response'))
      .demandCommand(1, 'You need at least one command before continuing.')
      .version(false),
  handler: () => {},
};
