/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { CommandModule } from 'yargs';
import process from 'node:process';
import { get } from 'lodash-es';
import { z } from 'zod';
import { loadCommandConfig } from '../config/settings.js';
import { EXIT_CODES } from '../constants/index.js';
import { parseCommandArgs } from '../utils/args.js';

const ListArgsSchema = z.object({
  config: z.string().optional(),
});

const GetArgsSchema = ListArgsSchema.extend({
  key: z.string().min(1),
});

export function formatConfigValue(value: unknown): string {
  return typeof value === 'object' && value !== null
    ? JSON.stringify(value, null, 2)
    : String(value);
}

export const configCommand: CommandModule = {
  command: 'config <command>',
  describe: 'Show the effective gateway configuration',
  builder: (yargs) =>
    yargs
      .command({
        command: 'list',
        describe: 'List all configuration values, defaults included',
        handler: (argv) => {
          const args = parseCommandArgs(ListArgsSchema, argv);
          const config = loadCommandConfig(args.config);
          console.log(JSON.stringify(config, null, 2));
        },
      })
      .command({
        command: 'get <key>',
        describe: 'Get a specific configuration value',
        builder: (yargs) =>
          yargs.positional('key', {
            type: 'string',
            describe: 'The configuration key (e.g. apis.0.name)',
          }),
        handler: (argv) => {
          const args = parseCommandArgs(GetArgsSchema, argv);
          const value: unknown = get(loadCommandConfig(args.config), args.key);

          if (value === undefined) {
            console.error(`Key '${args.key}' not found.`);
            process.exitCode = EXIT_CODES.ERROR;
            return;
          }
          console.log(formatConfigValue(value));
        },
      })
      .demandCommand(1, 'You need at least one command before continuing.')
      .version(false),
  handler: () => {},
};
