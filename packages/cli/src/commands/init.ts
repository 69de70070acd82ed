/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { CommandModule } from 'yargs';
import process from 'node:process';
import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { getErrorMessage, logger } from '@apigate/core';
import {
  CONFIG_FILE_NAME,
  EXIT_CODES,
  STARTER_APIS,
} from '../constants/index.js';
import { parseCommandArgs } from '../utils/args.js';

const InitArgsSchema = z.object({
  force: z.boolean().default(false),
});

export const STARTER_CONFIG = {
  maxRetries: 3,
  baseRetryDelayMs: 1000,
  cacheEnabled: true,
  cacheDir: '.apigate/cache',
  cacheTtlSeconds: 86400,
  apis: STARTER_APIS,
};

/**
 * Write a starter configuration into `directory`.
 *
 * @returns the file written, or null when one exists and `force` is off
 */
export function writeStarterConfig(
  directory: string,
  force: boolean,
): string | null {
  const configFile = path.join(directory, CONFIG_FILE_NAME);
  if (fs.existsSync(configFile) && !force) {
    return null;
  }
  fs.mkdirSync(directory, { recursive: true });
  fs.writeFileSync(configFile, `${JSON.stringify(STARTER_CONFIG, null, 2)}\n`);
  return configFile;
}

export const initCommand: CommandModule = {
  command: 'init',
  describe: `Create ${CONFIG_FILE_NAME} in the current directory`,
  builder: (yargs) =>
    yargs.option('force', {
      alias: 'f',
      type: 'boolean',
      description: 'Overwrite existing configuration file',
      default: false,
    }),
  handler: (argv) => {
    const args = parseCommandArgs(InitArgsSchema, argv);
    console.log('🚀 Initializing apigate configuration...\n');

    try {
      const configFile = writeStarterConfig(process.cwd(), args.force);
      if (configFile === null) {
        logger.error(`Configuration file already exists at ${CONFIG_FILE_NAME}`);
        console.log('Use --force to overwrite.');
        process.exitCode = EXIT_CODES.ERROR;
        return;
      }
      console.log(`✅ Created configuration file: ${configFile}`);
      console.log(
        '\nEdit the "apis" list, then run "apigate query <api> <url>".',
      );
    } catch (error) {
      logger.error('Failed to create configuration file', {
        error: getErrorMessage(error),
      });
      process.exitCode = EXIT_CODES.ERROR;
    }
  },
};
