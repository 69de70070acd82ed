/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import process from 'node:process';
import { FatalError, VERSION, logger } from '@apigate/core';
import { EXIT_CODES, ENV_VARS } from './constants/index.js';
import { cacheCommand } from './commands/cache.js';
import { configCommand } from './commands/config.js';
import { doctorCommand } from './commands/doctor.js';
import { initCommand } from './commands/init.js';
import { queryCommand } from './commands/query.js';
import { runExitCleanup } from './utils/cleanup.js';

let signalHandlersInstalled = false;

function setupSignalHandlers(): void {
  if (signalHandlersInstalled) {
    return;
  }
  signalHandlersInstalled = true;

  const handleSignal = (code: number) => {
    logger.debug('Received termination signal', { code });
    void runExitCleanup().finally(() => process.exit(code));
  };

  process.once('SIGINT', () => handleSignal(EXIT_CODES.SIGINT));
  process.once('SIGTERM', () => handleSignal(EXIT_CODES.SIGTERM));
}

export function createParser(args: string[]) {
  return yargs(args)
    .scriptName('apigate')
    .usage('Usage: $0 <command> [options]')
    .option('config', {
      alias: 'c',
      type: 'string',
      description: `Path to the configuration file (default: apigate.config.json, or $${ENV_VARS.CONFIG_PATH})`,
    })
    .command(queryCommand)
    .command(cacheCommand)
    .command(configCommand)
    .command(initCommand)
    .command(doctorCommand)
    .demandCommand(1, 'You need at least one command before continuing.')
    .strict()
    .fail((message, error) => {
      throw error ?? new FatalError(message, EXIT_CODES.USAGE);
    })
    .version(VERSION)
    .help()
    .alias('h', 'help');
}

export interface FailureReport {
  message: string;
  exitCode: number;
}

/**
 * Turn an error that escaped `main` into what the process prints and
 * exits with. Fatal errors keep their exit code and are shown in red
 * unless `NO_COLOR` is set.
 */
export function reportFailure(
  error: unknown,
  env: NodeJS.ProcessEnv = process.env,
): FailureReport {
  if (error instanceof FatalError) {
    const message = env[ENV_VARS.NO_COLOR]
      ? error.message
      : `\x1b[31m${error.message}\x1b[0m`;
    return { message, exitCode: error.exitCode };
  }
  const detail =
    error instanceof Error ? error.stack || error.message : String(error);
  return {
    message: `apigate stopped on an unexpected error\n${detail}`,
    exitCode: EXIT_CODES.ERROR,
  };
}

export async function main(args: string[] = hideBin(process.argv)): Promise<void> {
  setupSignalHandlers();
  try {
    await createParser(args).parseAsync();
  } finally {
    await runExitCleanup();
  }
}
