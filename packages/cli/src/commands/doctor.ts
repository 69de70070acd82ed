/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { CommandModule } from 'yargs';
import process from 'node:process';
import os from 'node:os';
import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { getErrorMessage, logger, type GatewayConfig } from '@apigate/core';
import { loadCommandConfig } from '../config/settings.js';
import { EXIT_CODES, MIN_NODE_MAJOR_VERSION } from '../constants/index.js';
import { parseCommandArgs } from '../utils/args.js';

export interface DoctorCheck {
  name: string;
  /** Returns a one-line summary, throws to report an issue */
  run: () => string;
}

const DoctorArgsSchema = z.object({
  config: z.string().optional(),
});

export function checkNodeVersion(version: string): string {
  const major = parseInt(version.replace('v', '').split('.')[0] ?? '', 10);
  if (!(major >= MIN_NODE_MAJOR_VERSION)) {
    throw new Error(
      `Node.js version ${version} is too old. Please upgrade to Node.js ${MIN_NODE_MAJOR_VERSION} or later.`,
    );
  }
  return version;
}

export function checkCacheDirectory(directory: string): string {
  fs.mkdirSync(directory, { recursive: true });
  const scratchFile = path.join(directory, `.doctor-${process.pid}`);
  fs.writeFileSync(scratchFile, '');
  fs.unlinkSync(scratchFile);
  return `${path.resolve(directory)} is writable`;
}

export function buildChecks(configPath?: string): DoctorCheck[] {
  let config: GatewayConfig | null = null;

  return [
    {
      name: 'Node.js Version',
      run: () => checkNodeVersion(process.version),
    },
    {
      name: 'Operating System',
      run: () => `${os.type()} ${os.release()} (${os.arch()})`,
    },
    {
      name: 'Configuration',
      run: () => {
        config = loadCommandConfig(configPath);
        const names = config.apis.map((api) => api.name);
        return names.length > 0
          ? `${names.length} API(s) registered: ${names.join(', ')}`
          : 'Valid, no APIs registered';
      },
    },
    {
      name: 'Cache Directory',
      run: () => {
        if (!config) {
          throw new Error('Skipped, configuration is invalid');
        }
        if (!config.cacheEnabled) {
          return 'Caching disabled';
        }
        return checkCacheDirectory(config.cacheDir);
      },
    },
  ];
}

/**
 * @returns number of checks that failed
 */
export function runChecks(
  checks: readonly DoctorCheck[],
  write: (text: string) => void = (text) => process.stdout.write(text),
): number {
  let issuesFound = 0;

  for (const check of checks) {
    write(`Checking ${check.name}... `);
    try {
      write(`✅ ${check.run()}\n`);
    } catch (error) {
      issuesFound++;
      write('❌\n');
      logger.error(`  Error: ${getErrorMessage(error)}`);
    }
  }
  return issuesFound;
}

export const doctorCommand: CommandModule = {
  command: 'doctor',
  describe: 'Check your environment and configuration for problems',
  handler: (argv) => {
    const args = parseCommandArgs(DoctorArgsSchema, argv);
    console.log('🩺  apigate doctor\n');

    const issuesFound = runChecks(buildChecks(args.config));

    console.log('');
    if (issuesFound > 0) {
      console.log(`⚠️  Doctor found ${issuesFound} issue(s).`);
      process.exitCode = EXIT_CODES.ERROR;
    } else {
      console.log('✨  Everything looks good!');
    }
  },
};
