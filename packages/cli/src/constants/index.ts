/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Centralized constants for the apigate command line.
 */

/**
 * Process exit codes following POSIX conventions.
 */
export const EXIT_CODES = {
  /** Successful execution */
  SUCCESS: 0,
  /** General error, including a failed query */
  ERROR: 1,
  /** Invalid command line usage */
  USAGE: 2,
  /** Unreadable or invalid configuration */
  CONFIG: 3,
  /** Interrupted by SIGINT (Ctrl+C) */
  SIGINT: 130,
  /** Terminated by SIGTERM */
  SIGTERM: 143,
} as const;

/**
 * Environment variable names read by the command line itself. Gateway
 * settings use the `APIGATE_*` variables and logging uses `LOG_LEVEL` and
 * `DEBUG`, both read by the core package.
 */
export const ENV_VARS = {
  /** Alternative path to the configuration file */
  CONFIG_PATH: 'APIGATE_CONFIG',
  /** No color output flag */
  NO_COLOR: 'NO_COLOR',
} as const;

/** Looked up in the working directory unless `--config` is given */
export const CONFIG_FILE_NAME = 'apigate.config.json';

export const MIN_NODE_MAJOR_VERSION = 20;

/**
 * Registrations written by `apigate init`.
 */
export const STARTER_APIS = [
  { name: 'google_places', callsPerSecond: 0.5, maxConcurrent: 3 },
  { name: 'pagespeed', callsPerSecond: 0.2, maxConcurrent: 2 },
] as const;
