/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import fs from 'node:fs';
import path from 'node:path';
import {
  ConfigurationError,
  FatalConfigError,
  getErrorMessage,
  parseGatewayConfig,
  readEnvConfig,
  type GatewayConfig,
  type GatewayConfigInput,
} from '@apigate/core';
import { CONFIG_FILE_NAME, ENV_VARS } from '../constants/index.js';

export interface SettingsError {
  path: string;
  message: string;
}

export interface LoadedSettings {
  /** File the settings came from, or null when none was found */
  path: string | null;
  merged: Record<string, unknown>;
  errors: SettingsError[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Read the configuration file. An explicit path that does not exist is an
 * error; a missing default file just means no file settings.
 */
export function loadSettings(
  workspaceRoot: string,
  configPath?: string,
): LoadedSettings {
  const filePath = configPath
    ? path.resolve(workspaceRoot, configPath)
    : path.join(workspaceRoot, CONFIG_FILE_NAME);

  if (!fs.existsSync(filePath)) {
    if (configPath) {
      return {
        path: filePath,
        merged: {},
        errors: [{ path: filePath, message: 'File not found' }],
      };
    }
    return { path: null, merged: {}, errors: [] };
  }

  try {
    const parsed: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
    if (!isRecord(parsed)) {
      return {
        path: filePath,
        merged: {},
        errors: [{ path: filePath, message: 'Expected a JSON object' }],
      };
    }
    return { path: filePath, merged: parsed, errors: [] };
  } catch (error) {
    return {
      path: filePath,
      merged: {},
      errors: [{ path: filePath, message: getErrorMessage(error) }],
    };
  }
}

/**
 * Resolve the gateway configuration: defaults, then the settings file, then
 * `APIGATE_*` variables, then command line overrides.
 */
export function resolveGatewayConfig(
  settings: LoadedSettings,
  overrides: GatewayConfigInput = {},
  env: NodeJS.ProcessEnv = process.env,
): GatewayConfig {
  if (settings.errors.length > 0) {
    const details = settings.errors
      .map((error) => `${error.path}: ${error.message}`)
      .join('\n');
    throw new FatalConfigError(`Could not read settings.\n${details}`);
  }

  const explicit = Object.fromEntries(
    Object.entries(overrides).filter(([, value]) => value !== undefined),
  );

  try {
    return parseGatewayConfig({
      ...settings.merged,
      ...readEnvConfig(env),
      ...explicit,
    });
  } catch (error) {
    if (error instanceof ConfigurationError) {
      const source = settings.path ? ` (${settings.path})` : '';
      throw new FatalConfigError(`${error.message}${source}`);
    }
    throw error;
  }
}

/**
 * Settings and configuration for a command run from the working directory.
 * `configPath` falls back to `APIGATE_CONFIG`.
 */
export function loadCommandConfig(
  configPath?: string,
  overrides: GatewayConfigInput = {},
  env: NodeJS.ProcessEnv = process.env,
): GatewayConfig {
  const settings = loadSettings(
    process.cwd(),
    configPath ?? env[ENV_VARS.CONFIG_PATH],
  );
  return resolveGatewayConfig(settings, overrides, env);
}
