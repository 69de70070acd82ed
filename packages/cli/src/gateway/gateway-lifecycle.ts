/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import {
  ApiGateway,
  logger,
  type GatewayConfig,
  type GatewayDependencies,
} from '@apigate/core';
import { registerCleanup } from '../utils/cleanup.js';

/**
 * Create a gateway whose transport is closed when the CLI exits.
 *
 * @example
 * ```typescript
 * const gateway = initializeGateway(config);
 * const result = await gateway.query('places', url, { q: 'cafe' });
 * ```
 */
export function initializeGateway(
  config: GatewayConfig,
  deps: GatewayDependencies = {},
): ApiGateway {
  logger.debug('Initializing gateway', {
    apis: config.apis.map((api) => api.name),
    cacheEnabled: config.cacheEnabled,
    cacheDir: config.cacheDir,
  });

  const gateway = new ApiGateway(config, deps);

  registerCleanup(() => {
    logger.debug('Closing gateway');
    gateway.close();
  });

  return gateway;
}
