#!/usr/bin/env node

/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { logger } from '@apigate/core';
import { main, reportFailure } from './src/cli.js';

main().catch((error: unknown) => {
  const { message, exitCode } = reportFailure(error);
  logger.error(message);
  process.exit(exitCode);
});
