/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export const VERSION = '0.1.0';

export const DEFAULT_USER_AGENT = `apigate/${VERSION}`;
