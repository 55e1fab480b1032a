/**
 * Global Test Setup for the EO Gateway
 *
 * Module loggers read LOG_LEVEL when they are created; tests only want to
 * see errors. Nothing here reaches the network.
 */

import { afterEach, vi } from 'vitest';

process.env.LOG_LEVEL = process.env.LOG_LEVEL ?? 'error';

afterEach(() => {
  vi.restoreAllMocks();
  vi.unstubAllGlobals();
});
