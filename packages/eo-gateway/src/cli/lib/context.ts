/**
 * Global CLI Context
 *
 * Configuration, logger and cancellation signal shared by every command,
 * initialized once by the program's preAction hook.
 *
 * @module cli/lib/context
 */

import { loadConfig, type ConfigOverrides, type GatewayConfig } from '../../config/gateway-config.js';
import { createCLILogger, type CLILogger } from './logger.js';

export interface GlobalOptions {
  readonly verbose?: boolean;
  readonly json?: boolean;
  readonly config?: string;
  readonly timeout?: number;
}

export interface GlobalContext {
  readonly config: GatewayConfig;
  readonly logger: CLILogger;
  readonly startTime: number;
  /** Aborted on SIGINT / SIGTERM */
  readonly signal: AbortSignal;
}

let globalContext: GlobalContext | null = null;

export function getGlobalContext(): GlobalContext {
  if (!globalContext) {
    throw new Error('Global context not initialized. Call initializeContext first.');
  }
  return globalContext;
}

/**
 * Load configuration and build the shared logger
 *
 * @throws {ConfigError} and {UnknownProviderError} from configuration loading
 */
export function initializeContext(
  options: GlobalOptions,
  signal: AbortSignal,
  overrides: Pick<ConfigOverrides, 'cloudProvider' | 'devMode'> = {}
): GlobalContext {
  const startTime = Date.now();

  const config = loadConfig({
    configPath: options.config,
    overrides: {
      verbose: options.verbose,
      json: options.json,
      timeout: options.timeout,
      ...overrides,
    },
  });

  const logger = createCLILogger({
    level: config.verbose ? 'debug' : 'info',
    json: config.json,
  });

  globalContext = { config, logger, startTime, signal };
  return globalContext;
}
