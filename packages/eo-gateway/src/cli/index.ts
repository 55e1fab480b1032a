/**
 * EO Gateway CLI
 *
 * Commander program with the global options every command shares. The
 * preAction hook loads configuration once; a configuration failure exits
 * with code 3 before any command runs.
 *
 * @module cli
 */

import { Command, Option } from 'commander';
import type { CloudProvider } from '../config/gateway-config.js';
import { registerCommands } from './commands/index.js';
import { initializeContext, type GlobalOptions } from './lib/context.js';
import { parsePositiveInt } from './lib/options.js';
import { EXIT_CODES, printError } from './lib/output.js';

export { getGlobalContext, type GlobalContext } from './lib/context.js';
export { EXIT_CODES, type ExitCode } from './lib/output.js';

interface ProgramOptions extends GlobalOptions {
  readonly cloudProvider?: CloudProvider;
  readonly dev?: boolean;
}

const CLOUD_PROVIDERS: readonly CloudProvider[] = ['aws', 'creodias'];

export function createProgram(version: string, signal: AbortSignal): Command {
  const program = new Command();

  program
    .name('eo-gateway')
    .description('Retrieve Sentinel, Landsat and DEM products with provider fallback, and upload to the archive')
    .version(version, '-V, --version', 'Output the version number')
    .option('-v, --verbose', 'Enable verbose output')
    .option('--json', 'Output as JSON (machine-readable)')
    .option('--config <path>', 'Path to config file (default: .eo-gatewayrc)')
    .option('--timeout <ms>', 'Timeout of a single provider attempt in milliseconds', parsePositiveInt)
    .addOption(new Option('--cloud-provider <name>', 'Cloud the process runs on').choices(CLOUD_PROVIDERS))
    .option('--dev', 'Upload to the development archive buckets')
    .hook('preAction', (thisCommand) => {
      const options: ProgramOptions = thisCommand.opts();
      try {
        initializeContext(options, signal, {
          cloudProvider: options.cloudProvider,
          devMode: options.dev,
        });
      } catch (error) {
        printError(error, options.json === true);
        process.exit(EXIT_CODES.CONFIG_ERROR);
      }
    });

  registerCommands(program);
  return program;
}
