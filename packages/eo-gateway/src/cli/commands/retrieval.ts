/**
 * Retrieval Commands
 *
 * Usage:
 *   eo-gateway tile <tileId> -k <kind> -o <dir> [--start <day>] [--end <day>] [--provider <name>]
 *   eo-gateway product <productId> -o <dir> [--provider <name>]
 *   eo-gateway dem <tileId> -o <dir> [--kind <kind>] [--provider <name>]
 *
 * Without --provider every provider that can serve the data kind is tried in
 * order until one succeeds.
 *
 * @module cli/commands/retrieval
 */

import { Option, type Command } from 'commander';
import {
  DATA_KINDS,
  isDemDataKind,
  type DataKind,
  type DemDataKind,
  type MaterializedProduct,
  type ProviderName,
} from '../../core/types.js';
import { providerRegistry } from '../../providers/registry.js';
import { RetrievalOrchestrator } from '../../retrieval/orchestrator.js';
import type { GlobalContext } from '../lib/context.js';
import { DEM_DATA_KINDS, dateRangeFrom, parseDay } from '../lib/options.js';
import { EXIT_CODES, formatJson, formatProduct, printOutput } from '../lib/output.js';
import { runCommand } from '../lib/run-command.js';

interface TileOptions {
  readonly kind: DataKind;
  readonly output: string;
  readonly start?: Date;
  readonly end?: Date;
  readonly provider?: string;
}

interface ProductOptions {
  readonly output: string;
  readonly provider?: string;
}

interface DemOptions {
  readonly kind: DemDataKind;
  readonly output: string;
  readonly provider?: string;
}

/**
 * @throws {UnknownProviderError} for names not in the registry
 */
function providerOption(name: string | undefined): ProviderName | undefined {
  return name === undefined ? undefined : providerRegistry.getProvider(name).name;
}

function orchestratorFor(context: GlobalContext): RetrievalOrchestrator {
  return new RetrievalOrchestrator(context.config, { logger: context.logger.child({ module: 'retrieval' }) });
}

function printProduct(product: MaterializedProduct, json: boolean): void {
  printOutput(json ? formatJson({ success: true, product }) : formatProduct(product));
}

export function registerTileCommand(program: Command): void {
  program
    .command('tile <tileId>')
    .description('Retrieve the products of a Sentinel-2 grid tile')
    .addOption(new Option('-k, --kind <kind>', 'Data kind').choices(DATA_KINDS).makeOptionMandatory())
    .requiredOption('-o, --output <dir>', 'Output directory')
    .option('--start <day>', 'First acquisition day (YYYY-MM-DD)', parseDay)
    .option('--end <day>', 'Last acquisition day (YYYY-MM-DD)', parseDay)
    .option('--provider <name>', 'Use only this provider, without fallback')
    .action(async (tileId: string, options: TileOptions, command: Command) => {
      const dateRange = dateRangeFrom(options.start, options.end);
      if (typeof dateRange === 'string') {
        command.error(`error: ${dateRange}`, { exitCode: EXIT_CODES.INPUT_ERROR });
      }

      await runCommand('tile', { tileId, kind: options.kind, provider: options.provider }, async (context) => {
        if (dateRange && isDemDataKind(options.kind)) {
          context.logger.warn('Date range ignored for DEM data', { kind: options.kind });
        }
        const product = await orchestratorFor(context).retrieve({
          dataKind: options.kind,
          locator: {
            type: 'tile',
            tileId,
            dateRange: isDemDataKind(options.kind) ? undefined : dateRange,
          },
          outputDirectory: options.output,
          provider: providerOption(options.provider),
          signal: context.signal,
        });
        printProduct(product, context.config.json);
      });
    });
}

export function registerProductCommand(program: Command): void {
  program
    .command('product <productId>')
    .description('Retrieve one Sentinel-1, Sentinel-2 or Landsat 8 product by its identifier')
    .requiredOption('-o, --output <dir>', 'Output directory')
    .option('--provider <name>', 'Use only this provider, without fallback')
    .action(async (productId: string, options: ProductOptions) => {
      await runCommand('product', { productId, provider: options.provider }, async (context) => {
        const product = await orchestratorFor(context).retrieveById(productId, options.provider, options.output, {
          signal: context.signal,
        });
        printProduct(product, context.config.json);
      });
    });
}

export function registerDemCommand(program: Command): void {
  program
    .command('dem <tileId>')
    .description('Retrieve the DEM cells covering a grid tile, or a single DEM cell')
    .addOption(new Option('--kind <kind>', 'DEM data kind').choices(DEM_DATA_KINDS).default('DemSRTM1s'))
    .requiredOption('-o, --output <dir>', 'Output directory')
    .option('--provider <name>', 'Use only this provider, without fallback')
    .action(async (tileId: string, options: DemOptions) => {
      await runCommand('dem', { tileId, kind: options.kind, provider: options.provider }, async (context) => {
        const product = await orchestratorFor(context).retrieve({
          dataKind: options.kind,
          locator: { type: 'tile', tileId },
          outputDirectory: options.output,
          provider: providerOption(options.provider),
          signal: context.signal,
        });
        printProduct(product, context.config.json);
      });
    });
}
