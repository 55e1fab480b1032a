/**
 * DEM Ids Command
 *
 * Prints the DEM cells covering a Sentinel-2 grid tile, joined by `;`.
 *
 * Usage:
 *   eo-gateway dem-ids <tileId> [--kind <kind>] [--suffix] [--gdal-paths]
 *
 * Examples:
 *   eo-gateway dem-ids 31TCJ                  N44E000;N44E001;N43E000;N43E001
 *   eo-gateway dem-ids 31TCJ --kind DemSRTM3s srtm_37_04
 *   eo-gateway dem-ids 31TCJ --kind DemCOP1s --gdal-paths
 *
 * @module cli/commands/dem-ids
 */

import { Option, type Command } from 'commander';
import { bucketName, type BucketFamily } from '../../buckets/bucket-families.js';
import { demTileKey, gdalS3Path } from '../../buckets/key-layouts.js';
import type { DemDataKind } from '../../core/types.js';
import { SRTM1S_ARCHIVE_SUFFIX } from '../../tiles/dem-tiles.js';
import { demTileIdsFor } from '../../tiles/tile-resolver.js';
import { DEM_DATA_KINDS } from '../lib/options.js';
import { EXIT_CODES, formatJson, printOutput } from '../lib/output.js';
import { runCommand } from '../lib/run-command.js';

interface DemIdsOptions {
  readonly kind: DemDataKind;
  readonly suffix?: boolean;
  readonly gdalPaths?: boolean;
}

const COPERNICUS_FAMILIES: Readonly<Partial<Record<DemDataKind, BucketFamily>>> = {
  DemCOP1s: 'aws-cop-30',
  DemCOP3s: 'aws-cop-90',
};

/**
 * Ids (or paths) the command prints, before joining
 *
 * @throws {InvalidTileIDError} when the tile id does not parse
 */
export function demIdentifiers(tileId: string, options: DemIdsOptions): string[] {
  const ids = demTileIdsFor(options.kind, tileId);

  if (options.gdalPaths) {
    const family = COPERNICUS_FAMILIES[options.kind];
    if (!family) return ids;
    const bucket = bucketName(family, false);
    return ids.map((id) => gdalS3Path(bucket, demTileKey(family, options.kind, id)));
  }
  if (options.suffix) {
    return ids.map((id) => `${id}${SRTM1S_ARCHIVE_SUFFIX}`);
  }
  return ids;
}

export function registerDemIdsCommand(program: Command): void {
  program
    .command('dem-ids <tileId>')
    .description('Print the DEM cells covering a grid tile, separated by ";"')
    .addOption(new Option('--kind <kind>', 'DEM data kind').choices(DEM_DATA_KINDS).default('DemSRTM1s'))
    .option('--suffix', `Append ${SRTM1S_ARCHIVE_SUFFIX} to each id (SRTM 1s only)`)
    .option('--gdal-paths', 'Print GDAL /vsis3/ paths instead of ids (Copernicus DEM only)')
    .action(async (tileId: string, options: DemIdsOptions, command: Command) => {
      if (options.suffix && options.kind !== 'DemSRTM1s') {
        command.error('error: --suffix applies to DemSRTM1s only', { exitCode: EXIT_CODES.INPUT_ERROR });
      }
      if (options.gdalPaths && !COPERNICUS_FAMILIES[options.kind]) {
        command.error('error: --gdal-paths applies to DemCOP1s and DemCOP3s only', {
          exitCode: EXIT_CODES.INPUT_ERROR,
        });
      }

      await runCommand('dem-ids', { tileId, kind: options.kind }, async ({ config }) => {
        const ids = demIdentifiers(tileId, options);
        printOutput(config.json ? formatJson({ success: true, tileId, kind: options.kind, ids }) : ids.join(';'));
      });
    });
}
