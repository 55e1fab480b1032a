/**
 * Bucket Key Layouts
 *
 * Builds the exact object keys and prefixes each provider publishes its data
 * under. Pure string construction; nothing here touches the network.
 *
 * LAYOUTS:
 * - AWS sentinel-s1-l1c:   GRD/{Y}/{M}/{D}/{beam}/{pol}/{id}/
 * - AWS sentinel-s2-*:     products/{Y}/{M}/{D}/{id}/ and tiles/{zone}/{band}/{sq}/{Y}/{M}/{D}/0/
 * - AWS sentinel-cogs:     sentinel-s2-l2a-cogs/{zone}/{band}/{sq}/{Y}/{M}/{mission}_{tile}_{YYYYMMDD}_0_L2A/
 * - AWS usgs-landsat:      collection02/level-2/standard/oli-tirs/{Y}/{path}/{row}/{id}/
 * - AWS copernicus-dem-*:  Copernicus_DSM_COG_{10|30}_{N43}_00_{E001}_00_DEM/<same>.tif
 * - DIAS eodata:           Sentinel-1/SAR/GRD/{YYYY}/{MM}/{DD}/{id}.SAFE/ and
 *                          Sentinel-2/MSI/{L1C|L2A}/{YYYY}/{MM}/{DD}/{id}.SAFE/
 * - EWoC aux-data:         srtm30/{id}.SRTMGL1.hgt.zip, srtm90/{srtm_XX_YY}.zip
 *
 * AWS date components are unpadded (2021/7/4); DIAS ones are zero-padded
 * (2021/07/04).
 *
 * Inputs that cannot form a key for the requested layout (an S2 id given to
 * an S1 layout, a DEM id of the wrong tiling) raise InvalidKeyPatternError,
 * which is distinct from a well-formed key whose object is absent.
 */

import { InvalidKeyPatternError, isGatewayError, errorMessage } from '../core/errors.js';
import type { DataKind } from '../core/types.js';
import { compactDate } from '../core/utils/date-range.js';
import {
  parseSentinel1ProductId,
  parseSentinel2ProductId,
  parseLandsatProductId,
  withSafeSuffix,
  type Sentinel1ProductId,
  type Sentinel2ProductId,
  type LandsatProductId,
} from '../products/product-id.js';
import {
  SRTM1S_ARCHIVE_SUFFIX,
  formatDemTile,
  formatSrtm3sTile,
  parseDemTile,
  parseSrtm3sTile,
  type DemTile,
} from '../tiles/dem-tiles.js';
import { parseOpticalGridTile, splitTileId } from '../tiles/mgrs.js';
import type { BucketFamily } from './bucket-families.js';

// ============================================================================
// Date Components
// ============================================================================

function awsDate(date: Date): string[] {
  return [String(date.getUTCFullYear()), String(date.getUTCMonth() + 1), String(date.getUTCDate())];
}

function pad2(value: number): string {
  return String(value).padStart(2, '0');
}

function diasDate(date: Date): string[] {
  return [String(date.getUTCFullYear()), pad2(date.getUTCMonth() + 1), pad2(date.getUTCDate())];
}

function prefix(components: readonly string[]): string {
  return `${components.join('/')}/`;
}

/**
 * Run a parser and report its failure as a key-pattern mismatch
 */
function forLayout<T>(layout: string, parse: () => T): T {
  try {
    return parse();
  } catch (error) {
    if (isGatewayError(error)) {
      throw new InvalidKeyPatternError(layout, errorMessage(error));
    }
    throw error;
  }
}

function s1Product(layout: string, productId: string): Sentinel1ProductId {
  const product = forLayout(layout, () => parseSentinel1ProductId(productId));
  if (product.productType !== 'GRD') {
    throw new InvalidKeyPatternError(layout, `only GRD products are published, got ${product.productType}`);
  }
  return product;
}

function s2Product(layout: string, productId: string): Sentinel2ProductId {
  return forLayout(layout, () => parseSentinel2ProductId(productId));
}

function landsatProduct(layout: string, productId: string): LandsatProductId {
  return forLayout(layout, () => parseLandsatProductId(productId));
}

function gridTile(layout: string, tileId: string): { zone: string; band: string; square: string } {
  return splitTileId(forLayout(layout, () => parseOpticalGridTile(tileId)));
}

// ============================================================================
// AWS Open Data
// ============================================================================

export function awsS1ProductPrefix(productId: string): string {
  const product = s1Product('sentinel-s1-l1c', productId);
  return prefix([
    product.productType,
    ...awsDate(product.start),
    product.beamMode,
    product.polarisation,
    product.id,
  ]);
}

export function awsS2ProductPrefix(productId: string): string {
  const product = s2Product('sentinel-s2 products', productId);
  return prefix(['products', ...awsDate(product.sensingTime), product.id]);
}

/**
 * Tile-data prefix for one acquisition day, sequence 0
 */
export function awsS2TilePrefix(tileId: string, date: Date): string {
  const { zone, band, square } = gridTile('sentinel-s2 tiles', tileId);
  return prefix(['tiles', zone, band, square, ...awsDate(date), '0']);
}

/**
 * Prefix listing every acquisition of a tile on one day
 */
export function awsS2TileDayPrefix(tileId: string, date: Date): string {
  const { zone, band, square } = gridTile('sentinel-s2 tiles', tileId);
  return prefix(['tiles', zone, band, square, ...awsDate(date)]);
}

const COG_ROOT = 'sentinel-s2-l2a-cogs';

export function s2CogProductName(product: Sentinel2ProductId): string {
  return [product.mission, product.tileId, compactDate(product.sensingTime), '0', 'L2A'].join('_');
}

export function awsS2CogProductPrefix(productId: string): string {
  const product = s2Product('sentinel-cogs', productId);
  if (product.level !== 'L2A') {
    throw new InvalidKeyPatternError('sentinel-cogs', `only L2A products are published, got ${product.level}`);
  }
  const { zone, band, square } = gridTile('sentinel-cogs', product.tileId);
  const [year, month] = awsDate(product.sensingTime);
  return prefix([COG_ROOT, zone, band, square, year, month, s2CogProductName(product)]);
}

/**
 * Prefix listing every COG product of a tile in one month
 */
export function awsS2CogMonthPrefix(tileId: string, year: number, month: number): string {
  const { zone, band, square } = gridTile('sentinel-cogs', tileId);
  return prefix([COG_ROOT, zone, band, square, String(year), String(month)]);
}

/**
 * Acquisition date of a COG product directory name, S2B_31TCJ_20210714_0_L2A
 */
export function cogProductDate(name: string): Date | null {
  const match = /^S2[AB]_\d{2}[A-Z]{3}_(\d{4})(\d{2})(\d{2})_\d+_L2A$/.exec(name);
  if (!match) return null;
  return new Date(Date.UTC(Number(match[1]), Number(match[2]) - 1, Number(match[3])));
}

export function awsLandsatProductPrefix(productId: string): string {
  const product = landsatProduct('usgs-landsat', productId);
  return prefix([
    'collection02',
    'level-2',
    'standard',
    'oli-tirs',
    String(product.acquisitionDate.getUTCFullYear()),
    product.wrsPath,
    product.wrsRow,
    product.id,
  ]);
}

// ============================================================================
// Copernicus DEM
// ============================================================================

export type CopernicusResolution = '1s' | '3s';

/**
 * Copernicus_DSM_COG_10_N43_00_E001_00_DEM for cell N43E001 at 1s
 */
export function copernicusDemName(tile: DemTile, resolution: CopernicusResolution): string {
  const id = formatDemTile(tile);
  const grid = resolution === '1s' ? '10' : '30';
  return `Copernicus_DSM_COG_${grid}_${id.slice(0, 3)}_00_${id.slice(3)}_00_DEM`;
}

export function copernicusDemKey(tile: DemTile, resolution: CopernicusResolution): string {
  const name = copernicusDemName(tile, resolution);
  return `${name}/${name}.tif`;
}

/**
 * GDAL virtual path reading the object straight from S3
 */
export function gdalS3Path(bucket: string, key: string): string {
  return `/vsis3/${bucket}/${key}`;
}

// ============================================================================
// DIAS eodata
// ============================================================================

export function diasS1ProductPrefix(productId: string): string {
  const product = s1Product('eodata Sentinel-1', productId);
  return prefix(['Sentinel-1', 'SAR', product.productType, ...diasDate(product.start), withSafeSuffix(product.id)]);
}

export function diasS2ProductPrefix(productId: string): string {
  const product = s2Product('eodata Sentinel-2', productId);
  return prefix(['Sentinel-2', 'MSI', product.level, ...diasDate(product.sensingTime), withSafeSuffix(product.id)]);
}

/**
 * Prefix listing every Sentinel-2 product of one level sensed on one day
 */
export function diasS2DayPrefix(level: 'L1C' | 'L2A', date: Date): string {
  return prefix(['Sentinel-2', 'MSI', level, ...diasDate(date)]);
}

// ============================================================================
// DEM Tiles
// ============================================================================

/**
 * Key of one DEM tile in a bucket family
 *
 * @param tileId - 1° cell (N43E001) or, for SRTM 3s, 5° cell (srtm_37_04)
 * @throws {InvalidKeyPatternError} when the family does not publish the kind
 *   or the id belongs to another tiling
 */
export function demTileKey(family: BucketFamily, dataKind: DataKind, tileId: string): string {
  const layout = `${family} ${dataKind}`;

  if (family === 'ewoc-aux' && dataKind === 'DemSRTM3s') {
    const tile = forLayout(layout, () => parseSrtm3sTile(tileId));
    return `srtm90/${formatSrtm3sTile(tile)}.zip`;
  }

  const tile = forLayout(layout, () => parseDemTile(tileId));

  if (family === 'ewoc-aux' && dataKind === 'DemSRTM1s') {
    return `srtm30/${formatDemTile(tile)}${SRTM1S_ARCHIVE_SUFFIX}`;
  }
  if (family === 'creodias' && dataKind === 'DemSRTM1s') {
    return `auxdata/SRTMGL1/dem/${formatDemTile(tile)}${SRTM1S_ARCHIVE_SUFFIX}`;
  }
  if (family === 'aws-cop-30' && dataKind === 'DemCOP1s') {
    return copernicusDemKey(tile, '1s');
  }
  if (family === 'aws-cop-90' && dataKind === 'DemCOP3s') {
    return copernicusDemKey(tile, '3s');
  }

  throw new InvalidKeyPatternError(layout, 'family does not publish this data kind');
}

// ============================================================================
// EWoC Archive
// ============================================================================

export type ArdCategory = 'OPTICAL' | 'SAR' | 'TIR';

/**
 * "31TCJ" gives "31/TC/J"
 */
export function ardTileComponent(tileId: string): string {
  const tile = forLayout('ewoc-ard', () => parseOpticalGridTile(tileId));
  return `${tile.id.slice(0, 2)}/${tile.band}${tile.column}/${tile.row}`;
}

export function ardTilePrefix(productionId: string, category: ArdCategory, tileId: string): string {
  if (productionId.trim() === '' || productionId.includes('/')) {
    throw new InvalidKeyPatternError('ewoc-ard', `production id "${productionId}" must be one path segment`);
  }
  return `${productionId}/${category}/${ardTileComponent(tileId)}/`;
}
