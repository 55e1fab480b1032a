/**
 * Product Identifier Parsing
 *
 * Sentinel-1 SAFE, Sentinel-2 SAFE and Landsat Collection 2 product names
 * encode the acquisition date, orbit and tile that bucket key layouts are
 * partitioned by. Parsers here extract those components; nothing else in the
 * gateway splits product names by hand.
 *
 * Examples:
 * - S1A_IW_GRDH_1SDV_20211004T054047_20211004T054112_039974_04BAEF_13C6
 * - S2B_MSIL1C_20210714T105619_N0301_R094_T31TCJ_20210714T131301
 * - LC08_L2SP_227099_20211017_20211026_02_T2
 */

import { InvalidProductIDError } from '../core/errors.js';
import type { ImageryDataKind } from '../core/types.js';

// ============================================================================
// Types
// ============================================================================

export interface Sentinel1ProductId {
  readonly id: string;
  readonly mission: 'S1A' | 'S1B';
  readonly beamMode: string;
  /** GRD, SLC, OCN or RAW */
  readonly productType: string;
  /** F, H, M or '_' */
  readonly resolution: string;
  readonly processingLevel: string;
  readonly productClass: string;
  /** SH, SV, DH or DV */
  readonly polarisation: string;
  readonly start: Date;
  readonly stop: Date;
  readonly absoluteOrbit: number;
  readonly datatakeId: string;
  readonly uniqueId: string;
}

export interface Sentinel2ProductId {
  readonly id: string;
  readonly mission: 'S2A' | 'S2B';
  readonly level: 'L1C' | 'L2A';
  readonly sensingTime: Date;
  readonly baseline: string;
  readonly relativeOrbit: number;
  /** Five-character grid tile, e.g. 31TCJ */
  readonly tileId: string;
  readonly discriminator: string;
}

export interface LandsatProductId {
  readonly id: string;
  readonly platform: 'LC08' | 'LC09';
  readonly processingLevel: string;
  readonly wrsPath: string;
  readonly wrsRow: string;
  readonly acquisitionDate: Date;
  readonly processingDate: Date;
  readonly collection: string;
  readonly category: string;
}

export type ParsedProductId =
  | { readonly dataKind: 'Sentinel1'; readonly product: Sentinel1ProductId }
  | { readonly dataKind: 'Sentinel2L1C' | 'Sentinel2L2A'; readonly product: Sentinel2ProductId }
  | { readonly dataKind: 'Landsat8'; readonly product: LandsatProductId };

// ============================================================================
// Helpers
// ============================================================================

const SAFE_SUFFIX = '.SAFE';

/**
 * Product id without the .SAFE directory suffix
 */
export function stripSafeSuffix(productId: string): string {
  return productId.endsWith(SAFE_SUFFIX) ? productId.slice(0, -SAFE_SUFFIX.length) : productId;
}

export function withSafeSuffix(productId: string): string {
  return `${stripSafeSuffix(productId)}${SAFE_SUFFIX}`;
}

const DATETIME_PATTERN = /^(\d{4})(\d{2})(\d{2})T(\d{2})(\d{2})(\d{2})$/;
const DATE_PATTERN = /^(\d{4})(\d{2})(\d{2})$/;

function utcDate(
  productId: string,
  field: string,
  parts: readonly number[]
): Date {
  const [year, month, day, hour = 0, minute = 0, second = 0] = parts;
  const date = new Date(Date.UTC(year, month - 1, day, hour, minute, second));
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day ||
    hour > 23 ||
    minute > 59 ||
    second > 59
  ) {
    throw new InvalidProductIDError(productId, `${field} is not a calendar date`);
  }
  return date;
}

function parseDateTime(productId: string, field: string, text: string): Date {
  const match = DATETIME_PATTERN.exec(text);
  if (!match) {
    throw new InvalidProductIDError(productId, `${field} "${text}" is not YYYYMMDDTHHMMSS`);
  }
  return utcDate(productId, field, match.slice(1).map(Number));
}

function parseDate(productId: string, field: string, text: string): Date {
  const match = DATE_PATTERN.exec(text);
  if (!match) {
    throw new InvalidProductIDError(productId, `${field} "${text}" is not YYYYMMDD`);
  }
  return utcDate(productId, field, match.slice(1).map(Number));
}

function fields(text: string, expected: number, family: string, productId = text): string[] {
  const parts = stripSafeSuffix(text).split('_');
  if (parts.length !== expected) {
    throw new InvalidProductIDError(
      productId,
      `${family} has ${expected} underscore-separated fields, got ${parts.length}`
    );
  }
  return parts;
}

// ============================================================================
// Sentinel-1
// ============================================================================

const S1_BEAM_MODES = new Set(['IW', 'EW', 'SM', 'WV', 'S1', 'S2', 'S3', 'S4', 'S5', 'S6']);
const S1_PRODUCT_TYPES = new Set(['GRD', 'SLC', 'OCN', 'RAW']);
const S1_POLARISATIONS = new Set(['SH', 'SV', 'DH', 'DV']);

/**
 * Mission, beam mode and the four-character type/resolution field. The
 * resolution is '_' for SLC and OCN products (S1A_IW_SLC__1SDV_...), so the
 * head cannot be split on underscores.
 */
const S1_HEAD_PATTERN = /^(S1[A-Z])_([A-Z0-9]{2})_([A-Z]{3}[A-Z_])_(.*)$/;

export function parseSentinel1ProductId(productId: string): Sentinel1ProductId {
  const head = S1_HEAD_PATTERN.exec(stripSafeSuffix(productId));
  if (!head) {
    throw new InvalidProductIDError(productId, 'expected S1x_<mode>_<type><res>_... naming');
  }
  const [, mission, beamMode, typeRes, rest] = head;
  const [levelClassPol, start, stop, orbit, datatake, uid] = fields(
    rest,
    6,
    'Sentinel-1 name after the product type',
    productId
  );

  if (mission !== 'S1A' && mission !== 'S1B') {
    throw new InvalidProductIDError(productId, `mission ${mission} is not S1A or S1B`);
  }
  if (!S1_BEAM_MODES.has(beamMode)) {
    throw new InvalidProductIDError(productId, `unknown beam mode ${beamMode}`);
  }
  const productType = typeRes.slice(0, 3);
  if (!S1_PRODUCT_TYPES.has(productType)) {
    throw new InvalidProductIDError(productId, `unknown product type ${typeRes}`);
  }
  const polarisation = levelClassPol.slice(2);
  if (levelClassPol.length !== 4 || !S1_POLARISATIONS.has(polarisation)) {
    throw new InvalidProductIDError(productId, `unknown polarisation in ${levelClassPol}`);
  }
  if (!/^\d{6}$/.test(orbit)) {
    throw new InvalidProductIDError(productId, `absolute orbit ${orbit} is not six digits`);
  }
  if (!/^[0-9A-F]{6}$/.test(datatake) || !/^[0-9A-F]{4}$/.test(uid)) {
    throw new InvalidProductIDError(productId, 'datatake / unique id are not hexadecimal');
  }

  return {
    id: stripSafeSuffix(productId),
    mission,
    beamMode,
    productType,
    resolution: typeRes.slice(3),
    processingLevel: levelClassPol.slice(0, 1),
    productClass: levelClassPol.slice(1, 2),
    polarisation,
    start: parseDateTime(productId, 'start time', start),
    stop: parseDateTime(productId, 'stop time', stop),
    absoluteOrbit: parseInt(orbit, 10),
    datatakeId: datatake,
    uniqueId: uid,
  };
}

// ============================================================================
// Sentinel-2
// ============================================================================

export function parseSentinel2ProductId(productId: string): Sentinel2ProductId {
  const [mission, level, sensing, baseline, orbit, tile, discriminator] = fields(
    productId,
    7,
    'Sentinel-2 id'
  );

  if (mission !== 'S2A' && mission !== 'S2B') {
    throw new InvalidProductIDError(productId, `mission ${mission} is not S2A or S2B`);
  }
  if (level !== 'MSIL1C' && level !== 'MSIL2A') {
    throw new InvalidProductIDError(productId, `product level ${level} is not MSIL1C or MSIL2A`);
  }
  if (!/^N\d{4}$/.test(baseline)) {
    throw new InvalidProductIDError(productId, `processing baseline ${baseline} is not Nxxxx`);
  }
  const orbitMatch = /^R(\d{3})$/.exec(orbit);
  const relativeOrbit = orbitMatch ? parseInt(orbitMatch[1], 10) : 0;
  if (relativeOrbit < 1 || relativeOrbit > 143) {
    throw new InvalidProductIDError(productId, `relative orbit ${orbit} outside R001-R143`);
  }
  if (!/^T\d{2}[C-X][A-Z]{2}$/.test(tile)) {
    throw new InvalidProductIDError(productId, `tile ${tile} is not T + five-character grid tile`);
  }
  if (!/^\d{8}T\d{6}$/.test(discriminator)) {
    throw new InvalidProductIDError(productId, `discriminator ${discriminator} is not a timestamp`);
  }

  return {
    id: stripSafeSuffix(productId),
    mission,
    level: level === 'MSIL1C' ? 'L1C' : 'L2A',
    sensingTime: parseDateTime(productId, 'sensing time', sensing),
    baseline,
    relativeOrbit,
    tileId: tile.slice(1),
    discriminator,
  };
}

// ============================================================================
// Landsat Collection 2
// ============================================================================

export function parseLandsatProductId(productId: string): LandsatProductId {
  const [platform, level, pathRow, acquired, processed, collection, category] = fields(
    productId,
    7,
    'Landsat id'
  );

  if (platform !== 'LC08' && platform !== 'LC09') {
    throw new InvalidProductIDError(productId, `platform ${platform} is not LC08 or LC09`);
  }
  if (!/^L[12][A-Z]{2}$/.test(level)) {
    throw new InvalidProductIDError(productId, `processing level ${level} is not L1xx/L2xx`);
  }
  if (!/^\d{6}$/.test(pathRow)) {
    throw new InvalidProductIDError(productId, `WRS-2 path/row ${pathRow} is not six digits`);
  }
  if (!/^\d{2}$/.test(collection) || !/^(T1|T2|RT)$/.test(category)) {
    throw new InvalidProductIDError(productId, `collection ${collection}_${category} not recognised`);
  }

  return {
    id: productId,
    platform,
    processingLevel: level,
    wrsPath: pathRow.slice(0, 3),
    wrsRow: pathRow.slice(3),
    acquisitionDate: parseDate(productId, 'acquisition date', acquired),
    processingDate: parseDate(productId, 'processing date', processed),
    collection,
    category,
  };
}

// ============================================================================
// Dispatch
// ============================================================================

/**
 * Parse any supported product id and infer its data kind from the grammar
 *
 * @throws {InvalidProductIDError} when no family matches
 */
export function parseProductId(productId: string): ParsedProductId {
  const id = stripSafeSuffix(productId.trim());
  if (id.startsWith('S1')) {
    return { dataKind: 'Sentinel1', product: parseSentinel1ProductId(id) };
  }
  if (id.startsWith('S2')) {
    const product = parseSentinel2ProductId(id);
    return { dataKind: product.level === 'L1C' ? 'Sentinel2L1C' : 'Sentinel2L2A', product };
  }
  if (id.startsWith('LC0')) {
    return { dataKind: 'Landsat8', product: parseLandsatProductId(id) };
  }
  throw new InvalidProductIDError(productId, 'not a Sentinel-1, Sentinel-2 or Landsat product name');
}

export function detectDataKind(productId: string): ImageryDataKind {
  return parseProductId(productId).dataKind;
}
