/**
 * Sentinel-2 / MGRS Grid Tiles
 *
 * Parses 100 km MGRS square identifiers ("31TCJ") and projects their extent
 * to WGS 84.
 *
 * GEOMETRY:
 * - The Sentinel-2 tile's lower-left corner is the SW corner of the MGRS
 *   100 km square; the tile extends 109 800 m east and north (overlap with
 *   neighbours included).
 * - Easting of the square: (column index within the zone's letter set + 1) * 100 km.
 * - Northing: row letter index (offset by 5 in even zones) * 100 km, lifted by
 *   2000 km cycles until it reaches the latitude band's minimum northing.
 * - Bands C..M lie in the southern hemisphere (+south false northing).
 */

import proj4 from 'proj4';
import type { Position } from 'geojson';
import { InvalidTileIDError } from '../core/errors.js';

// ============================================================================
// Types
// ============================================================================

export interface OpticalGridTile {
  /** Canonical id, zone zero-padded to two digits */
  readonly id: string;
  readonly zone: number;
  readonly band: string;
  readonly column: string;
  readonly row: string;
}

/**
 * UTM-projected lower-left corner of a tile
 */
export interface UtmOrigin {
  readonly zone: number;
  readonly south: boolean;
  readonly easting: number;
  readonly northing: number;
}

// ============================================================================
// Constants
// ============================================================================

export const S2_TILE_EXTENT_M = 109_800;

const SQUARE_SIZE_M = 100_000;
const ROW_CYCLE_M = 2_000_000;

const BANDS = 'CDEFGHJKLMNPQRSTUVWX';
const ROW_LETTERS = 'ABCDEFGHJKLMNPQRSTUV';
const COLUMN_SETS = ['STUVWXYZ', 'ABCDEFGH', 'JKLMNPQR'] as const;

/**
 * Minimum UTM northing (metres) reached inside each latitude band
 */
const BAND_MIN_NORTHING: Readonly<Record<string, number>> = {
  C: 1_100_000,
  D: 2_000_000,
  E: 2_800_000,
  F: 3_700_000,
  G: 4_600_000,
  H: 5_500_000,
  J: 6_400_000,
  K: 7_300_000,
  L: 8_200_000,
  M: 9_100_000,
  N: 0,
  P: 800_000,
  Q: 1_700_000,
  R: 2_600_000,
  S: 3_500_000,
  T: 4_400_000,
  U: 5_300_000,
  V: 6_200_000,
  W: 7_000_000,
  X: 7_900_000,
};

const TILE_PATTERN = /^(\d{1,2})([A-Z])([A-Z])([A-Z])$/;

const WGS84 = 'EPSG:4326';

/** Points per tile edge when projecting the outline */
const EDGE_SEGMENTS = 20;

// ============================================================================
// Parsing
// ============================================================================

function columnSetFor(zone: number): string {
  return COLUMN_SETS[zone % 3];
}

/**
 * Parse an MGRS 100 km square identifier
 *
 * @throws {InvalidTileIDError} when the grammar or the lattice letters do not match
 */
export function parseOpticalGridTile(tileId: string): OpticalGridTile {
  const match = TILE_PATTERN.exec(tileId.trim().toUpperCase());
  if (!match) {
    throw new InvalidTileIDError(tileId, 'expected <zone 1-60><band><column><row>, e.g. 31TCJ');
  }

  const [, zoneText, band, column, row] = match;
  const zone = parseInt(zoneText, 10);

  if (zone < 1 || zone > 60) {
    throw new InvalidTileIDError(tileId, `UTM zone ${zone} outside 1-60`);
  }
  if (!BANDS.includes(band)) {
    throw new InvalidTileIDError(tileId, `latitude band ${band} outside C-X`);
  }
  if (!columnSetFor(zone).includes(column)) {
    throw new InvalidTileIDError(
      tileId,
      `column ${column} not in zone ${zone} set ${columnSetFor(zone)}`
    );
  }
  if (!ROW_LETTERS.includes(row)) {
    throw new InvalidTileIDError(tileId, `row ${row} outside A-V (I and O excluded)`);
  }

  return {
    id: `${String(zone).padStart(2, '0')}${band}${column}${row}`,
    zone,
    band,
    column,
    row,
  };
}

/**
 * Split a canonical tile id into the path components bucket layouts use:
 * "31TCJ" gives { zone: "31", band: "T", square: "CJ" }
 */
export function splitTileId(tile: OpticalGridTile): {
  readonly zone: string;
  readonly band: string;
  readonly square: string;
} {
  return {
    zone: String(tile.zone),
    band: tile.band,
    square: `${tile.column}${tile.row}`,
  };
}

// ============================================================================
// Projection
// ============================================================================

export function utmOrigin(tile: OpticalGridTile): UtmOrigin {
  const easting = (columnSetFor(tile.zone).indexOf(tile.column) + 1) * SQUARE_SIZE_M;

  const offset = tile.zone % 2 === 0 ? 5 : 0;
  const rowIndex = (ROW_LETTERS.indexOf(tile.row) - offset + ROW_LETTERS.length) % ROW_LETTERS.length;
  let northing = rowIndex * SQUARE_SIZE_M;

  const minNorthing = BAND_MIN_NORTHING[tile.band];
  while (northing < minNorthing) {
    northing += ROW_CYCLE_M;
  }

  return {
    zone: tile.zone,
    south: tile.band < 'N',
    easting,
    northing,
  };
}

function utmDefinition(zone: number, south: boolean): string {
  return `+proj=utm +zone=${zone}${south ? ' +south' : ''} +datum=WGS84 +units=m +no_defs`;
}

/**
 * Tile outline in WGS 84, densified along every edge so the curvature of the
 * projected edges is captured
 */
export function tileOutline(tile: OpticalGridTile): Position[] {
  const origin = utmOrigin(tile);
  const definition = utmDefinition(origin.zone, origin.south);
  const x0 = origin.easting;
  const y0 = origin.northing;
  const size = S2_TILE_EXTENT_M;

  const ring: Array<[number, number]> = [];
  for (let i = 0; i < EDGE_SEGMENTS; i++) ring.push([x0 + (size * i) / EDGE_SEGMENTS, y0]);
  for (let i = 0; i < EDGE_SEGMENTS; i++) ring.push([x0 + size, y0 + (size * i) / EDGE_SEGMENTS]);
  for (let i = 0; i < EDGE_SEGMENTS; i++) ring.push([x0 + size - (size * i) / EDGE_SEGMENTS, y0 + size]);
  for (let i = 0; i < EDGE_SEGMENTS; i++) ring.push([x0, y0 + size - (size * i) / EDGE_SEGMENTS]);

  return ring.map(([x, y]) => {
    const [lon, lat] = proj4(definition, WGS84, [x, y]);
    return [lon, lat];
  });
}
