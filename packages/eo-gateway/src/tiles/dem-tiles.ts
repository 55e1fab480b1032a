/**
 * DEM Tile Identifiers
 *
 * Two auxiliary-data tilings are addressed by the gateway:
 * - 1°×1° cells ("N38W001"), used by SRTM 1s and Copernicus DEM. A cell is
 *   named after its lower-left corner.
 * - 5°×5° CGIAR cells ("srtm_37_04"), used by SRTM 3s.
 *
 * TYPE SAFETY: DemTile holds signed integer degrees; the textual form is only
 * produced by formatDemTile so every rendered id round-trips through parseDemTile.
 */

import { InvalidTileIDError } from '../core/errors.js';

// ============================================================================
// 1° Cells
// ============================================================================

export interface DemTile {
  /** Latitude of the lower-left corner, -90..89 */
  readonly latitude: number;
  /** Longitude of the lower-left corner, -180..179 */
  readonly longitude: number;
}

/**
 * Archive suffix of SRTM 1s distribution files
 */
export const SRTM1S_ARCHIVE_SUFFIX = '.SRTMGL1.hgt.zip';

const DEM_TILE_PATTERN = /^([NS])(\d{2})([EW])(\d{3})$/;

export function demTile(latitude: number, longitude: number): DemTile {
  return Object.freeze({ latitude, longitude });
}

/**
 * Render a 1° cell: hemisphere by sign, magnitude zero-padded
 *
 * @param withSuffix - append the SRTM 1s archive suffix
 */
export function formatDemTile(tile: DemTile, withSuffix = false): string {
  const ns = tile.latitude >= 0 ? 'N' : 'S';
  const ew = tile.longitude >= 0 ? 'E' : 'W';
  const lat = String(Math.abs(tile.latitude)).padStart(2, '0');
  const lon = String(Math.abs(tile.longitude)).padStart(3, '0');
  const id = `${ns}${lat}${ew}${lon}`;
  return withSuffix ? `${id}${SRTM1S_ARCHIVE_SUFFIX}` : id;
}

/**
 * Parse a 1° cell id, with or without the archive suffix
 *
 * @throws {InvalidTileIDError} on grammar errors, magnitudes beyond 90/180,
 *   cells reaching past the poles or the antimeridian, and the non-canonical
 *   zero forms S00 / W000
 */
export function parseDemTile(text: string): DemTile {
  const id = text.endsWith(SRTM1S_ARCHIVE_SUFFIX)
    ? text.slice(0, -SRTM1S_ARCHIVE_SUFFIX.length)
    : text;

  const match = DEM_TILE_PATTERN.exec(id);
  if (!match) {
    throw new InvalidTileIDError(text, 'expected N|S + 2 digits + E|W + 3 digits, e.g. N38W001');
  }

  const [, ns, latText, ew, lonText] = match;
  const latMagnitude = parseInt(latText, 10);
  const lonMagnitude = parseInt(lonText, 10);

  if (latMagnitude > 90) {
    throw new InvalidTileIDError(text, `latitude magnitude ${latMagnitude} exceeds 90`);
  }
  if (lonMagnitude > 180) {
    throw new InvalidTileIDError(text, `longitude magnitude ${lonMagnitude} exceeds 180`);
  }
  if (ns === 'N' && latMagnitude === 90) {
    throw new InvalidTileIDError(text, 'cell N90 lies beyond the north pole');
  }
  if (ew === 'E' && lonMagnitude === 180) {
    throw new InvalidTileIDError(text, 'cell E180 lies beyond the antimeridian');
  }
  if (ns === 'S' && latMagnitude === 0) {
    throw new InvalidTileIDError(text, 'S00 is written N00');
  }
  if (ew === 'W' && lonMagnitude === 0) {
    throw new InvalidTileIDError(text, 'W000 is written E000');
  }

  return demTile(ns === 'N' ? latMagnitude : -latMagnitude, ew === 'E' ? lonMagnitude : -lonMagnitude);
}

// ============================================================================
// 5° SRTM 3s Cells
// ============================================================================

export interface Srtm3sTile {
  /** 1-based column counted eastward from 180°W */
  readonly column: number;
  /** 1-based row counted southward from 60°N (0 north of 60°N) */
  readonly row: number;
}

const SRTM3S_PATTERN = /^srtm_(\d{2})_(\d{2})$/;

export function srtm3sTileAt(latitude: number, longitude: number): Srtm3sTile {
  return Object.freeze({
    column: Math.floor((longitude + 180) / 5) + 1,
    row: Math.floor((60 - latitude) / 5) + 1,
  });
}

export function formatSrtm3sTile(tile: Srtm3sTile): string {
  return `srtm_${String(tile.column).padStart(2, '0')}_${String(tile.row).padStart(2, '0')}`;
}

/**
 * @throws {InvalidTileIDError} unless the id is srtm_XX_YY with XX in 1..72 and YY in 0..24
 */
export function parseSrtm3sTile(text: string): Srtm3sTile {
  const match = SRTM3S_PATTERN.exec(text);
  if (!match) {
    throw new InvalidTileIDError(text, 'expected srtm_XX_YY, e.g. srtm_37_04');
  }
  const column = parseInt(match[1], 10);
  const row = parseInt(match[2], 10);
  if (column < 1 || column > 72) {
    throw new InvalidTileIDError(text, `column ${column} outside 1-72`);
  }
  if (row > 24) {
    throw new InvalidTileIDError(text, `row ${row} outside 0-24`);
  }
  return Object.freeze({ column, row });
}
