/**
 * Spatial Tile Resolver
 *
 * Maps optical grid tiles to geographic footprints and footprints to the DEM
 * cells that cover them. Pure functions: no I/O, no shared state.
 *
 * COVERAGE RULE:
 * A cell is included when it intersects the footprint's bounding box,
 * boundaries included. Rows run floor(south)..floor(north) and columns
 * floor(west)..floor(east), so a tile spanning lat 37.98-38.02 yields both the
 * N37 and N38 rows, and a footprint ending exactly on a degree line also picks
 * up the cell beyond that line.
 *
 * USAGE:
 * ```typescript
 * const footprint = resolveFootprint('30SXH');
 * const ids = coveringDemTiles(footprint).map((t) => formatDemTile(t));
 * // ['N38W002', 'N38W001', 'N37W002', 'N37W001']
 * ```
 */

import { bboxPolygon } from '@turf/turf';
import type { BBox } from 'geojson';
import { EmptyFootprintError } from '../core/errors.js';
import type { DemDataKind, Footprint } from '../core/types.js';
import {
  demTile,
  formatDemTile,
  formatSrtm3sTile,
  parseDemTile,
  parseSrtm3sTile,
  srtm3sTileAt,
  type DemTile,
  type Srtm3sTile,
} from './dem-tiles.js';
import { parseOpticalGridTile, tileOutline, type OpticalGridTile } from './mgrs.js';

// ============================================================================
// Footprints
// ============================================================================

/**
 * Build an immutable footprint from a [west, south, east, north] box.
 * A box with west > east is read as crossing the antimeridian.
 */
export function footprintFromBBox(bbox: Readonly<BBox>): Footprint {
  const [west, south, east, north] = bbox;
  const crossesAntimeridian = west > east;
  const polygon = bboxPolygon([west, south, crossesAntimeridian ? east + 360 : east, north]).geometry;
  const box: BBox = [west, south, east, north];

  return Object.freeze({
    polygon,
    bbox: Object.freeze(box),
    crossesAntimeridian,
  });
}

/**
 * Geographic extent of an optical grid tile
 *
 * @throws {InvalidTileIDError} when a string id does not parse
 */
export function resolveFootprint(tile: OpticalGridTile | string): Footprint {
  const parsed = typeof tile === 'string' ? parseOpticalGridTile(tile) : tile;
  const outline = tileOutline(parsed);

  const lons = outline.map(([lon]) => lon);
  const lats = outline.map(([, lat]) => lat);
  const south = Math.min(...lats);
  const north = Math.max(...lats);

  let west = Math.min(...lons);
  let east = Math.max(...lons);

  // Projected longitudes are wrapped to [-180, 180]; a span over 180° means
  // the tile straddles the antimeridian.
  if (east - west > 180) {
    const shifted = lons.map((lon) => (lon < 0 ? lon + 360 : lon));
    west = Math.min(...shifted);
    east = Math.max(...shifted) - 360;
  }

  return footprintFromBBox([west, south, east, north]);
}

function footprintSpan(footprint: Footprint): { readonly width: number; readonly height: number } {
  const [west, south, east, north] = footprint.bbox;
  const width = footprint.crossesAntimeridian ? east + 360 - west : east - west;
  return { width, height: north - south };
}

/**
 * @throws {EmptyFootprintError} when the footprint has zero width or height
 */
export function assertNonEmptyFootprint(footprint: Footprint): void {
  const { width, height } = footprintSpan(footprint);
  if (!(Number.isFinite(width) && Number.isFinite(height) && width > 0 && height > 0)) {
    throw new EmptyFootprintError([...footprint.bbox]);
  }
}

// ============================================================================
// Covering Cells
// ============================================================================

function range(from: number, to: number): number[] {
  const values: number[] = [];
  for (let v = from; v <= to; v++) values.push(v);
  return values;
}

function cellColumns(footprint: Footprint): number[] {
  const [west, , east] = footprint.bbox;
  if (footprint.crossesAntimeridian) {
    return [...range(Math.floor(west), 179), ...range(-180, Math.min(Math.floor(east), 179))];
  }
  return range(Math.max(Math.floor(west), -180), Math.min(Math.floor(east), 179));
}

/**
 * Every 1°×1° cell touching the footprint, north to south then west to east
 *
 * @throws {EmptyFootprintError} when the footprint has zero width or height
 */
export function coveringDemTiles(footprint: Footprint): DemTile[] {
  assertNonEmptyFootprint(footprint);

  const [, south, , north] = footprint.bbox;
  const rows = range(Math.max(Math.floor(south), -90), Math.min(Math.floor(north), 89)).reverse();
  const columns = cellColumns(footprint);

  const tiles: DemTile[] = [];
  const seen = new Set<string>();
  for (const latitude of rows) {
    for (const longitude of columns) {
      const tile = demTile(latitude, longitude);
      const id = formatDemTile(tile);
      if (!seen.has(id)) {
        seen.add(id);
        tiles.push(tile);
      }
    }
  }
  return tiles;
}

/**
 * Every 5°×5° SRTM 3s cell touching the footprint
 *
 * @throws {EmptyFootprintError} when the footprint has zero width or height
 */
export function coveringSrtm3sTiles(footprint: Footprint): Srtm3sTile[] {
  assertNonEmptyFootprint(footprint);

  const [west, south, east, north] = footprint.bbox;
  const firstRow = srtm3sTileAt(north, west).row;
  const lastRow = srtm3sTileAt(south, west).row;

  const columnIds = footprint.crossesAntimeridian
    ? [...range(srtm3sTileAt(south, west).column, 72), ...range(1, srtm3sTileAt(south, east).column)]
    : range(srtm3sTileAt(south, west).column, Math.min(srtm3sTileAt(south, east).column, 72));

  const tiles: Srtm3sTile[] = [];
  for (let row = firstRow; row <= lastRow; row++) {
    for (const column of columnIds) {
      tiles.push(Object.freeze({ column, row }));
    }
  }
  return tiles;
}

// ============================================================================
// Convenience
// ============================================================================

/**
 * DEM cell ids covering an optical grid tile
 */
export function demTileIdsForGridTile(tileId: string, withSuffix = false): string[] {
  return coveringDemTiles(resolveFootprint(tileId)).map((tile) => formatDemTile(tile, withSuffix));
}

/**
 * SRTM 3s cell ids covering an optical grid tile
 */
export function srtm3sTileIdsForGridTile(tileId: string): string[] {
  return coveringSrtm3sTiles(resolveFootprint(tileId)).map(formatSrtm3sTile);
}

/**
 * DEM cell ids a DEM request designates, in the tiling of its data kind.
 *
 * `tileId` is either an optical grid tile (31TCJ), expanded to every cell
 * covering it, or a single cell id of the kind's own tiling (N43E001 or
 * srtm_37_04).
 *
 * @throws {InvalidTileIDError} when the id parses as neither
 */
export function demTileIdsFor(dataKind: DemDataKind, tileId: string): string[] {
  const id = tileId.trim();
  if (/^\d/.test(id)) {
    return demTileIdsForFootprint(dataKind, resolveFootprint(id));
  }
  if (dataKind === 'DemSRTM3s') {
    return [formatSrtm3sTile(parseSrtm3sTile(id))];
  }
  return [formatDemTile(parseDemTile(id))];
}

/**
 * DEM cell ids covering a footprint, in the tiling of the data kind
 */
export function demTileIdsForFootprint(dataKind: DemDataKind, footprint: Footprint): string[] {
  if (dataKind === 'DemSRTM3s') {
    return coveringSrtm3sTiles(footprint).map(formatSrtm3sTile);
  }
  return coveringDemTiles(footprint).map((tile) => formatDemTile(tile));
}
