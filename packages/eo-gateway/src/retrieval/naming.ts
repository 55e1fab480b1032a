/**
 * Canonical Product Naming
 *
 * The final directory of a retrieval depends only on the request, never on
 * the provider that served it:
 *
 * | Locator                      | Directory                                |
 * |------------------------------|------------------------------------------|
 * | product                      | S2B_MSIL1C_20210714T105619_..._131301    |
 * | tile, DEM kind               | DemSRTM1s_31TCJ                          |
 * | tile + date range, imagery   | Sentinel2L2A_31TCJ_20210701_20210731     |
 * | tile, imagery, no range      | Sentinel1_31TCJ                          |
 * | footprint + date range       | Landsat8_20210701_20210731               |
 */

import { isDemDataKind, type DataRequest, type DateRange } from '../core/types.js';
import { compactDate } from '../core/utils/date-range.js';
import { stripSafeSuffix } from '../products/product-id.js';
import { parseOpticalGridTile } from '../tiles/mgrs.js';

/**
 * Grid tiles in canonical form (1CCV gives 01CCV); DEM cell ids unchanged
 */
export function canonicalTileId(tileId: string): string {
  const id = tileId.trim();
  return /^\d/.test(id) ? parseOpticalGridTile(id).id : id;
}

function rangeSuffix(range: DateRange): string {
  return `${compactDate(range.start)}_${compactDate(range.end)}`;
}

export function canonicalName(request: Pick<DataRequest, 'dataKind' | 'locator'>): string {
  const { dataKind, locator } = request;

  switch (locator.type) {
    case 'product':
      return stripSafeSuffix(locator.productId.trim());
    case 'tile': {
      const base = `${dataKind}_${canonicalTileId(locator.tileId)}`;
      if (isDemDataKind(dataKind) || !locator.dateRange) return base;
      return `${base}_${rangeSuffix(locator.dateRange)}`;
    }
    case 'footprint':
      return `${dataKind}_${rangeSuffix(locator.dateRange)}`;
  }
}
