/**
 * Search-and-Download Service Interface
 *
 * The federated provider sees the search service only through this
 * capability: find items by product id, grid tile, footprint and date range,
 * and download an item's assets into a directory. The query language of the
 * service itself stays behind the implementation.
 */

import type { BBox } from 'geojson';
import type { DateRange, ImageryDataKind } from '../core/types.js';

export interface SearchQuery {
  readonly dataKind: ImageryDataKind;
  /** Exact product name (SAFE suffix optional) */
  readonly productId?: string;
  /** Sentinel-2 grid tile, e.g. 31TCJ */
  readonly tileId?: string;
  readonly bbox?: Readonly<BBox>;
  readonly dateRange?: DateRange;
  /** Upper bound on returned items */
  readonly limit?: number;
}

export interface SearchAsset {
  readonly key: string;
  readonly href: string;
  readonly roles: readonly string[];
}

export interface SearchItem {
  readonly id: string;
  readonly collection: string;
  readonly datetime: Date | null;
  readonly assets: readonly SearchAsset[];
}

export interface ServiceCallOptions {
  readonly signal?: AbortSignal;
}

export interface SearchDownloadService {
  /**
   * Items matching every given criterion, oldest first
   */
  search(query: SearchQuery, options?: ServiceCallOptions): Promise<SearchItem[]>;

  /**
   * Download the data assets of an item into a directory
   *
   * @returns Paths of the written files
   */
  download(item: SearchItem, destDir: string, options?: ServiceCallOptions): Promise<string[]>;
}
