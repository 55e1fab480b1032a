/**
 * Search-Service-Backed Provider (federated)
 *
 * Resolves a request into a search query, then downloads the matching items.
 * A product locator takes the first match; tile and footprint locators take
 * every item of the date range, each into its own sub-directory.
 */

import { join } from 'node:path';
import { ObjectNotFoundError, UnsupportedDataKindError } from '../core/errors.js';
import {
  isDemDataKind,
  type DataRequest,
  type ImageryDataKind,
  type ProviderDescriptor,
} from '../core/types.js';
import type { SearchDownloadService, SearchQuery } from '../search/search-service.js';
import { resolveFootprint } from '../tiles/tile-resolver.js';
import type { AttemptContext, RetrievalProvider } from './types.js';

/**
 * Kinds the search service indexes by grid tile; the rest are searched by
 * the tile's footprint
 */
const GRID_INDEXED: ReadonlySet<ImageryDataKind> = new Set(['Sentinel2L1C', 'Sentinel2L2A']);

export class SearchServiceBackedProvider implements RetrievalProvider {
  readonly descriptor: ProviderDescriptor;
  private readonly service: SearchDownloadService;

  constructor(descriptor: ProviderDescriptor, service: SearchDownloadService) {
    this.descriptor = descriptor;
    this.service = service;
  }

  async fetch(request: DataRequest, context: AttemptContext): Promise<void> {
    const { dataKind, locator } = request;
    if (isDemDataKind(dataKind)) {
      throw new UnsupportedDataKindError(this.descriptor.name, dataKind);
    }

    let query: SearchQuery;
    switch (locator.type) {
      case 'product':
        return this.fetchById(locator.productId, dataKind, context);
      case 'tile':
        if (!locator.dateRange) {
          throw new UnsupportedDataKindError(this.descriptor.name, dataKind, 'tile search needs a date range');
        }
        query = GRID_INDEXED.has(dataKind)
          ? { dataKind, tileId: locator.tileId, dateRange: locator.dateRange }
          : { dataKind, bbox: resolveFootprint(locator.tileId).bbox, dateRange: locator.dateRange };
        break;
      case 'footprint':
        query = { dataKind, bbox: locator.footprint.bbox, dateRange: locator.dateRange };
        break;
    }

    const items = await this.service.search(query, { signal: context.signal });
    if (items.length === 0) {
      throw new ObjectNotFoundError(this.descriptor.name, `no ${dataKind} item matches the query`);
    }

    for (const item of items) {
      await this.service.download(item, join(context.stagingDir, item.id), { signal: context.signal });
    }
    context.logger.info('Search items downloaded', { dataKind, items: items.length });
  }

  async fetchById(productId: string, dataKind: ImageryDataKind, context: AttemptContext): Promise<void> {
    const items = await this.service.search({ dataKind, productId, limit: 1 }, { signal: context.signal });
    const item = items[0];
    if (!item) {
      throw new ObjectNotFoundError(this.descriptor.name, productId);
    }

    const files = await this.service.download(item, context.stagingDir, { signal: context.signal });
    context.logger.info('Product downloaded', { productId, item: item.id, files: files.length });
  }
}
