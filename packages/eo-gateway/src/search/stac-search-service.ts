/**
 * STAC Search-and-Download Service
 *
 * SearchDownloadService over a STAC API (item search with POST /search and
 * asset download over HTTP). The default endpoint is Earth Search, which
 * indexes Sentinel-1 GRD, Sentinel-2 L1C/L2A and Landsat Collection 2 L2.
 *
 * QUERY MAPPING:
 * - dataKind  -> collections
 * - productId -> ids, or the s2:product_uri property for Sentinel-2
 * - tileId    -> mgrs:utm_zone / mgrs:latitude_band / mgrs:grid_square
 * - bbox      -> bbox
 * - dateRange -> datetime interval covering both end days
 *
 * Result pages are followed through their "next" links until the limit.
 * The bearer token only goes to URLs on the API's own origin; assets and
 * pages hosted elsewhere are requested without it.
 */

import { join, posix } from 'node:path';
import { z } from 'zod';
import { ObjectNotFoundError } from '../core/errors.js';
import { HTTPClient, type FetchOptions } from '../core/http-client.js';
import { classifyHttpError } from '../core/http-errors.js';
import type { DateRange, ImageryDataKind } from '../core/types.js';
import { createLogger, type Logger } from '../core/utils/logger.js';
import { parseLandsatProductId, stripSafeSuffix, withSafeSuffix } from '../products/product-id.js';
import { parseOpticalGridTile } from '../tiles/mgrs.js';
import type {
  SearchAsset,
  SearchDownloadService,
  SearchItem,
  SearchQuery,
  ServiceCallOptions,
} from './search-service.js';

// ============================================================================
// Constants
// ============================================================================

export const STAC_COLLECTIONS: Readonly<Record<ImageryDataKind, string>> = {
  Sentinel1: 'sentinel-1-grd',
  Sentinel2L1C: 'sentinel-2-l1c',
  Sentinel2L2A: 'sentinel-2-l2a',
  Landsat8: 'landsat-c2-l2',
};

const DEFAULT_LIMIT = 100;
const PAGE_SIZE = 50;

// ============================================================================
// Response Schema
// ============================================================================

const linkSchema = z.object({
  rel: z.string(),
  href: z.string(),
  method: z.string().optional(),
  body: z.record(z.string(), z.unknown()).optional(),
});

const itemSchema = z.object({
  id: z.string(),
  collection: z.string().optional(),
  properties: z
    .object({
      datetime: z.string().nullable().optional(),
    })
    .passthrough(),
  assets: z.record(
    z.string(),
    z.object({
      href: z.string(),
      roles: z.array(z.string()).optional(),
    })
  ),
});

const itemCollectionSchema = z.object({
  features: z.array(itemSchema),
  links: z.array(linkSchema).optional(),
});

type StacItem = z.infer<typeof itemSchema>;
type StacLink = z.infer<typeof linkSchema>;

// ============================================================================
// Query Building
// ============================================================================

function isoDay(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/**
 * STAC datetime interval covering every instant of both end days
 */
export function datetimeInterval(range: DateRange): string {
  return `${isoDay(range.start)}T00:00:00Z/${isoDay(range.end)}T23:59:59Z`;
}

/**
 * STAC item id of a product on Earth Search
 *
 * Landsat items drop the processing date from the product name.
 */
export function stacItemId(dataKind: ImageryDataKind, productId: string): string {
  const id = stripSafeSuffix(productId);
  if (dataKind !== 'Landsat8') return id;
  const product = parseLandsatProductId(id);
  return [
    product.platform,
    product.processingLevel,
    `${product.wrsPath}${product.wrsRow}`,
    id.split('_')[3],
    product.collection,
    product.category,
  ].join('_');
}

export function buildSearchBody(query: SearchQuery): Record<string, unknown> {
  const body: Record<string, unknown> = {
    collections: [STAC_COLLECTIONS[query.dataKind]],
    limit: Math.min(query.limit ?? DEFAULT_LIMIT, PAGE_SIZE),
  };
  const filters: Record<string, unknown> = {};

  if (query.productId !== undefined) {
    if (query.dataKind === 'Sentinel2L1C' || query.dataKind === 'Sentinel2L2A') {
      filters['s2:product_uri'] = { eq: withSafeSuffix(query.productId) };
    } else {
      body.ids = [stacItemId(query.dataKind, query.productId)];
    }
  }
  if (query.tileId !== undefined) {
    const tile = parseOpticalGridTile(query.tileId);
    filters['mgrs:utm_zone'] = { eq: tile.zone };
    filters['mgrs:latitude_band'] = { eq: tile.band };
    filters['mgrs:grid_square'] = { eq: `${tile.column}${tile.row}` };
  }
  if (query.bbox !== undefined) {
    body.bbox = [...query.bbox];
  }
  if (query.dateRange !== undefined) {
    body.datetime = datetimeInterval(query.dateRange);
  }
  if (Object.keys(filters).length > 0) {
    body.query = filters;
  }
  return body;
}

function originOf(url: string): string | null {
  return URL.canParse(url) ? new URL(url).origin : null;
}

function toSearchItem(item: StacItem): SearchItem {
  const assets: SearchAsset[] = Object.entries(item.assets).map(([key, asset]) => ({
    key,
    href: asset.href,
    roles: asset.roles ?? [],
  }));
  const datetime = item.properties.datetime ? new Date(item.properties.datetime) : null;
  return {
    id: item.id,
    collection: item.collection ?? '',
    datetime: datetime && !Number.isNaN(datetime.getTime()) ? datetime : null,
    assets,
  };
}

/**
 * Assets worth downloading: data-role assets reachable over HTTP
 */
export function downloadableAssets(item: SearchItem): SearchAsset[] {
  return item.assets.filter(
    (asset) =>
      /^https?:\/\//.test(asset.href) && (asset.roles.length === 0 || asset.roles.includes('data'))
  );
}

// ============================================================================
// Service
// ============================================================================

export interface StacSearchServiceOptions {
  /** API root, e.g. https://earth-search.aws.element84.com/v1 */
  readonly baseUrl: string;
  /** Sent as a bearer token to the API origin when set */
  readonly token?: string;
  readonly http?: HTTPClient;
  readonly logger?: Logger;
}

export class StacSearchService implements SearchDownloadService {
  private readonly baseUrl: string;
  private readonly origin: string | null;
  private readonly token?: string;
  private readonly http: HTTPClient;
  private readonly log: Logger;

  constructor(options: StacSearchServiceOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.origin = originOf(this.baseUrl);
    this.token = options.token;
    this.http = options.http ?? new HTTPClient();
    this.log = options.logger ?? createLogger({ module: 'stac' });
  }

  private headers(url: string, json: boolean): Record<string, string> {
    const headers: Record<string, string> = {};
    if (json) headers['Content-Type'] = 'application/json';
    if (this.token && this.origin !== null && originOf(url) === this.origin) {
      headers.Authorization = `Bearer ${this.token}`;
    }
    return headers;
  }

  async search(query: SearchQuery, options?: ServiceCallOptions): Promise<SearchItem[]> {
    const limit = query.limit ?? DEFAULT_LIMIT;
    const items: SearchItem[] = [];

    let url = `${this.baseUrl}/search`;
    let request: FetchOptions = {
      method: 'POST',
      body: JSON.stringify(buildSearchBody(query)),
      headers: this.headers(url, true),
      signal: options?.signal,
    };

    for (;;) {
      let page: z.infer<typeof itemCollectionSchema>;
      try {
        page = await this.http.fetchJSON(url, itemCollectionSchema, request);
      } catch (error) {
        throw classifyHttpError(error, this.baseUrl, 'search');
      }

      items.push(...page.features.map(toSearchItem));
      const next = (page.links ?? []).find((link: StacLink) => link.rel === 'next');
      if (items.length >= limit || page.features.length === 0 || !next) break;

      url = next.href;
      request =
        next.method === 'POST'
          ? {
              method: 'POST',
              body: JSON.stringify(next.body ?? {}),
              headers: this.headers(url, true),
              signal: options?.signal,
            }
          : { method: 'GET', headers: this.headers(url, false), signal: options?.signal };
    }

    this.log.debug('Search complete', { collection: STAC_COLLECTIONS[query.dataKind], items: items.length });

    return items
      .slice(0, limit)
      .sort((a, b) => (a.datetime?.getTime() ?? 0) - (b.datetime?.getTime() ?? 0));
  }

  async download(item: SearchItem, destDir: string, options?: ServiceCallOptions): Promise<string[]> {
    const assets = downloadableAssets(item);
    if (assets.length === 0) {
      throw new ObjectNotFoundError(this.baseUrl, `${item.id} (no downloadable assets)`);
    }

    const written: string[] = [];
    const used = new Set<string>();
    for (const asset of assets) {
      let fileName = posix.basename(new URL(asset.href).pathname) || asset.key;
      if (used.has(fileName)) fileName = `${asset.key}_${fileName}`;
      used.add(fileName);

      const target = join(destDir, fileName);
      try {
        await this.http.downloadToFile(asset.href, target, {
          headers: this.headers(asset.href, false),
          signal: options?.signal,
        });
      } catch (error) {
        throw classifyHttpError(error, this.baseUrl, `${item.id}/${asset.key}`);
      }
      written.push(target);
    }
    return written;
  }
}
