/**
 * Bucket-Backed Provider
 *
 * Serves the ewoc, aws and creodias providers from their object-storage
 * buckets through the BucketAccessAdapter.
 *
 * RETRIEVAL MODES:
 * - Product id: the product's prefix is built deterministically and every
 *   object below it is copied.
 * - DEM tile: the covering cells are fetched by deterministic key. Cells
 *   absent from the bucket (open ocean) are skipped as long as at least one
 *   cell was retrieved.
 * - Imagery tile + date range: the bucket is listed day by day (or month by
 *   month for the COG layout) and every matching product prefix is copied
 *   into its own sub-directory.
 */

import { join } from 'node:path';
import { ObjectNotFoundError, UnsupportedDataKindError } from '../core/errors.js';
import {
  isDemDataKind,
  type DataRequest,
  type DateRange,
  type DemDataKind,
  type ImageryDataKind,
  type Locator,
  type ProviderDescriptor,
} from '../core/types.js';
import { compactDate, eachUtcDay, eachUtcMonth, isWithinRange } from '../core/utils/date-range.js';
import type { BucketAccessAdapter } from '../buckets/bucket-access.js';
import type { BucketFamily } from '../buckets/bucket-families.js';
import {
  awsLandsatProductPrefix,
  awsS1ProductPrefix,
  awsS2CogMonthPrefix,
  awsS2CogProductPrefix,
  awsS2ProductPrefix,
  awsS2TileDayPrefix,
  awsS2TilePrefix,
  cogProductDate,
  diasS1ProductPrefix,
  diasS2DayPrefix,
  diasS2ProductPrefix,
} from '../buckets/key-layouts.js';
import { parseSentinel2ProductId, stripSafeSuffix } from '../products/product-id.js';
import { parseOpticalGridTile } from '../tiles/mgrs.js';
import { demTileIdsFor, demTileIdsForFootprint } from '../tiles/tile-resolver.js';
import type { AttemptContext, RetrievalProvider } from './types.js';

// ============================================================================
// Family Tables
// ============================================================================

type BucketProviderName = 'ewoc' | 'aws' | 'creodias';

const DEM_FAMILIES: Readonly<Record<BucketProviderName, Partial<Record<DemDataKind, BucketFamily>>>> = {
  ewoc: { DemSRTM1s: 'ewoc-aux', DemSRTM3s: 'ewoc-aux' },
  aws: { DemCOP1s: 'aws-cop-30', DemCOP3s: 'aws-cop-90' },
  creodias: { DemSRTM1s: 'creodias' },
};

function isBucketProviderName(name: string): name is BucketProviderName {
  return name === 'ewoc' || name === 'aws' || name === 'creodias';
}

function lastSegment(prefix: string): string {
  const segments = prefix.split('/').filter((segment) => segment !== '');
  return segments[segments.length - 1] ?? '';
}

export interface BucketProviderOptions {
  /** Serve Sentinel-2 L2A from the COG bucket */
  readonly s2L2aCogs: boolean;
}

// ============================================================================
// Provider
// ============================================================================

export class BucketBackedProvider implements RetrievalProvider {
  readonly descriptor: ProviderDescriptor;
  private readonly name: BucketProviderName;
  private readonly buckets: BucketAccessAdapter;
  private readonly options: BucketProviderOptions;

  constructor(descriptor: ProviderDescriptor, buckets: BucketAccessAdapter, options: BucketProviderOptions) {
    if (!isBucketProviderName(descriptor.name)) {
      throw new Error(`Provider ${descriptor.name} is not bucket-backed`);
    }
    this.descriptor = descriptor;
    this.name = descriptor.name;
    this.buckets = buckets;
    this.options = options;
  }

  async fetch(request: DataRequest, context: AttemptContext): Promise<void> {
    const { dataKind, locator } = request;

    if (isDemDataKind(dataKind)) {
      return this.fetchDem(dataKind, locator, context);
    }

    switch (locator.type) {
      case 'product':
        return this.fetchById(locator.productId, dataKind, context);
      case 'tile':
        if (!locator.dateRange) {
          throw new UnsupportedDataKindError(this.name, dataKind, 'tile retrieval needs a date range');
        }
        return this.fetchImageryTile(dataKind, locator.tileId, locator.dateRange, context);
      case 'footprint':
        throw new UnsupportedDataKindError(this.name, dataKind, 'buckets cannot be searched by footprint');
    }
  }

  async fetchById(productId: string, dataKind: ImageryDataKind, context: AttemptContext): Promise<void> {
    const staging = context.stagingDir;
    const transfer = { signal: context.signal };

    if (this.name === 'aws') {
      switch (dataKind) {
        case 'Sentinel1':
          await this.buckets.fetchPrefix('aws-s1', awsS1ProductPrefix(productId), staging, transfer);
          return;
        case 'Landsat8':
          await this.buckets.fetchPrefix('aws-landsat', awsLandsatProductPrefix(productId), staging, transfer);
          return;
        case 'Sentinel2L2A':
          if (this.options.s2L2aCogs) {
            await this.buckets.fetchPrefix('aws-s2-cogs', awsS2CogProductPrefix(productId), staging, transfer);
            return;
          }
          return this.fetchAwsS2Product('aws-s2-l2a', productId, context);
        case 'Sentinel2L1C':
          return this.fetchAwsS2Product('aws-s2-l1c', productId, context);
      }
    }

    if (this.name === 'creodias') {
      switch (dataKind) {
        case 'Sentinel1':
          await this.buckets.fetchPrefix('creodias', diasS1ProductPrefix(productId), staging, transfer);
          return;
        case 'Sentinel2L1C':
        case 'Sentinel2L2A':
          await this.buckets.fetchPrefix('creodias', diasS2ProductPrefix(productId), staging, transfer);
          return;
        case 'Landsat8':
          break;
      }
    }

    throw new UnsupportedDataKindError(this.name, dataKind, 'no product layout in this bucket family');
  }

  /**
   * Product metadata under product/ and tile data under tile/
   */
  private async fetchAwsS2Product(family: BucketFamily, productId: string, context: AttemptContext): Promise<void> {
    const productPrefix = awsS2ProductPrefix(productId);
    const product = parseSentinel2ProductId(productId);
    const tilePrefix = awsS2TilePrefix(product.tileId, product.sensingTime);
    const transfer = { signal: context.signal };

    await this.buckets.fetchPrefix(family, productPrefix, join(context.stagingDir, 'product'), transfer);
    await this.buckets.fetchPrefix(family, tilePrefix, join(context.stagingDir, 'tile'), transfer);
  }

  private async fetchDem(dataKind: DemDataKind, locator: Locator, context: AttemptContext): Promise<void> {
    switch (locator.type) {
      case 'tile':
        return this.fetchDemTiles(dataKind, demTileIdsFor(dataKind, locator.tileId), context);
      case 'footprint':
        return this.fetchDemTiles(dataKind, demTileIdsForFootprint(dataKind, locator.footprint), context);
      case 'product':
        throw new UnsupportedDataKindError(this.name, dataKind, 'DEM products are addressed by tile');
    }
  }

  private async fetchDemTiles(dataKind: DemDataKind, tileIds: readonly string[], context: AttemptContext): Promise<void> {
    const family = DEM_FAMILIES[this.name][dataKind];
    if (!family) {
      throw new UnsupportedDataKindError(this.name, dataKind);
    }

    let missing: ObjectNotFoundError | undefined;
    let retrieved = 0;

    for (const tileId of tileIds) {
      try {
        await this.buckets.fetchTile(family, dataKind, tileId, context.stagingDir, { signal: context.signal });
        retrieved += 1;
      } catch (error) {
        if (!(error instanceof ObjectNotFoundError)) throw error;
        context.logger.warn('DEM tile not in bucket, skipping', { family, tileId });
        if (!missing) missing = error;
      }
    }

    if (retrieved === 0 && missing) {
      throw missing;
    }
    context.logger.info('DEM tiles retrieved', { family, dataKind, retrieved, requested: tileIds.length });
  }

  private async fetchImageryTile(
    dataKind: ImageryDataKind,
    tileId: string,
    range: DateRange,
    context: AttemptContext
  ): Promise<void> {
    const prefixes = await this.discoverTileProducts(dataKind, tileId, range, context.signal);
    if (prefixes.length === 0) {
      throw new ObjectNotFoundError(
        this.name,
        `${dataKind} ${tileId} ${compactDate(range.start)}-${compactDate(range.end)}`
      );
    }

    for (const { family, prefix, name } of prefixes) {
      await this.buckets.fetchPrefix(family, prefix, join(context.stagingDir, name), { signal: context.signal });
    }
    context.logger.info('Tile products retrieved', { dataKind, tileId, products: prefixes.length });
  }

  /**
   * Product prefixes of a grid tile within a date range, found by listing
   */
  private async discoverTileProducts(
    dataKind: ImageryDataKind,
    tileId: string,
    range: DateRange,
    signal: AbortSignal
  ): Promise<Array<{ family: BucketFamily; prefix: string; name: string }>> {
    const tile = parseOpticalGridTile(tileId);
    const found: Array<{ family: BucketFamily; prefix: string; name: string }> = [];

    if (this.name === 'aws' && dataKind === 'Sentinel2L2A' && this.options.s2L2aCogs) {
      for (const { year, month } of eachUtcMonth(range)) {
        const children = await this.buckets.listChildPrefixes(
          'aws-s2-cogs',
          awsS2CogMonthPrefix(tile.id, year, month),
          { signal }
        );
        for (const prefix of children) {
          const name = lastSegment(prefix);
          const date = cogProductDate(name);
          if (date && isWithinRange(date, range)) {
            found.push({ family: 'aws-s2-cogs', prefix, name });
          }
        }
      }
      return found;
    }

    if (this.name === 'aws' && (dataKind === 'Sentinel2L1C' || dataKind === 'Sentinel2L2A')) {
      const family: BucketFamily = dataKind === 'Sentinel2L1C' ? 'aws-s2-l1c' : 'aws-s2-l2a';
      for (const day of eachUtcDay(range)) {
        const sequences = await this.buckets.listChildPrefixes(family, awsS2TileDayPrefix(tile.id, day), { signal });
        for (const prefix of sequences) {
          found.push({ family, prefix, name: `${tile.id}_${compactDate(day)}_${lastSegment(prefix)}` });
        }
      }
      return found;
    }

    if (this.name === 'creodias' && (dataKind === 'Sentinel2L1C' || dataKind === 'Sentinel2L2A')) {
      const level = dataKind === 'Sentinel2L1C' ? 'L1C' : 'L2A';
      const marker = `_T${tile.id}_`;
      for (const day of eachUtcDay(range)) {
        const products = await this.buckets.listChildPrefixes('creodias', diasS2DayPrefix(level, day), { signal });
        for (const prefix of products) {
          const name = lastSegment(prefix);
          if (name.includes(marker)) {
            found.push({ family: 'creodias', prefix, name: stripSafeSuffix(name) });
          }
        }
      }
      return found;
    }

    throw new UnsupportedDataKindError(this.name, dataKind, 'no tile layout in this bucket family');
  }
}
