/**
 * Search-service-backed provider
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { ObjectNotFoundError, UnsupportedDataKindError } from '../../../core/errors.js';
import { walkFiles } from '../../../core/utils/files.js';
import { providerRegistry } from '../../../providers/registry.js';
import { SearchServiceBackedProvider } from '../../../providers/search-provider.js';
import type { AttemptContext } from '../../../providers/types.js';
import type { SearchItem } from '../../../search/search-service.js';
import { resolveFootprint } from '../../../tiles/tile-resolver.js';
import { FakeSearchService, MockLogger, makeTempDir, removeDir } from '../../utils/mocks.js';

const S2_L1C = 'S2B_MSIL1C_20210714T105619_N0301_R094_T31TCJ_20210714T131301';
const S2_LATER = 'S2A_MSIL1C_20210719T105621_N0301_R094_T31TCJ_20210719T131401';

function item(id: string, ...assets: string[]): SearchItem {
  return {
    id,
    collection: 'sentinel-2-l1c',
    datetime: null,
    assets: assets.map((key) => ({ key, href: `https://assets.test/${id}/${key}`, roles: ['data'] })),
  };
}

const JULY = { start: new Date(Date.UTC(2021, 6, 1)), end: new Date(Date.UTC(2021, 6, 31)) };

describe('SearchServiceBackedProvider', () => {
  let staging: string;
  let context: AttemptContext;
  let service: FakeSearchService;
  let provider: SearchServiceBackedProvider;

  beforeEach(async () => {
    staging = await makeTempDir();
    context = { stagingDir: staging, signal: new AbortController().signal, logger: new MockLogger() };
    service = new FakeSearchService([item(S2_L1C, 'B04', 'B08'), item(S2_LATER, 'B04')]);
    provider = new SearchServiceBackedProvider(providerRegistry.getProvider('federated'), service);
  });

  afterEach(async () => {
    await removeDir(staging);
  });

  it('should download the first match of a product id into the staging directory', async () => {
    await provider.fetchById(S2_L1C, 'Sentinel2L1C', context);

    expect(service.queries).toEqual([{ dataKind: 'Sentinel2L1C', productId: S2_L1C, limit: 1 }]);
    expect(await walkFiles(staging)).toEqual(['B04.tif', 'B08.tif']);
    expect(await readFile(join(staging, 'B04.tif'), 'utf-8')).toBe(`${S2_L1C}:B04`);
  });

  it('should report an unknown product id as ObjectNotFound', async () => {
    await expect(provider.fetchById('S2A_MSIL1C_unknown', 'Sentinel2L1C', context)).rejects.toBeInstanceOf(
      ObjectNotFoundError
    );
  });

  it('should query Sentinel-2 tiles by grid tile and download each item apart', async () => {
    await provider.fetch(
      { dataKind: 'Sentinel2L1C', locator: { type: 'tile', tileId: '31TCJ', dateRange: JULY }, outputDirectory: staging },
      context
    );

    expect(service.queries).toEqual([{ dataKind: 'Sentinel2L1C', tileId: '31TCJ', dateRange: JULY }]);
    expect(await walkFiles(staging)).toEqual([`${S2_L1C}/B04.tif`, `${S2_L1C}/B08.tif`, `${S2_LATER}/B04.tif`]);
  });

  it('should query other kinds by the footprint of the tile', async () => {
    await provider.fetch(
      { dataKind: 'Landsat8', locator: { type: 'tile', tileId: '31TCJ', dateRange: JULY }, outputDirectory: staging },
      context
    );

    expect(service.queries).toEqual([
      { dataKind: 'Landsat8', bbox: resolveFootprint('31TCJ').bbox, dateRange: JULY },
    ]);
  });

  it('should fail when a search returns nothing', async () => {
    const empty = new SearchServiceBackedProvider(providerRegistry.getProvider('federated'), new FakeSearchService([]));

    await expect(
      empty.fetch(
        { dataKind: 'Sentinel1', locator: { type: 'tile', tileId: '31TCJ', dateRange: JULY }, outputDirectory: staging },
        context
      )
    ).rejects.toThrow('Object not found: federated/no Sentinel1 item matches the query');
  });

  it('should refuse DEM kinds and tiles without a date range', async () => {
    await expect(
      provider.fetch({ dataKind: 'DemCOP1s', locator: { type: 'tile', tileId: '31TCJ' }, outputDirectory: staging }, context)
    ).rejects.toBeInstanceOf(UnsupportedDataKindError);
    await expect(
      provider.fetch({ dataKind: 'Sentinel2L2A', locator: { type: 'tile', tileId: '31TCJ' }, outputDirectory: staging }, context)
    ).rejects.toThrow('federated cannot serve Sentinel2L2A (tile search needs a date range)');
  });
});
