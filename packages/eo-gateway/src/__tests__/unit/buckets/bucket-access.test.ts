/**
 * Bucket access over the in-memory store
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { readFile, readdir } from 'node:fs/promises';
import { join } from 'node:path';
import AdmZip from 'adm-zip';
import { BucketAccessAdapter, type KeyListing } from '../../../buckets/bucket-access.js';
import { ObjectNotFoundError } from '../../../core/errors.js';
import { walkFiles } from '../../../core/utils/files.js';
import { InMemoryObjectStorage } from '../../utils/in-memory-storage.js';
import { ALL_CREDENTIALS, MockLogger, createTestConfig, makeTempDir, removeDir } from '../../utils/mocks.js';

const L1C_BUCKET = 'sentinel-s2-l1c';
const TILE_DAY = 'tiles/31/T/CJ/2021/7/14/';

async function collect(listing: KeyListing): Promise<string[]> {
  const keys: string[] = [];
  for await (const key of listing) keys.push(key);
  return keys;
}

describe('BucketAccessAdapter', () => {
  let store: InMemoryObjectStorage;
  let adapter: BucketAccessAdapter;
  let dest: string;

  beforeEach(async () => {
    store = new InMemoryObjectStorage();
    adapter = new BucketAccessAdapter(createTestConfig(ALL_CREDENTIALS), {
      clientFactory: store.factory,
      logger: new MockLogger(),
    });
    dest = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(dest);
  });

  describe('listUnder', () => {
    beforeEach(() => {
      for (const name of ['a', 'b', 'c', 'd', 'e']) {
        store.put(L1C_BUCKET, `${TILE_DAY}0/${name}.jp2`, name);
      }
      store.put(L1C_BUCKET, 'tiles/31/T/CK/2021/7/14/0/a.jp2', 'other');
    });

    it('should follow continuation tokens across pages', async () => {
      const keys = await collect(adapter.listUnder('aws-s2-l1c', TILE_DAY));

      expect(keys).toEqual(['a', 'b', 'c', 'd', 'e'].map((name) => `${TILE_DAY}0/${name}.jp2`));
      expect(store.calls.filter((call) => call.operation === 'list')).toHaveLength(3);
    });

    it('should send requester-pays on requester-pays buckets', async () => {
      await collect(adapter.listUnder('aws-s2-l1c', TILE_DAY));
      expect(store.calls.every((call) => call.requesterPays)).toBe(true);
    });

    it('should refuse a second iteration', async () => {
      const listing = adapter.listUnder('aws-s2-l1c', TILE_DAY);
      await collect(listing);

      await expect(collect(listing)).rejects.toThrow(
        `Listing of ${L1C_BUCKET}/${TILE_DAY} was already consumed`
      );
    });

    it('should create one client per bucket family', async () => {
      await collect(adapter.listUnder('aws-s2-l1c', TILE_DAY));
      await collect(adapter.listUnder('aws-s2-l1c', TILE_DAY));

      expect(store.connections).toHaveLength(1);
    });
  });

  describe('prefix listings', () => {
    beforeEach(() => {
      store
        .put(L1C_BUCKET, `${TILE_DAY}0/B01.jp2`, '1')
        .put(L1C_BUCKET, `${TILE_DAY}0/B02.jp2`, '2')
        .put(L1C_BUCKET, `${TILE_DAY}1/B01.jp2`, '3');
    });

    it('should list distinct parent prefixes', async () => {
      expect(await adapter.listProductPrefixes('aws-s2-l1c', TILE_DAY)).toEqual([`${TILE_DAY}0/`, `${TILE_DAY}1/`]);
    });

    it('should list first-level children', async () => {
      expect(await adapter.listChildPrefixes('aws-s2-l1c', 'tiles/31/T/CJ/2021/7/')).toEqual([TILE_DAY]);
    });
  });

  describe('fetch', () => {
    it('should write the object under its own file name', async () => {
      store.put(L1C_BUCKET, `${TILE_DAY}0/B01.jp2`, 'band');

      const path = await adapter.fetch('aws-s2-l1c', `${TILE_DAY}0/B01.jp2`, dest);

      expect(path).toBe(join(dest, 'B01.jp2'));
      expect(await readFile(path, 'utf-8')).toBe('band');
    });

    it('should raise ObjectNotFound for a missing key', async () => {
      await expect(adapter.fetch('aws-s2-l1c', 'missing.jp2', dest)).rejects.toBeInstanceOf(ObjectNotFoundError);
    });
  });

  describe('fetchTile', () => {
    it('should extract zipped SRTM tiles and drop the archive', async () => {
      const zip = new AdmZip();
      zip.addFile('N43E001.hgt', Buffer.from('elevation'));
      store.put('ewoc-aux-data', 'srtm30/N43E001.SRTMGL1.hgt.zip', zip.toBuffer());

      const paths = await adapter.fetchTile('ewoc-aux', 'DemSRTM1s', 'N43E001', dest);

      expect(paths).toEqual([join(dest, 'N43E001.hgt')]);
      expect(await readdir(dest)).toEqual(['N43E001.hgt']);
      expect(await readFile(paths[0], 'utf-8')).toBe('elevation');
    });

    it('should keep Copernicus tiles as they are', async () => {
      const key = 'Copernicus_DSM_COG_10_N43_00_E001_00_DEM/Copernicus_DSM_COG_10_N43_00_E001_00_DEM.tif';
      store.put('copernicus-dem-30m', key, 'cog');

      const paths = await adapter.fetchTile('aws-cop-30', 'DemCOP1s', 'N43E001', dest);

      expect(paths).toEqual([join(dest, 'Copernicus_DSM_COG_10_N43_00_E001_00_DEM.tif')]);
    });
  });

  describe('fetchPrefix', () => {
    const PREFIX = 'products/2021/7/14/P1/';

    it('should keep the layout relative to the prefix', async () => {
      store.put(L1C_BUCKET, `${PREFIX}a.txt`, 'a').put(L1C_BUCKET, `${PREFIX}sub/b.txt`, 'b');

      const written = await adapter.fetchPrefix('aws-s2-l1c', PREFIX, dest);

      expect(written).toEqual([join(dest, 'a.txt'), join(dest, 'sub', 'b.txt')]);
      expect(await walkFiles(dest)).toEqual(['a.txt', 'sub/b.txt']);
    });

    it('should remove what it wrote when a later object fails', async () => {
      store
        .put(L1C_BUCKET, `${PREFIX}a.txt`, 'a')
        .put(L1C_BUCKET, `${PREFIX}b.txt`, 'b')
        .put(L1C_BUCKET, `${PREFIX}c.txt`, 'c')
        .failOn(L1C_BUCKET, `${PREFIX}c.txt`, new Error('connection reset'));

      await expect(adapter.fetchPrefix('aws-s2-l1c', PREFIX, dest)).rejects.toThrow('connection reset');
      expect(await walkFiles(dest)).toEqual([]);
    });

    it('should raise ObjectNotFound for an empty prefix', async () => {
      await expect(adapter.fetchPrefix('aws-s2-l1c', PREFIX, dest)).rejects.toThrow(
        `Object not found: ${L1C_BUCKET}/${PREFIX}`
      );
    });
  });
});
