/**
 * Archive uploads over the in-memory store
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { join } from 'node:path';
import {
  PartialUploadError,
  ProviderAccessDeniedError,
  ProviderNetworkError,
  UploadDeniedError,
  UploadSourceError,
} from '../../../core/errors.js';
import { ArchiveUploader, joinKey } from '../../../upload/archive-uploader.js';
import { InMemoryObjectStorage } from '../../utils/in-memory-storage.js';
import { ALL_CREDENTIALS, MockLogger, createTestConfig, makeTempDir, removeDir, writeTree } from '../../utils/mocks.js';

const PREFIX = '0000_0_09112021223005/OPTICAL/31/TC/J/';

describe('joinKey', () => {
  it('should join with exactly one slash', () => {
    expect(joinKey('a/b/', '/c.tif')).toBe('a/b/c.tif');
    expect(joinKey('a', 'c.tif')).toBe('a/c.tif');
    expect(joinKey('', 'c.tif')).toBe('c.tif');
  });
});

describe('ArchiveUploader', () => {
  let store: InMemoryObjectStorage;
  let source: string;

  const uploader = (devMode = false, archive: 'ard' | 'prd' = 'ard'): ArchiveUploader =>
    new ArchiveUploader(createTestConfig(ALL_CREDENTIALS, { devMode }), {
      archive,
      clientFactory: store.factory,
      logger: new MockLogger(),
    });

  beforeEach(async () => {
    store = new InMemoryObjectStorage();
    source = await makeTempDir();
    await writeTree(source, { 'a.tif': 'aa', 'sub/b.tif': 'bbb', 'notes.txt': 'n' });
  });

  afterEach(async () => {
    await removeDir(source);
  });

  describe('uploadFile', () => {
    it('should write the file under the key in the production bucket', async () => {
      const uploaded = await uploader().uploadFile(join(source, 'a.tif'), '/x/a.tif');

      expect(uploaded).toEqual({ bucket: 'ewoc-ard', key: 'x/a.tif', byteSize: 2 });
      expect(store.content('ewoc-ard', 'x/a.tif')).toBe('aa');
    });

    it('should follow the dev-mode namespace unless one is given', async () => {
      expect((await uploader(true, 'prd').uploadFile(join(source, 'a.tif'), 'k')).bucket).toBe('ewoc-prd-dev');
      expect((await uploader(false, 'prd').uploadFile(join(source, 'a.tif'), 'k', 'dev')).bucket).toBe('ewoc-prd-dev');
      expect(uploader(true).defaultNamespace).toBe('dev');
    });

    it('should be idempotent', async () => {
      const gateway = uploader();
      await gateway.uploadFile(join(source, 'a.tif'), 'x/a.tif');
      await gateway.uploadFile(join(source, 'a.tif'), 'x/a.tif');

      expect(store.keys('ewoc-ard')).toEqual(['x/a.tif']);
      expect(store.content('ewoc-ard', 'x/a.tif')).toBe('aa');
    });

    it('should reject sources that are not files', async () => {
      await expect(uploader().uploadFile(join(source, 'sub'), 'k')).rejects.toThrow('not a regular file');
      await expect(uploader().uploadFile(join(source, 'missing.tif'), 'k')).rejects.toThrow(
        `Cannot upload "${join(source, 'missing.tif')}": no such file`
      );
    });

    it('should report permission failures as UploadDenied', async () => {
      store.failOn('ewoc-ard', 'k', new ProviderAccessDeniedError('ewoc-ard/k'));

      await expect(uploader().uploadFile(join(source, 'a.tif'), 'k')).rejects.toBeInstanceOf(UploadDeniedError);
    });
  });

  describe('uploadProduct', () => {
    it('should upload matching files with their relative layout', async () => {
      const summary = await uploader().uploadProduct(source, PREFIX);

      expect(summary).toEqual({
        bucket: 'ewoc-ard',
        prefix: PREFIX,
        keys: [`${PREFIX}a.tif`, `${PREFIX}sub/b.tif`],
        byteSize: 5,
      });
      expect(store.keys('ewoc-ard')).toEqual([`${PREFIX}a.tif`, `${PREFIX}sub/b.tif`]);
    });

    it('should upload every file when the suffix is null', async () => {
      const summary = await uploader().uploadProduct(source, 'p', 'prod', { suffix: null });

      expect(summary.keys).toEqual(['p/a.tif', 'p/notes.txt', 'p/sub/b.tif']);
    });

    it('should reject directories without matching files', async () => {
      await expect(uploader().uploadProduct(source, 'p', 'prod', { suffix: '.nc' })).rejects.toThrow(
        'no file ends with .nc'
      );
      await expect(uploader().uploadProduct(join(source, 'nope'), 'p')).rejects.toThrow('no such directory');
      await expect(uploader().uploadProduct(join(source, 'a.tif'), 'p')).rejects.toBeInstanceOf(UploadSourceError);
    });

    it('should report the uploaded keys when a later file fails', async () => {
      store.failOn('ewoc-ard', 'p/sub/b.tif', new ProviderNetworkError('ewoc-ard', new Error('reset')));

      const error = await uploader().uploadProduct(source, 'p').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(PartialUploadError);
      if (!(error instanceof PartialUploadError)) return;
      expect(error.uploadedKeys).toEqual(['p/a.tif']);
      expect(error.failedKey).toBe('p/sub/b.tif');
    });

    it('should raise the failure itself when the first file fails', async () => {
      store.failOn('ewoc-ard', 'p/a.tif', new ProviderAccessDeniedError('ewoc-ard/p/a.tif'));

      await expect(uploader().uploadProduct(source, 'p')).rejects.toBeInstanceOf(UploadDeniedError);
    });
  });
});
