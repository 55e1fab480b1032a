/**
 * SRTM 1s tiles from the ESA website, with fetch stubbed
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import AdmZip from 'adm-zip';
import {
  ObjectNotFoundError,
  ProviderAccessDeniedError,
  ProviderNetworkError,
  UnsupportedDataKindError,
} from '../../../core/errors.js';
import { HTTPClient } from '../../../core/http-client.js';
import type { DataRequest } from '../../../core/types.js';
import { walkFiles } from '../../../core/utils/files.js';
import { HttpArchiveProvider } from '../../../providers/http-archive-provider.js';
import { providerRegistry } from '../../../providers/registry.js';
import type { AttemptContext } from '../../../providers/types.js';
import { MockLogger, makeTempDir, removeDir } from '../../utils/mocks.js';

const BASE_URL = 'http://dem.test/srtm';

function zipResponse(name: string): Response {
  const zip = new AdmZip();
  zip.addFile(name, Buffer.from('elevation'));
  return new Response(zip.toBuffer(), { status: 200 });
}

/**
 * fetch stub answering zips for the given cells and a status for the rest
 */
function stubWebsite(available: readonly string[], otherwise = 404) {
  const fetchMock = vi.fn(async (url: string) => {
    const cell = available.find((id) => url.endsWith(`/${id}.SRTMGL1.hgt.zip`));
    return cell ? zipResponse(`${cell}.hgt`) : new Response('nope', { status: otherwise });
  });
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

describe('HttpArchiveProvider', () => {
  let staging: string;
  let logger: MockLogger;
  let context: AttemptContext;
  let provider: HttpArchiveProvider;

  const demRequest = (tileId: string): DataRequest => ({
    dataKind: 'DemSRTM1s',
    locator: { type: 'tile', tileId },
    outputDirectory: staging,
  });

  beforeEach(async () => {
    staging = await makeTempDir();
    logger = new MockLogger();
    context = { stagingDir: staging, signal: new AbortController().signal, logger };
    provider = new HttpArchiveProvider(providerRegistry.getProvider('esa'), BASE_URL, new HTTPClient({ timeoutMs: 5000 }));
  });

  afterEach(async () => {
    await removeDir(staging);
  });

  it('should download and extract every covering cell', async () => {
    const fetchMock = stubWebsite(['N43E000', 'N43E001', 'N44E000', 'N44E001']);

    await provider.fetch(demRequest('31TCJ'), context);

    expect(fetchMock.mock.calls.map(([url]) => url)).toEqual([
      'http://dem.test/srtm/N44E000.SRTMGL1.hgt.zip',
      'http://dem.test/srtm/N44E001.SRTMGL1.hgt.zip',
      'http://dem.test/srtm/N43E000.SRTMGL1.hgt.zip',
      'http://dem.test/srtm/N43E001.SRTMGL1.hgt.zip',
    ]);
    expect(await walkFiles(staging)).toEqual(['N43E000.hgt', 'N43E001.hgt', 'N44E000.hgt', 'N44E001.hgt']);
  });

  it('should skip cells the website lacks', async () => {
    stubWebsite(['N43E001']);

    await provider.fetch(demRequest('31TCJ'), context);

    expect(await walkFiles(staging)).toEqual(['N43E001.hgt']);
    expect(logger.messages('warn')).toHaveLength(3);
  });

  it('should fail with ObjectNotFound when no cell exists', async () => {
    stubWebsite([]);

    await expect(provider.fetch(demRequest('N43E001'), context)).rejects.toBeInstanceOf(ObjectNotFoundError);
    expect(await walkFiles(staging)).toEqual([]);
  });

  it('should map other HTTP failures onto provider errors without retrying', async () => {
    const fetchMock = stubWebsite([], 503);
    await expect(provider.fetch(demRequest('N43E001'), context)).rejects.toBeInstanceOf(ProviderNetworkError);
    expect(fetchMock).toHaveBeenCalledTimes(1);

    stubWebsite([], 403);
    await expect(provider.fetch(demRequest('N43E001'), context)).rejects.toBeInstanceOf(ProviderAccessDeniedError);
  });

  it('should only serve SRTM 1s tiles', async () => {
    await expect(
      provider.fetch({ dataKind: 'DemCOP1s', locator: { type: 'tile', tileId: 'N43E001' }, outputDirectory: staging }, context)
    ).rejects.toBeInstanceOf(UnsupportedDataKindError);
    await expect(provider.fetchById('x', 'Sentinel1')).rejects.toThrow('esa cannot serve Sentinel1 (cannot serve product x)');
  });
});
