/**
 * HTTP Archive Provider (ESA STEP website)
 *
 * SRTM 1s tiles published as plain zip files over HTTP:
 * `{esaDem}/{N43E001}.SRTMGL1.hgt.zip`. Cells the website lacks (ocean)
 * answer 404 and are skipped while at least one cell is retrieved.
 */

import { rm } from 'node:fs/promises';
import { join } from 'node:path';
import { ObjectNotFoundError, UnsupportedDataKindError } from '../core/errors.js';
import { HTTPClient } from '../core/http-client.js';
import { classifyHttpError } from '../core/http-errors.js';
import type { DataRequest, ImageryDataKind, ProviderDescriptor } from '../core/types.js';
import { extractArchive } from '../buckets/bucket-access.js';
import { SRTM1S_ARCHIVE_SUFFIX } from '../tiles/dem-tiles.js';
import { demTileIdsFor, demTileIdsForFootprint } from '../tiles/tile-resolver.js';
import type { AttemptContext, RetrievalProvider } from './types.js';

export class HttpArchiveProvider implements RetrievalProvider {
  readonly descriptor: ProviderDescriptor;
  private readonly baseUrl: string;
  private readonly http: HTTPClient;

  constructor(descriptor: ProviderDescriptor, baseUrl: string, http: HTTPClient = new HTTPClient()) {
    this.descriptor = descriptor;
    this.baseUrl = baseUrl.endsWith('/') ? baseUrl : `${baseUrl}/`;
    this.http = http;
  }

  async fetch(request: DataRequest, context: AttemptContext): Promise<void> {
    const { dataKind, locator } = request;
    if (dataKind !== 'DemSRTM1s') {
      throw new UnsupportedDataKindError(this.descriptor.name, dataKind);
    }

    let tileIds: string[];
    switch (locator.type) {
      case 'tile':
        tileIds = demTileIdsFor(dataKind, locator.tileId);
        break;
      case 'footprint':
        tileIds = demTileIdsForFootprint(dataKind, locator.footprint);
        break;
      case 'product':
        throw new UnsupportedDataKindError(this.descriptor.name, dataKind, 'DEM products are addressed by tile');
    }

    let retrieved = 0;
    let missing: ObjectNotFoundError | undefined;

    for (const tileId of tileIds) {
      const fileName = `${tileId}${SRTM1S_ARCHIVE_SUFFIX}`;
      const url = `${this.baseUrl}${fileName}`;
      const zipPath = join(context.stagingDir, fileName);

      try {
        await this.http.downloadToFile(url, zipPath, { signal: context.signal });
      } catch (error) {
        const classified = classifyHttpError(error, this.baseUrl, fileName);
        if (!(classified instanceof ObjectNotFoundError)) throw classified;
        context.logger.warn('DEM tile not on website, skipping', { tileId });
        if (!missing) missing = classified;
        continue;
      }

      try {
        await extractArchive(zipPath, context.stagingDir);
      } finally {
        await rm(zipPath, { force: true });
      }
      retrieved += 1;
    }

    if (retrieved === 0 && missing) {
      throw missing;
    }
    context.logger.info('DEM tiles retrieved', { source: this.baseUrl, retrieved, requested: tileIds.length });
  }

  async fetchById(productId: string, dataKind: ImageryDataKind): Promise<void> {
    throw new UnsupportedDataKindError(this.descriptor.name, dataKind, `cannot serve product ${productId}`);
  }
}
