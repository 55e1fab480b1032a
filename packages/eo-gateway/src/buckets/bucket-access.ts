/**
 * Bucket Access Adapter
 *
 * Translates logical requests into object-storage calls for every bucket
 * family: paginated listing, single-object fetch, DEM tile fetch by
 * deterministic key, and whole-prefix fetch.
 *
 * FILE SAFETY:
 * Every object is streamed to a temporary sibling and renamed on completion.
 * fetchTile and fetchPrefix remove whatever they wrote when a later object
 * fails, so a failed call leaves the destination as it found it.
 */

import { mkdir, rm, stat } from 'node:fs/promises';
import { basename, dirname, join } from 'node:path';
import AdmZip from 'adm-zip';
import { ObjectNotFoundError, ProviderNetworkError, errorMessage } from '../core/errors.js';
import type { DataKind } from '../core/types.js';
import { atomicWriteStream } from '../core/utils/atomic-write.js';
import { createLogger, type Logger } from '../core/utils/logger.js';
import type { GatewayConfig } from '../config/gateway-config.js';
import type { ObjectStorageClient, StorageConnection } from '../storage/object-storage.js';
import { S3ObjectStorage } from '../storage/s3-object-storage.js';
import { resolveBucket, type BucketFamily, type ResolvedBucket } from './bucket-families.js';
import { demTileKey } from './key-layouts.js';

// ============================================================================
// Types
// ============================================================================

export type StorageClientFactory = (connection: StorageConnection) => ObjectStorageClient;

export type BucketAccessConfig = Pick<GatewayConfig, 'cloudProvider' | 'devMode' | 'credentials' | 'endpoints'>;

export interface BucketAccessOptions {
  /** Defaults to the S3 client */
  readonly clientFactory?: StorageClientFactory;
  readonly logger?: Logger;
}

export interface TransferOptions {
  readonly signal?: AbortSignal;
}

/**
 * Keys under a prefix, fetched page by page as they are consumed.
 *
 * Single-use: a second iteration throws.
 */
export class KeyListing implements AsyncIterable<string> {
  private consumed = false;

  constructor(
    private readonly client: ObjectStorageClient,
    private readonly bucket: ResolvedBucket,
    private readonly prefix: string,
    private readonly options: TransferOptions = {}
  ) {}

  [Symbol.asyncIterator](): AsyncIterator<string> {
    if (this.consumed) {
      throw new Error(`Listing of ${this.bucket.bucket}/${this.prefix} was already consumed`);
    }
    this.consumed = true;
    return this.pages();
  }

  private async *pages(): AsyncGenerator<string> {
    let continuationToken: string | undefined;
    do {
      const page = await this.client.listObjects(this.bucket.bucket, this.prefix, continuationToken, {
        signal: this.options.signal,
        requesterPays: this.bucket.requesterPays,
      });
      yield* page.keys;
      continuationToken = page.nextContinuationToken;
    } while (continuationToken !== undefined);
  }
}

// ============================================================================
// Adapter
// ============================================================================

export class BucketAccessAdapter {
  private readonly config: BucketAccessConfig;
  private readonly clientFactory: StorageClientFactory;
  private readonly clients = new Map<BucketFamily, ObjectStorageClient>();
  private readonly log: Logger;

  constructor(config: BucketAccessConfig, options: BucketAccessOptions = {}) {
    this.config = config;
    this.clientFactory = options.clientFactory ?? ((connection) => new S3ObjectStorage(connection));
    this.log = options.logger ?? createLogger({ module: 'buckets' });
  }

  bucketFor(family: BucketFamily): ResolvedBucket {
    return resolveBucket(family, this.config);
  }

  private clientFor(family: BucketFamily): ObjectStorageClient {
    let client = this.clients.get(family);
    if (!client) {
      client = this.clientFactory(this.bucketFor(family).connection);
      this.clients.set(family, client);
    }
    return client;
  }

  /**
   * Every key under a prefix, lazily paged
   */
  listUnder(family: BucketFamily, prefix: string, options?: TransferOptions): KeyListing {
    return new KeyListing(this.clientFor(family), this.bucketFor(family), prefix, options);
  }

  /**
   * Distinct parent prefixes of the keys under a prefix, sorted
   */
  async listProductPrefixes(family: BucketFamily, prefix: string, options?: TransferOptions): Promise<string[]> {
    const parents = new Set<string>();
    for await (const key of this.listUnder(family, prefix, options)) {
      const slash = key.lastIndexOf('/');
      if (slash > 0) parents.add(key.slice(0, slash + 1));
    }
    return [...parents].sort();
  }

  /**
   * Distinct first-level sub-prefixes directly below a prefix, sorted
   */
  async listChildPrefixes(family: BucketFamily, prefix: string, options?: TransferOptions): Promise<string[]> {
    const children = new Set<string>();
    for await (const key of this.listUnder(family, prefix, options)) {
      const rest = key.slice(prefix.length);
      const slash = rest.indexOf('/');
      if (slash > 0) children.add(`${prefix}${rest.slice(0, slash + 1)}`);
    }
    return [...children].sort();
  }

  /**
   * Download one object into a directory under its own file name
   *
   * @throws {ObjectNotFoundError} when the key is absent
   */
  async fetch(family: BucketFamily, key: string, destDir: string, options?: TransferOptions): Promise<string> {
    return this.fetchTo(family, key, join(destDir, basename(key)), options);
  }

  private async fetchTo(
    family: BucketFamily,
    key: string,
    filePath: string,
    options?: TransferOptions
  ): Promise<string> {
    const bucket = this.bucketFor(family);
    this.log.debug('Fetching object', { bucket: bucket.bucket, key, filePath });

    const body = await this.clientFor(family).getObject(bucket.bucket, key, {
      signal: options?.signal,
      requesterPays: bucket.requesterPays,
    });

    try {
      await atomicWriteStream(filePath, body, options?.signal);
    } catch (error) {
      if (options?.signal?.aborted) throw error;
      throw new ProviderNetworkError(`${bucket.bucket}/${key}`, error);
    }
    return filePath;
  }

  /**
   * Download one DEM tile by its deterministic key; zip archives are
   * extracted into the destination and removed
   *
   * @param tileId - 1° cell (N43E001) or 5° SRTM 3s cell (srtm_37_04)
   * @returns Paths of the tile files
   * @throws {InvalidKeyPatternError} when the family does not publish the kind
   * @throws {ObjectNotFoundError} when the tile is absent
   */
  async fetchTile(
    family: BucketFamily,
    dataKind: DataKind,
    tileId: string,
    destDir: string,
    options?: TransferOptions
  ): Promise<string[]> {
    const key = demTileKey(family, dataKind, tileId);
    const downloaded = await this.fetch(family, key, destDir, options);

    if (!downloaded.endsWith('.zip')) {
      return [downloaded];
    }

    try {
      return await extractArchive(downloaded, destDir);
    } finally {
      await rm(downloaded, { force: true });
    }
  }

  /**
   * Download every object below a prefix, keeping the layout relative to it
   *
   * @returns Paths of the written files
   * @throws {ObjectNotFoundError} when nothing is stored below the prefix
   */
  async fetchPrefix(
    family: BucketFamily,
    prefix: string,
    destDir: string,
    options?: TransferOptions
  ): Promise<string[]> {
    const bucket = this.bucketFor(family);
    const written: string[] = [];

    try {
      for await (const key of this.listUnder(family, prefix, options)) {
        if (key.endsWith('/')) continue;
        const relative = key.slice(prefix.length);
        const target = join(destDir, ...relative.split('/'));
        await mkdir(dirname(target), { recursive: true });
        written.push(await this.fetchTo(family, key, target, options));
      }
    } catch (error) {
      await Promise.all(written.map((path) => rm(path, { force: true })));
      throw error;
    }

    if (written.length === 0) {
      throw new ObjectNotFoundError(bucket.bucket, prefix);
    }

    this.log.info('Fetched prefix', { bucket: bucket.bucket, prefix, files: written.length });
    return written;
  }
}

// ============================================================================
// Archives
// ============================================================================

/**
 * Extract every file of a zip archive into a directory
 *
 * @returns Paths of the extracted files
 */
export async function extractArchive(zipPath: string, destDir: string): Promise<string[]> {
  let zip: AdmZip;
  try {
    zip = new AdmZip(zipPath);
  } catch (error) {
    throw new ProviderNetworkError(zipPath, new Error(`corrupt archive: ${errorMessage(error)}`));
  }

  const entries = zip.getEntries().filter((entry) => !entry.isDirectory);
  zip.extractAllTo(destDir, true);

  const paths = entries.map((entry) => join(destDir, ...entry.entryName.split('/')));
  await Promise.all(paths.map((path) => stat(path)));
  return paths;
}
