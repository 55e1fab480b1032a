/**
 * Archive Uploader
 *
 * Writes derived products into the private archive buckets (ARD or PRD).
 * The namespace picks the production or development bucket; keys are the
 * same in both.
 *
 * IDEMPOTENCE:
 * Every object is a plain overwrite of its key. Re-running an upload, whole
 * or after a PartialUpload, leaves the same content under the same keys.
 */

import { stat } from 'node:fs/promises';
import { join } from 'node:path';
import {
  ProviderAccessDeniedError,
  PartialUploadError,
  UploadDeniedError,
  UploadSourceError,
  errnoCode,
  errorMessage,
} from '../core/errors.js';
import { walkFiles } from '../core/utils/files.js';
import { createLogger, type Logger } from '../core/utils/logger.js';
import type { GatewayConfig } from '../config/gateway-config.js';
import type { StorageClientFactory } from '../buckets/bucket-access.js';
import { resolveBucket, type BucketFamily } from '../buckets/bucket-families.js';
import type { ObjectStorageClient } from '../storage/object-storage.js';
import { S3ObjectStorage } from '../storage/s3-object-storage.js';

// ============================================================================
// Types
// ============================================================================

export type ArchiveKind = 'ard' | 'prd';

export type ArchiveNamespace = 'prod' | 'dev';

export interface UploadedObject {
  readonly bucket: string;
  readonly key: string;
  readonly byteSize: number;
}

export interface UploadSummary {
  readonly bucket: string;
  readonly prefix: string;
  readonly keys: readonly string[];
  readonly byteSize: number;
}

export interface UploadProductOptions {
  /** Only files ending with this suffix; null uploads every file (default: .tif) */
  readonly suffix?: string | null;
}

export interface ArchiveUploaderOptions {
  readonly archive: ArchiveKind;
  readonly clientFactory?: StorageClientFactory;
  readonly logger?: Logger;
}

export type UploaderConfig = Pick<GatewayConfig, 'cloudProvider' | 'devMode' | 'credentials' | 'endpoints'>;

const ARCHIVE_FAMILIES: Readonly<Record<ArchiveKind, BucketFamily>> = {
  ard: 'ewoc-ard',
  prd: 'ewoc-prd',
};

export const DEFAULT_PRODUCT_SUFFIX = '.tif';

/**
 * Join key segments with single slashes
 */
export function joinKey(prefix: string, relative: string): string {
  const head = prefix.replace(/\/+$/, '');
  const tail = relative.replace(/^\/+/, '');
  return head === '' ? tail : `${head}/${tail}`;
}

// ============================================================================
// Uploader
// ============================================================================

export class ArchiveUploader {
  private readonly config: UploaderConfig;
  private readonly family: BucketFamily;
  private readonly clientFactory: StorageClientFactory;
  private readonly clients = new Map<ArchiveNamespace, ObjectStorageClient>();
  private readonly log: Logger;

  constructor(config: UploaderConfig, options: ArchiveUploaderOptions) {
    this.config = config;
    this.family = ARCHIVE_FAMILIES[options.archive];
    this.clientFactory = options.clientFactory ?? ((connection) => new S3ObjectStorage(connection));
    this.log = options.logger ?? createLogger({ module: 'upload' });
  }

  /**
   * Namespace selected by the dev-mode flag
   */
  get defaultNamespace(): ArchiveNamespace {
    return this.config.devMode ? 'dev' : 'prod';
  }

  private target(namespace: ArchiveNamespace): { bucket: string; client: ObjectStorageClient } {
    const resolved = resolveBucket(this.family, { ...this.config, devMode: namespace === 'dev' });
    let client = this.clients.get(namespace);
    if (!client) {
      client = this.clientFactory(resolved.connection);
      this.clients.set(namespace, client);
    }
    return { bucket: resolved.bucket, client };
  }

  /**
   * Upload one file under a key, replacing any object there
   *
   * @throws {UploadSourceError} when the local path is not a file
   * @throws {UploadDeniedError} on credential or permission failure
   */
  async uploadFile(
    localPath: string,
    destKey: string,
    namespace: ArchiveNamespace = this.defaultNamespace
  ): Promise<UploadedObject> {
    await this.assertFile(localPath);
    const { bucket, client } = this.target(namespace);
    const key = destKey.replace(/^\/+/, '');

    try {
      const head = await client.putObject(bucket, key, localPath);
      this.log.info('Uploaded file', { bucket, key, byteSize: head.byteSize });
      return { bucket, key, byteSize: head.byteSize };
    } catch (error) {
      throw this.classify(error, bucket, key);
    }
  }

  /**
   * Upload every file of a directory below a prefix, keeping the relative layout
   *
   * @throws {UploadSourceError} when the directory is missing or holds no matching file
   * @throws {PartialUploadError} when a file fails after at least one succeeded
   */
  async uploadProduct(
    localDir: string,
    destPrefix: string,
    namespace: ArchiveNamespace = this.defaultNamespace,
    options: UploadProductOptions = {}
  ): Promise<UploadSummary> {
    const suffix = options.suffix === undefined ? DEFAULT_PRODUCT_SUFFIX : options.suffix;
    const files = (await this.listSource(localDir)).filter((file) => suffix === null || file.endsWith(suffix));
    if (files.length === 0) {
      throw new UploadSourceError(localDir, suffix === null ? 'directory is empty' : `no file ends with ${suffix}`);
    }

    const { bucket, client } = this.target(namespace);
    const keys: string[] = [];
    let byteSize = 0;

    for (const file of files) {
      const key = joinKey(destPrefix, file);
      try {
        const head = await client.putObject(bucket, key, join(localDir, ...file.split('/')));
        keys.push(key);
        byteSize += head.byteSize;
      } catch (error) {
        const classified = this.classify(error, bucket, key);
        if (keys.length === 0) throw classified;
        throw new PartialUploadError(bucket, keys, key, classified);
      }
    }

    this.log.info('Uploaded product', { bucket, prefix: destPrefix, files: keys.length, byteSize });
    return { bucket, prefix: destPrefix, keys, byteSize };
  }

  private classify(error: unknown, bucket: string, key: string): unknown {
    if (error instanceof ProviderAccessDeniedError) {
      return new UploadDeniedError(bucket, key, error);
    }
    return error;
  }

  private async assertFile(localPath: string): Promise<void> {
    try {
      const info = await stat(localPath);
      if (!info.isFile()) {
        throw new UploadSourceError(localPath, 'not a regular file');
      }
    } catch (error) {
      if (error instanceof UploadSourceError) throw error;
      throw new UploadSourceError(localPath, errnoCode(error) === 'ENOENT' ? 'no such file' : errorMessage(error));
    }
  }

  private async listSource(localDir: string): Promise<string[]> {
    try {
      const info = await stat(localDir);
      if (!info.isDirectory()) {
        throw new UploadSourceError(localDir, 'not a directory');
      }
      return await walkFiles(localDir);
    } catch (error) {
      if (error instanceof UploadSourceError) throw error;
      throw new UploadSourceError(localDir, errnoCode(error) === 'ENOENT' ? 'no such directory' : errorMessage(error));
    }
  }
}
