/**
 * Object Storage Client Interface
 *
 * The capability the bucket layer needs from an S3-compatible store. The
 * production implementation wraps @aws-sdk/client-s3; tests use an
 * in-memory store.
 */

import type { Readable } from 'node:stream';

export interface ListObjectsPage {
  readonly keys: readonly string[];
  /** Present when more pages follow */
  readonly nextContinuationToken?: string;
}

export interface ObjectHead {
  readonly key: string;
  readonly byteSize: number;
  readonly etag?: string;
}

export interface RequestOptions {
  readonly signal?: AbortSignal;
  /** Requester-pays buckets bill the caller for egress */
  readonly requesterPays?: boolean;
}

export interface ObjectStorageClient {
  listObjects(
    bucket: string,
    prefix: string,
    continuationToken?: string,
    options?: RequestOptions
  ): Promise<ListObjectsPage>;

  /**
   * Object body as a byte stream
   *
   * @throws {ObjectNotFoundError} when the key is absent
   */
  getObject(bucket: string, key: string, options?: RequestOptions): Promise<Readable>;

  /**
   * Store a local file under the key, replacing any existing object
   */
  putObject(bucket: string, key: string, filePath: string, options?: RequestOptions): Promise<ObjectHead>;
}

/**
 * Connection settings for one S3-compatible endpoint
 */
export interface StorageConnection {
  /** Custom endpoint; AWS when omitted */
  readonly endpoint?: string;
  readonly region: string;
  readonly accessKeyId?: string;
  readonly secretAccessKey?: string;
  readonly forcePathStyle: boolean;
}
