/**
 * S3 Object Storage Client
 *
 * ObjectStorageClient over @aws-sdk/client-s3. Works against AWS and any
 * S3-compatible endpoint (CloudFerro / DIAS) through a custom endpoint with
 * path-style addressing.
 *
 * ERROR MAPPING:
 * - NoSuchKey / NotFound / HTTP 404       -> ObjectNotFoundError
 * - AccessDenied / bad credentials / 403  -> ProviderAccessDeniedError
 * - aborted requests                      -> rethrown unchanged
 * - everything else                       -> ProviderNetworkError
 */

import { createReadStream } from 'node:fs';
import { stat } from 'node:fs/promises';
import { Readable } from 'node:stream';
import {
  GetObjectCommand,
  ListObjectsV2Command,
  PutObjectCommand,
  S3Client,
  S3ServiceException,
  type S3ClientConfig,
} from '@aws-sdk/client-s3';
import {
  ObjectNotFoundError,
  ProviderAccessDeniedError,
  ProviderNetworkError,
} from '../core/errors.js';
import type {
  ListObjectsPage,
  ObjectHead,
  ObjectStorageClient,
  RequestOptions,
  StorageConnection,
} from './object-storage.js';

const NOT_FOUND_CODES = new Set(['nosuchkey', 'notfound', 'nosuchbucket']);
const DENIED_CODES = new Set([
  'accessdenied',
  'forbidden',
  'invalidaccesskeyid',
  'signaturedoesnotmatch',
  'allaccessdisabled',
]);

function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}

/**
 * Translate an SDK failure into the gateway taxonomy
 */
export function classifyS3Error(error: unknown, bucket: string, key: string): unknown {
  if (isAbortError(error)) {
    return error;
  }
  if (error instanceof S3ServiceException) {
    const code = error.name.toLowerCase();
    const status = error.$metadata.httpStatusCode;
    if (status === 404 || NOT_FOUND_CODES.has(code)) {
      return new ObjectNotFoundError(bucket, key);
    }
    if (status === 403 || DENIED_CODES.has(code)) {
      return new ProviderAccessDeniedError(`${bucket}/${key}`, error);
    }
  }
  return new ProviderNetworkError(`${bucket}/${key}`, error);
}

export class S3ObjectStorage implements ObjectStorageClient {
  private readonly client: S3Client;

  constructor(connection: StorageConnection) {
    const clientConfig: S3ClientConfig = {
      region: connection.region,
      forcePathStyle: connection.forcePathStyle,
    };

    if (connection.accessKeyId && connection.secretAccessKey) {
      clientConfig.credentials = {
        accessKeyId: connection.accessKeyId,
        secretAccessKey: connection.secretAccessKey,
      };
    }

    if (connection.endpoint) {
      clientConfig.endpoint = connection.endpoint;
    }

    this.client = new S3Client(clientConfig);
  }

  async listObjects(
    bucket: string,
    prefix: string,
    continuationToken?: string,
    options?: RequestOptions
  ): Promise<ListObjectsPage> {
    try {
      const response = await this.client.send(
        new ListObjectsV2Command({
          Bucket: bucket,
          Prefix: prefix,
          ContinuationToken: continuationToken,
          RequestPayer: options?.requesterPays ? 'requester' : undefined,
        }),
        { abortSignal: options?.signal }
      );

      const keys: string[] = [];
      for (const object of response.Contents ?? []) {
        if (object.Key) keys.push(object.Key);
      }

      return {
        keys,
        nextContinuationToken: response.IsTruncated ? response.NextContinuationToken : undefined,
      };
    } catch (error) {
      throw classifyS3Error(error, bucket, prefix);
    }
  }

  async getObject(bucket: string, key: string, options?: RequestOptions): Promise<Readable> {
    let body: unknown;
    try {
      const response = await this.client.send(
        new GetObjectCommand({
          Bucket: bucket,
          Key: key,
          RequestPayer: options?.requesterPays ? 'requester' : undefined,
        }),
        { abortSignal: options?.signal }
      );
      body = response.Body;
    } catch (error) {
      throw classifyS3Error(error, bucket, key);
    }

    if (!(body instanceof Readable)) {
      throw new ProviderNetworkError(`${bucket}/${key}`, new Error('response carried no readable body'));
    }
    return body;
  }

  async putObject(
    bucket: string,
    key: string,
    filePath: string,
    options?: RequestOptions
  ): Promise<ObjectHead> {
    const { size } = await stat(filePath);
    try {
      const response = await this.client.send(
        new PutObjectCommand({
          Bucket: bucket,
          Key: key,
          Body: createReadStream(filePath),
          ContentLength: size,
        }),
        { abortSignal: options?.signal }
      );
      return { key, byteSize: size, etag: response.ETag };
    } catch (error) {
      throw classifyS3Error(error, bucket, key);
    }
  }
}
