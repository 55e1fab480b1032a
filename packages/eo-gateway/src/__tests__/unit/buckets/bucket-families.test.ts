/**
 * Bucket family resolution
 */

import { describe, it, expect } from 'vitest';
import { bucketName, isBucketFamily, resolveBucket } from '../../../buckets/bucket-families.js';
import { ALL_CREDENTIALS, createTestConfig } from '../../utils/mocks.js';

describe('bucketName', () => {
  it('should switch archive buckets to their dev namespace', () => {
    expect(bucketName('ewoc-ard', true)).toBe('ewoc-ard-dev');
    expect(bucketName('ewoc-prd', false)).toBe('ewoc-prd');
  });

  it('should keep buckets without a dev namespace', () => {
    expect(bucketName('ewoc-aux', true)).toBe('ewoc-aux-data');
  });
});

describe('isBucketFamily', () => {
  it('should recognise family names only', () => {
    expect(isBucketFamily('aws-cop-30')).toBe(true);
    expect(isBucketFamily('copernicus-dem-30m')).toBe(false);
  });
});

describe('resolveBucket', () => {
  it('should reach the EWoC buckets on CloudFerro by default', () => {
    const resolved = resolveBucket('ewoc-aux', createTestConfig(ALL_CREDENTIALS));

    expect(resolved.bucket).toBe('ewoc-aux-data');
    expect(resolved.provider).toBe('ewoc');
    expect(resolved.connection).toEqual({
      endpoint: 'https://s3.waw2-1.cloudferro.com',
      region: 'us-east-1',
      forcePathStyle: true,
      accessKeyId: 'test-ewoc-key',
      secretAccessKey: 'test-ewoc-secret',
    });
  });

  it('should use native S3 for the EWoC buckets when running on AWS', () => {
    const resolved = resolveBucket('ewoc-prd', createTestConfig(ALL_CREDENTIALS, { cloudProvider: 'aws', devMode: true }));

    expect(resolved.bucket).toBe('ewoc-prd-dev');
    expect(resolved.connection.endpoint).toBeUndefined();
    expect(resolved.connection.forcePathStyle).toBe(false);
  });

  it('should mark requester-pays AWS buckets with their region', () => {
    const resolved = resolveBucket('aws-s2-l1c', createTestConfig(ALL_CREDENTIALS));

    expect(resolved.requesterPays).toBe(true);
    expect(resolved.connection.region).toBe('eu-central-1');
    expect(resolved.connection.accessKeyId).toBe('test-aws-key');
  });

  it('should sign DIAS requests with the placeholder key pair', () => {
    const resolved = resolveBucket('creodias', createTestConfig({ EWOC_CREODIAS_ENDPOINT: 'http://dias.test' }));

    expect(resolved.bucket).toBe('EODATA');
    expect(resolved.connection).toEqual({
      endpoint: 'http://dias.test',
      region: 'us-east-1',
      forcePathStyle: true,
      accessKeyId: 'anystring',
      secretAccessKey: 'anystring',
    });
  });
});
