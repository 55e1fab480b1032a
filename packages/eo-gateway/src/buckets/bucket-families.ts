/**
 * Bucket Families
 *
 * A bucket family is one logical store with a fixed key layout: the EWoC
 * private buckets, the AWS open-data buckets and the DIAS eodata bucket.
 * Resolving a family against the configuration yields the concrete bucket
 * name (dev / prod for the archive buckets), the endpoint and the credentials.
 */

import type { CredentialSet, ProviderName } from '../core/types.js';
import { AWS_REGIONS, GENERIC_S3_REGION } from '../config/endpoints.js';
import type { GatewayConfig } from '../config/gateway-config.js';
import type { StorageConnection } from '../storage/object-storage.js';

// ============================================================================
// Families
// ============================================================================

export const BUCKET_FAMILIES = [
  'ewoc-aux',
  'ewoc-ard',
  'ewoc-prd',
  'aws-s1',
  'aws-s2-l1c',
  'aws-s2-l2a',
  'aws-s2-cogs',
  'aws-landsat',
  'aws-cop-30',
  'aws-cop-90',
  'creodias',
] as const;

export type BucketFamily = (typeof BUCKET_FAMILIES)[number];

export function isBucketFamily(value: string): value is BucketFamily {
  return BUCKET_FAMILIES.some((family) => family === value);
}

type Host = 'ewoc' | 'aws' | 'creodias';

interface FamilyDefinition {
  readonly bucket: string;
  /** Bucket name when dev mode is on */
  readonly devBucket?: string;
  readonly host: Host;
  readonly provider: ProviderName;
  readonly requesterPays: boolean;
  readonly region: string;
}

const FAMILIES: Readonly<Record<BucketFamily, FamilyDefinition>> = {
  'ewoc-aux': { bucket: 'ewoc-aux-data', host: 'ewoc', provider: 'ewoc', requesterPays: false, region: GENERIC_S3_REGION },
  'ewoc-ard': {
    bucket: 'ewoc-ard',
    devBucket: 'ewoc-ard-dev',
    host: 'ewoc',
    provider: 'ewoc',
    requesterPays: false,
    region: GENERIC_S3_REGION,
  },
  'ewoc-prd': {
    bucket: 'ewoc-prd',
    devBucket: 'ewoc-prd-dev',
    host: 'ewoc',
    provider: 'ewoc',
    requesterPays: false,
    region: GENERIC_S3_REGION,
  },
  'aws-s1': { bucket: 'sentinel-s1-l1c', host: 'aws', provider: 'aws', requesterPays: true, region: AWS_REGIONS.sentinel },
  'aws-s2-l1c': { bucket: 'sentinel-s2-l1c', host: 'aws', provider: 'aws', requesterPays: true, region: AWS_REGIONS.sentinel },
  'aws-s2-l2a': { bucket: 'sentinel-s2-l2a', host: 'aws', provider: 'aws', requesterPays: true, region: AWS_REGIONS.sentinel },
  'aws-s2-cogs': { bucket: 'sentinel-cogs', host: 'aws', provider: 'aws', requesterPays: false, region: AWS_REGIONS.sentinelCogs },
  'aws-landsat': { bucket: 'usgs-landsat', host: 'aws', provider: 'aws', requesterPays: true, region: AWS_REGIONS.landsat },
  'aws-cop-30': {
    bucket: 'copernicus-dem-30m',
    host: 'aws',
    provider: 'aws',
    requesterPays: false,
    region: AWS_REGIONS.copernicusDem,
  },
  'aws-cop-90': {
    bucket: 'copernicus-dem-90m',
    host: 'aws',
    provider: 'aws',
    requesterPays: false,
    region: AWS_REGIONS.copernicusDem,
  },
  creodias: { bucket: 'EODATA', host: 'creodias', provider: 'creodias', requesterPays: false, region: GENERIC_S3_REGION },
};

/**
 * The DIAS bucket accepts any key pair but rejects unsigned requests
 */
const DIAS_PLACEHOLDER_KEY = 'anystring';

// ============================================================================
// Resolution
// ============================================================================

export interface ResolvedBucket {
  readonly family: BucketFamily;
  readonly bucket: string;
  readonly provider: ProviderName;
  readonly requesterPays: boolean;
  readonly connection: StorageConnection;
}

function credentialPair(
  credentials: CredentialSet,
  idKey: string,
  secretKey: string
): Pick<StorageConnection, 'accessKeyId' | 'secretAccessKey'> {
  return { accessKeyId: credentials[idKey], secretAccessKey: credentials[secretKey] };
}

/**
 * Concrete bucket, endpoint and credentials of a family
 *
 * The EWoC buckets live on CloudFerro unless the process runs on AWS, in which
 * case they are plain S3 buckets.
 */
export function resolveBucket(
  family: BucketFamily,
  config: Pick<GatewayConfig, 'cloudProvider' | 'devMode' | 'credentials' | 'endpoints'>
): ResolvedBucket {
  const definition = FAMILIES[family];
  const bucket = bucketName(family, config.devMode);

  let connection: StorageConnection;
  switch (definition.host) {
    case 'ewoc':
      connection =
        config.cloudProvider === 'aws'
          ? {
              region: GENERIC_S3_REGION,
              forcePathStyle: false,
              ...credentialPair(config.credentials, 'EWOC_S3_ACCESS_KEY_ID', 'EWOC_S3_SECRET_ACCESS_KEY'),
            }
          : {
              endpoint: config.endpoints.ewoc,
              region: definition.region,
              forcePathStyle: true,
              ...credentialPair(config.credentials, 'EWOC_S3_ACCESS_KEY_ID', 'EWOC_S3_SECRET_ACCESS_KEY'),
            };
      break;
    case 'aws':
      connection = {
        region: definition.region,
        forcePathStyle: false,
        ...credentialPair(config.credentials, 'AWS_ACCESS_KEY_ID', 'AWS_SECRET_ACCESS_KEY'),
      };
      break;
    case 'creodias':
      connection = {
        endpoint: config.endpoints.creodias,
        region: definition.region,
        forcePathStyle: true,
        accessKeyId: DIAS_PLACEHOLDER_KEY,
        secretAccessKey: DIAS_PLACEHOLDER_KEY,
      };
      break;
  }

  return {
    family,
    bucket,
    provider: definition.provider,
    requesterPays: definition.requesterPays,
    connection,
  };
}

/**
 * Bucket name of a family under the given dev-mode flag
 */
export function bucketName(family: BucketFamily, devMode: boolean): string {
  const definition = FAMILIES[family];
  return devMode && definition.devBucket ? definition.devBucket : definition.bucket;
}
