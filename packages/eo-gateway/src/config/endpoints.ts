/**
 * Provider Endpoints
 *
 * Default network locations of every provider family. Configuration may
 * replace any of them (EWOC_S3_ENDPOINT, EWOC_CREODIAS_ENDPOINT,
 * EWOC_SEARCH_URL, EWOC_ESA_DEM_URL).
 */

// ============================================================================
// Object Storage
// ============================================================================

/**
 * AWS regions hosting the public Earth-observation buckets
 *
 * Sentinel and Copernicus DEM data sit in Frankfurt; Landsat Collection 2 and
 * the Sentinel-2 COGs in Oregon.
 */
export const AWS_REGIONS = {
  sentinel: 'eu-central-1',
  copernicusDem: 'eu-central-1',
  landsat: 'us-west-2',
  sentinelCogs: 'us-west-2',
} as const;

/**
 * Region string sent to S3-compatible endpoints that ignore it
 */
export const GENERIC_S3_REGION = 'us-east-1';

// ============================================================================
// Defaults
// ============================================================================

export const DEFAULT_ENDPOINTS = {
  /** CloudFerro WAW2 object storage hosting the EWoC buckets */
  ewoc: 'https://s3.waw2-1.cloudferro.com',

  /** CREODIAS eodata endpoint, reachable from inside the DIAS only */
  creodias: 'http://data.cloudferro.com',

  /** Public STAC API indexing Sentinel-1/2 and Landsat Collection 2 */
  search: 'https://earth-search.aws.element84.com/v1',

  /** SRTM 1s zips on the ESA STEP website */
  esaDem: 'http://step.esa.int/auxdata/dem/SRTMGL1/',
} as const;
