/**
 * Core Types for the EO Gateway
 *
 * Shared vocabulary for every layer: data kinds, provider names, requests,
 * and the descriptor of a product materialized on local disk.
 *
 * TYPE SAFETY: All request and descriptor values are readonly. A request is
 * built once by the caller and never mutated by the gateway.
 */

import type { Polygon, BBox } from 'geojson';

// ============================================================================
// Data Kinds
// ============================================================================

/**
 * Every product family the gateway can retrieve
 */
export const DATA_KINDS = [
  'Sentinel1',
  'Sentinel2L1C',
  'Sentinel2L2A',
  'Landsat8',
  'DemSRTM1s',
  'DemSRTM3s',
  'DemCOP1s',
  'DemCOP3s',
] as const;

export type DataKind = (typeof DATA_KINDS)[number];

export type DemDataKind = Extract<DataKind, `Dem${string}`>;

export type ImageryDataKind = Exclude<DataKind, DemDataKind>;

export function isDataKind(value: string): value is DataKind {
  return DATA_KINDS.some((kind) => kind === value);
}

export function isDemDataKind(kind: DataKind): kind is DemDataKind {
  return kind.startsWith('Dem');
}

// ============================================================================
// Providers
// ============================================================================

export const PROVIDER_NAMES = ['ewoc', 'aws', 'creodias', 'esa', 'federated'] as const;

export type ProviderName = (typeof PROVIDER_NAMES)[number];

export function isProviderName(value: string): value is ProviderName {
  return PROVIDER_NAMES.some((name) => name === value);
}

/**
 * Static availability metadata. Never probed at runtime.
 */
export type AvailabilityClass = 'always-on' | 'region-restricted' | 'rolling-archive';

/**
 * Backend variant a provider is implemented with
 */
export type ProviderBackend = 'bucket' | 'search-service' | 'http-archive';

export interface ProviderDescriptor {
  readonly name: ProviderName;
  readonly description: string;
  readonly backend: ProviderBackend;
  readonly supportedDataKinds: ReadonlySet<DataKind>;
  /** Credential keys that must all be present for the provider to be eligible */
  readonly credentialRequirement: readonly string[];
  readonly availabilityClass: AvailabilityClass;
  /** Lower rank is tried first when no preference applies */
  readonly rank: number;
}

/**
 * Opaque key/value bag of credential material
 */
export type CredentialSet = Readonly<Record<string, string>>;

// ============================================================================
// Spatial Types
// ============================================================================

/**
 * Geographic extent of a grid tile in WGS 84.
 *
 * When `crossesAntimeridian` is true the bbox has west > east.
 */
export interface Footprint {
  readonly polygon: Polygon;
  readonly bbox: Readonly<BBox>;
  readonly crossesAntimeridian: boolean;
}

/**
 * Inclusive acquisition date range (UTC calendar days)
 */
export interface DateRange {
  readonly start: Date;
  readonly end: Date;
}

// ============================================================================
// Requests
// ============================================================================

export type Locator =
  | { readonly type: 'tile'; readonly tileId: string; readonly dateRange?: DateRange }
  | { readonly type: 'product'; readonly productId: string }
  | { readonly type: 'footprint'; readonly footprint: Footprint; readonly dateRange: DateRange };

export interface DataRequest {
  readonly dataKind: DataKind;
  readonly locator: Locator;
  readonly outputDirectory: string;
  /** Explicit provider: no fallback to any other provider */
  readonly provider?: ProviderName;
  /** Cancels the request; checked before each candidate attempt */
  readonly signal?: AbortSignal;
  /** Bound for a single provider attempt */
  readonly attemptTimeoutMs?: number;
}

// ============================================================================
// Results
// ============================================================================

export interface MaterializedProduct {
  /** Canonical, provider-independent directory of the product */
  readonly localPath: string;
  readonly sourceProvider: ProviderName;
  readonly byteSize: number;
  readonly retrievedAt: Date;
  /** Files of the product, relative to localPath */
  readonly files: readonly string[];
  /** SHA-256 hex digest when the product is a single file */
  readonly checksum?: string;
}
