/**
 * EO Gateway
 *
 * Earth-observation data access: Sentinel-2 grid and DEM tile resolution,
 * deterministic multi-provider retrieval with fallback, and upload of derived
 * products to the archive buckets.
 *
 * @example
 * ```typescript
 * import { RetrievalOrchestrator, loadConfig } from 'eo-gateway';
 *
 * const orchestrator = new RetrievalOrchestrator(loadConfig());
 * const product = await orchestrator.retrieve({
 *   dataKind: 'DemSRTM1s',
 *   locator: { type: 'tile', tileId: '31TCJ' },
 *   outputDirectory: './dem',
 * });
 * console.log(product.sourceProvider, product.files);
 * ```
 *
 * @packageDocumentation
 */

// Core
export * from './core/types.js';
export * from './core/errors.js';
export type { Logger, LogLevel, LogMetadata } from './core/utils/logger.js';
export { createLogger } from './core/utils/logger.js';

// Configuration
export {
  loadConfig,
  resolveConfig,
  findConfigFile,
  overrideEnvVar,
  DEFAULT_ATTEMPT_TIMEOUT_MS,
  type GatewayConfig,
  type CloudProvider,
  type ConfigOverrides,
  type Environment,
  type LoadConfigOptions,
  type ResolveConfigOptions,
} from './config/gateway-config.js';

// Tiles
export { parseOpticalGridTile, type OpticalGridTile } from './tiles/mgrs.js';
export {
  parseDemTile,
  formatDemTile,
  parseSrtm3sTile,
  formatSrtm3sTile,
  SRTM1S_ARCHIVE_SUFFIX,
  type DemTile,
  type Srtm3sTile,
} from './tiles/dem-tiles.js';
export {
  resolveFootprint,
  footprintFromBBox,
  coveringDemTiles,
  coveringSrtm3sTiles,
  demTileIdsForGridTile,
  srtm3sTileIdsForGridTile,
  demTileIdsFor,
} from './tiles/tile-resolver.js';

// Products
export {
  parseProductId,
  detectDataKind,
  parseSentinel1ProductId,
  parseSentinel2ProductId,
  parseLandsatProductId,
  type ParsedProductId,
} from './products/product-id.js';

// Providers and selection
export { providerRegistry, ProviderRegistry } from './providers/registry.js';
export { selectCandidates } from './selection/source-selector.js';
export type { RetrievalProvider, AttemptContext, ProviderSet } from './providers/types.js';

// Buckets
export { BucketAccessAdapter, type StorageClientFactory } from './buckets/bucket-access.js';
export { BUCKET_FAMILIES, resolveBucket, type BucketFamily } from './buckets/bucket-families.js';
export { ardTilePrefix, type ArdCategory } from './buckets/key-layouts.js';
export type { ObjectStorageClient, StorageConnection } from './storage/object-storage.js';

// Retrieval and upload
export { RetrievalOrchestrator, type OrchestratorOptions } from './retrieval/orchestrator.js';
export { canonicalName } from './retrieval/naming.js';
export {
  ArchiveUploader,
  type ArchiveKind,
  type ArchiveNamespace,
  type UploadedObject,
  type UploadSummary,
} from './upload/archive-uploader.js';
