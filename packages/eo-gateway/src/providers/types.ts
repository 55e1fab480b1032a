/**
 * Retrieval Provider Types
 *
 * Polymorphic capability the orchestrator drives. Three variants implement it:
 * bucket-backed (ewoc, aws, creodias), search-service-backed (federated) and
 * http-archive (esa). The orchestrator depends only on this interface.
 */

import type { DataRequest, ImageryDataKind, ProviderDescriptor, ProviderName } from '../core/types.js';
import type { Logger } from '../core/utils/logger.js';

/**
 * Everything one attempt may touch
 */
export interface AttemptContext {
  /**
   * Empty directory owned by this attempt. Providers write the product files
   * here; the orchestrator moves the tree to its final path on success and
   * deletes it on failure.
   */
  readonly stagingDir: string;

  /** Aborts on request cancellation or attempt timeout */
  readonly signal: AbortSignal;

  readonly logger: Logger;
}

export interface RetrievalProvider {
  readonly descriptor: ProviderDescriptor;

  /**
   * Materialize the product(s) a request designates into the staging directory
   *
   * @throws provider-local GatewayErrors (ObjectNotFound, UnsupportedDataKind, ...)
   */
  fetch(request: DataRequest, context: AttemptContext): Promise<void>;

  /**
   * Materialize one product by its identifier
   */
  fetchById(productId: string, dataKind: ImageryDataKind, context: AttemptContext): Promise<void>;
}

/**
 * Provider instances by name
 */
export type ProviderSet = ReadonlyMap<ProviderName, RetrievalProvider>;
