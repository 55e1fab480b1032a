/**
 * Provider Factory
 *
 * Builds one RetrievalProvider per registry entry from the configuration.
 * Collaborators can be replaced for tests.
 */

import type { GatewayConfig } from '../config/gateway-config.js';
import { HTTPClient } from '../core/http-client.js';
import type { ProviderName, ProviderDescriptor } from '../core/types.js';
import type { Logger } from '../core/utils/logger.js';
import { BucketAccessAdapter, type StorageClientFactory } from '../buckets/bucket-access.js';
import type { SearchDownloadService } from '../search/search-service.js';
import { StacSearchService } from '../search/stac-search-service.js';
import { BucketBackedProvider } from './bucket-provider.js';
import { HttpArchiveProvider } from './http-archive-provider.js';
import { providerRegistry, type ProviderRegistry } from './registry.js';
import { SearchServiceBackedProvider } from './search-provider.js';
import type { ProviderSet, RetrievalProvider } from './types.js';

export interface ProviderDependencies {
  readonly registry?: ProviderRegistry;
  readonly storageClientFactory?: StorageClientFactory;
  readonly searchService?: SearchDownloadService;
  readonly http?: HTTPClient;
  /** Parent logger of the bucket adapter and the search client */
  readonly logger?: Logger;
}

export function createProviders(config: GatewayConfig, deps: ProviderDependencies = {}): ProviderSet {
  const registry = deps.registry ?? providerRegistry;
  const http =
    deps.http ??
    new HTTPClient({
      timeoutMs: config.attemptTimeoutMs,
      maxRetries: config.httpRetries,
    });
  const buckets = new BucketAccessAdapter(config, {
    clientFactory: deps.storageClientFactory,
    logger: deps.logger?.child({ module: 'buckets' }),
  });
  const searchService =
    deps.searchService ??
    new StacSearchService({
      baseUrl: config.endpoints.search,
      token: config.credentials.EWOC_SEARCH_TOKEN,
      http,
      logger: deps.logger?.child({ module: 'stac' }),
    });

  const build = (descriptor: ProviderDescriptor): RetrievalProvider => {
    switch (descriptor.backend) {
      case 'bucket':
        return new BucketBackedProvider(descriptor, buckets, { s2L2aCogs: config.providers.s2L2aCogs });
      case 'http-archive':
        return new HttpArchiveProvider(descriptor, config.endpoints.esaDem, http);
      case 'search-service':
        return new SearchServiceBackedProvider(descriptor, searchService);
    }
  };

  const providers = new Map<ProviderName, RetrievalProvider>();
  for (const descriptor of registry.all()) {
    providers.set(descriptor.name, build(descriptor));
  }
  return providers;
}
