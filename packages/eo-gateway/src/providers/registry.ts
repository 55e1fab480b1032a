/**
 * Provider Capability Registry
 *
 * Static table of the providers the gateway knows: which data kinds each can
 * serve, which credential keys it needs and its availability class. Built once
 * at module load and frozen; safe to share between concurrent requests.
 *
 * Availability classes are declarations, not probes. A region-restricted
 * provider is still tried; when unreachable it fails like any other attempt.
 */

import { UnknownProviderError } from '../core/errors.js';
import {
  isProviderName,
  type DataKind,
  type ProviderDescriptor,
  type ProviderName,
} from '../core/types.js';

// ============================================================================
// Credential Keys
// ============================================================================

export const AWS_CREDENTIAL_KEYS = ['AWS_ACCESS_KEY_ID', 'AWS_SECRET_ACCESS_KEY'] as const;
export const EWOC_CREDENTIAL_KEYS = ['EWOC_S3_ACCESS_KEY_ID', 'EWOC_S3_SECRET_ACCESS_KEY'] as const;
export const SEARCH_CREDENTIAL_KEYS = ['EWOC_SEARCH_TOKEN'] as const;

// ============================================================================
// Descriptor Table
// ============================================================================

function descriptor(
  value: Omit<ProviderDescriptor, 'supportedDataKinds'> & { readonly kinds: readonly DataKind[] }
): ProviderDescriptor {
  const { kinds, ...rest } = value;
  return Object.freeze({
    ...rest,
    supportedDataKinds: new Set(kinds),
    credentialRequirement: Object.freeze([...rest.credentialRequirement]),
  });
}

const DESCRIPTORS: readonly ProviderDescriptor[] = Object.freeze([
  descriptor({
    name: 'ewoc',
    description: 'EWoC private buckets (auxiliary data, ARD, products)',
    backend: 'bucket',
    kinds: ['DemSRTM1s', 'DemSRTM3s'],
    credentialRequirement: EWOC_CREDENTIAL_KEYS,
    availabilityClass: 'always-on',
    rank: 1,
  }),
  descriptor({
    name: 'aws',
    description: 'AWS open-data and requester-pays buckets',
    backend: 'bucket',
    kinds: ['Sentinel1', 'Sentinel2L1C', 'Sentinel2L2A', 'Landsat8', 'DemCOP1s', 'DemCOP3s'],
    credentialRequirement: AWS_CREDENTIAL_KEYS,
    availabilityClass: 'always-on',
    rank: 2,
  }),
  descriptor({
    name: 'creodias',
    description: 'CREODIAS eodata bucket (reachable from the DIAS cloud only)',
    backend: 'bucket',
    kinds: ['Sentinel1', 'Sentinel2L1C', 'Sentinel2L2A', 'DemSRTM1s'],
    credentialRequirement: [],
    availabilityClass: 'region-restricted',
    rank: 3,
  }),
  descriptor({
    name: 'esa',
    description: 'ESA STEP auxiliary-data website',
    backend: 'http-archive',
    kinds: ['DemSRTM1s'],
    credentialRequirement: [],
    availabilityClass: 'always-on',
    rank: 4,
  }),
  descriptor({
    name: 'federated',
    description: 'STAC search-and-download service',
    backend: 'search-service',
    kinds: ['Sentinel1', 'Sentinel2L1C', 'Sentinel2L2A', 'Landsat8'],
    credentialRequirement: SEARCH_CREDENTIAL_KEYS,
    availabilityClass: 'rolling-archive',
    rank: 5,
  }),
]);

// ============================================================================
// Registry
// ============================================================================

export class ProviderRegistry {
  private readonly byName: ReadonlyMap<ProviderName, ProviderDescriptor>;
  private readonly ordered: readonly ProviderDescriptor[];

  constructor(descriptors: readonly ProviderDescriptor[]) {
    this.ordered = Object.freeze([...descriptors].sort((a, b) => a.rank - b.rank));
    this.byName = new Map(this.ordered.map((d) => [d.name, d]));
    Object.freeze(this);
  }

  /**
   * Providers declaring support for the data kind, in rank order
   */
  providersFor(dataKind: DataKind): ProviderDescriptor[] {
    return this.ordered.filter((d) => d.supportedDataKinds.has(dataKind));
  }

  /**
   * Credential keys the provider needs
   *
   * @throws {UnknownProviderError}
   */
  requiredCredentials(provider: string): readonly string[] {
    return this.getProvider(provider).credentialRequirement;
  }

  /**
   * @throws {UnknownProviderError}
   */
  getProvider(name: string): ProviderDescriptor {
    const found = isProviderName(name) ? this.byName.get(name) : undefined;
    if (!found) {
      throw new UnknownProviderError(name);
    }
    return found;
  }

  all(): readonly ProviderDescriptor[] {
    return this.ordered;
  }

  /**
   * Every credential key any provider may need
   */
  credentialKeys(): string[] {
    return [...new Set(this.ordered.flatMap((d) => d.credentialRequirement))];
  }
}

/**
 * Process-wide registry
 */
export const providerRegistry = new ProviderRegistry(DESCRIPTORS);
