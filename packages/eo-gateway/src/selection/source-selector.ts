/**
 * Source Selector
 *
 * Orders the providers to try for one request.
 *
 * ALGORITHM:
 * 1. Explicit provider on the request: that provider alone.
 * 2. Configuration override for the data kind: that provider alone.
 * 3. Primary candidate, the first of these that supports the kind:
 *    cloud-context default, DEM-source preference (DEM kinds only),
 *    per-kind preference.
 * 4. Every other supporting provider, by registry rank.
 * 5. Drop providers whose credentials are not all present (primary included).
 * 6. Nothing left: NoProviderAvailable.
 *
 * Explicit and forced providers skip the credential check; a missing
 * credential then surfaces as that provider's attempt failure.
 */

import { NoProviderAvailableError, type ExcludedProvider } from '../core/errors.js';
import {
  isDemDataKind,
  type CredentialSet,
  type DataKind,
  type DataRequest,
  type ProviderDescriptor,
  type ProviderName,
} from '../core/types.js';
import type { CloudProvider, GatewayConfig } from '../config/gateway-config.js';
import { providerRegistry, type ProviderRegistry } from '../providers/registry.js';

export type SelectorConfig = Pick<GatewayConfig, 'cloudProvider' | 'providers' | 'credentials'>;

/**
 * Provider serving a cloud context's local buckets
 */
const CLOUD_DEFAULTS: Readonly<Record<CloudProvider, ProviderName>> = {
  aws: 'aws',
  creodias: 'creodias',
};

/**
 * Required credential keys absent or empty in the set
 */
export function missingCredentials(descriptor: ProviderDescriptor, credentials: CredentialSet): string[] {
  return descriptor.credentialRequirement.filter((key) => {
    const value = credentials[key];
    return value === undefined || value.trim() === '';
  });
}

function primaryCandidate(
  dataKind: DataKind,
  config: SelectorConfig,
  registry: ProviderRegistry
): ProviderDescriptor | undefined {
  const preferred: Array<ProviderName | undefined> = [
    config.cloudProvider ? CLOUD_DEFAULTS[config.cloudProvider] : undefined,
    isDemDataKind(dataKind) ? config.providers.demSource : undefined,
    config.providers.preferences[dataKind],
  ];

  for (const name of preferred) {
    if (name === undefined) continue;
    const descriptor = registry.getProvider(name);
    if (descriptor.supportedDataKinds.has(dataKind)) {
      return descriptor;
    }
  }
  return undefined;
}

/**
 * Ordered candidate providers for a request
 *
 * @throws {UnknownProviderError} when the request names an unknown provider
 * @throws {NoProviderAvailableError} when no supporting provider has its credentials
 */
export function selectCandidates(
  request: Pick<DataRequest, 'dataKind' | 'provider'>,
  config: SelectorConfig,
  registry: ProviderRegistry = providerRegistry
): ProviderDescriptor[] {
  const { dataKind } = request;

  if (request.provider !== undefined) {
    return [registry.getProvider(request.provider)];
  }

  const forced = config.providers.overrides[dataKind];
  if (forced !== undefined) {
    return [registry.getProvider(forced)];
  }

  const supporting = registry.providersFor(dataKind);
  const primary = primaryCandidate(dataKind, config, registry);
  const ordered = primary
    ? [primary, ...supporting.filter((descriptor) => descriptor.name !== primary.name)]
    : supporting;

  const excluded: ExcludedProvider[] = [];
  const eligible = ordered.filter((descriptor) => {
    const missing = missingCredentials(descriptor, config.credentials);
    if (missing.length > 0) {
      excluded.push({ provider: descriptor.name, missingCredentials: missing });
      return false;
    }
    return true;
  });

  if (eligible.length === 0) {
    throw new NoProviderAvailableError(dataKind, excluded);
  }
  return eligible;
}
