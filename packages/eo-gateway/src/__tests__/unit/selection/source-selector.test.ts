/**
 * Candidate ordering and credential filtering
 */

import { describe, it, expect } from 'vitest';
import { NoProviderAvailableError } from '../../../core/errors.js';
import type { DataKind, ProviderName } from '../../../core/types.js';
import { providerRegistry } from '../../../providers/registry.js';
import { missingCredentials, selectCandidates } from '../../../selection/source-selector.js';
import type { ConfigOverrides, Environment } from '../../../config/gateway-config.js';
import { ALL_CREDENTIALS, createTestConfig } from '../../utils/mocks.js';

function candidates(
  dataKind: DataKind,
  env: Environment = ALL_CREDENTIALS,
  overrides?: ConfigOverrides,
  provider?: ProviderName
): ProviderName[] {
  return selectCandidates({ dataKind, provider }, createTestConfig(env, overrides)).map((d) => d.name);
}

describe('selectCandidates', () => {
  it('should order supporting providers by rank', () => {
    expect(candidates('Sentinel2L1C')).toEqual(['aws', 'creodias', 'federated']);
    expect(candidates('DemSRTM1s')).toEqual(['ewoc', 'creodias', 'esa']);
  });

  it('should put the cloud-context provider first', () => {
    expect(candidates('Sentinel2L1C', ALL_CREDENTIALS, { cloudProvider: 'creodias' })).toEqual([
      'creodias',
      'aws',
      'federated',
    ]);
  });

  it('should ignore a cloud default that cannot serve the kind', () => {
    expect(candidates('DemSRTM1s', ALL_CREDENTIALS, { cloudProvider: 'aws' })).toEqual(['ewoc', 'creodias', 'esa']);
  });

  it('should apply the DEM source to DEM kinds only', () => {
    const env = { ...ALL_CREDENTIALS, EWOC_DEM_SOURCE: 'esa' };
    expect(candidates('DemSRTM1s', env)).toEqual(['esa', 'ewoc', 'creodias']);
    expect(candidates('Sentinel1', env)).toEqual(['aws', 'creodias', 'federated']);
  });

  it('should apply per-kind preferences', () => {
    expect(candidates('Landsat8', { ...ALL_CREDENTIALS, EWOC_L8_PROVIDER: 'federated' })).toEqual(['federated', 'aws']);
  });

  it('should return a forced provider alone', () => {
    expect(candidates('Sentinel1', { EWOC_FORCE_SENTINEL1: 'federated' })).toEqual(['federated']);
  });

  it('should return an explicit provider alone, without checking credentials', () => {
    expect(candidates('Sentinel1', {}, undefined, 'aws')).toEqual(['aws']);
  });

  it('should drop providers without credentials, the primary included', () => {
    expect(candidates('Sentinel2L1C', { EWOC_SEARCH_TOKEN: 'test-token' }, { cloudProvider: 'aws' })).toEqual([
      'creodias',
      'federated',
    ]);
  });

  it('should name every excluded provider when none is left', () => {
    expect(() => candidates('Landsat8', {})).toThrow(NoProviderAvailableError);
    expect(() => candidates('Landsat8', {})).toThrow(
      'No provider available for Landsat8: aws (missing AWS_ACCESS_KEY_ID, AWS_SECRET_ACCESS_KEY); federated (missing EWOC_SEARCH_TOKEN)'
    );
  });
});

describe('missingCredentials', () => {
  it('should treat blank values as missing', () => {
    expect(
      missingCredentials(providerRegistry.getProvider('aws'), { AWS_ACCESS_KEY_ID: 'test-aws-key', AWS_SECRET_ACCESS_KEY: ' ' })
    ).toEqual(['AWS_SECRET_ACCESS_KEY']);
  });
});
