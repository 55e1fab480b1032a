/**
 * Provider capability registry
 */

import { describe, it, expect } from 'vitest';
import { UnknownProviderError } from '../../../core/errors.js';
import { providerRegistry } from '../../../providers/registry.js';

describe('ProviderRegistry', () => {
  it('should list providers of a kind in rank order', () => {
    expect(providerRegistry.providersFor('DemSRTM1s').map((d) => d.name)).toEqual(['ewoc', 'creodias', 'esa']);
    expect(providerRegistry.providersFor('Sentinel2L2A').map((d) => d.name)).toEqual(['aws', 'creodias', 'federated']);
    expect(providerRegistry.providersFor('DemCOP3s').map((d) => d.name)).toEqual(['aws']);
  });

  it('should expose credential requirements', () => {
    expect(providerRegistry.requiredCredentials('aws')).toEqual(['AWS_ACCESS_KEY_ID', 'AWS_SECRET_ACCESS_KEY']);
    expect(providerRegistry.requiredCredentials('esa')).toEqual([]);
  });

  it('should reject unknown provider names', () => {
    expect(() => providerRegistry.getProvider('nasa')).toThrow(UnknownProviderError);
    expect(() => providerRegistry.getProvider('nasa')).toThrow('Unknown provider "nasa"');
  });

  it('should collect every credential key once', () => {
    expect(providerRegistry.credentialKeys()).toEqual([
      'EWOC_S3_ACCESS_KEY_ID',
      'EWOC_S3_SECRET_ACCESS_KEY',
      'AWS_ACCESS_KEY_ID',
      'AWS_SECRET_ACCESS_KEY',
      'EWOC_SEARCH_TOKEN',
    ]);
  });

  it('should be immutable', () => {
    const descriptor = providerRegistry.getProvider('creodias');

    expect(Object.isFrozen(providerRegistry)).toBe(true);
    expect(Object.isFrozen(descriptor)).toBe(true);
    expect(descriptor.availabilityClass).toBe('region-restricted');
  });
});
