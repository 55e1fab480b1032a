/**
 * Error taxonomy
 */

import { describe, it, expect } from 'vitest';
import {
  InvalidTileIDError,
  NoProviderAvailableError,
  RetrievalExhaustedError,
  errnoCode,
  isGatewayError,
} from '../../../core/errors.js';

describe('GatewayError', () => {
  it('should carry kind and class name', () => {
    const error = new InvalidTileIDError('31XXX', 'bad');

    expect(isGatewayError(error)).toBe(true);
    expect(error.kind).toBe('InvalidTileID');
    expect(error.name).toBe('InvalidTileIDError');
    expect(error.toLogString()).toBe('InvalidTileID: Invalid tile identifier "31XXX": bad');
  });
});

describe('NoProviderAvailableError', () => {
  it('should list excluded providers with their missing credentials', () => {
    const error = new NoProviderAvailableError('DemCOP1s', [
      { provider: 'ewoc', missingCredentials: ['EWOC_S3_ACCESS_KEY_ID'] },
    ]);
    expect(error.message).toBe('No provider available for DemCOP1s: ewoc (missing EWOC_S3_ACCESS_KEY_ID)');
  });
});

describe('RetrievalExhaustedError', () => {
  it('should summarise every attempt in order', () => {
    const error = new RetrievalExhaustedError('31TCJ', [
      { provider: 'aws', kind: 'ObjectNotFound', message: 'missing' },
      { provider: 'federated', kind: 'ProviderTimeout', message: 'slow' },
    ]);

    expect(error.getSummary()).toBe(
      [
        'All 2 provider(s) failed for 31TCJ',
        '  1. aws: [ObjectNotFound] missing',
        '  2. federated: [ProviderTimeout] slow',
      ].join('\n')
    );
  });
});

describe('errnoCode', () => {
  it('should read the code of system errors only', () => {
    expect(errnoCode(Object.assign(new Error('gone'), { code: 'ENOENT' }))).toBe('ENOENT');
    expect(errnoCode(new Error('plain'))).toBeUndefined();
  });
});
