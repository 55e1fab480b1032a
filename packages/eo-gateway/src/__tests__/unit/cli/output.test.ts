import { describe, it, expect } from 'vitest';
import {
  ConfigError,
  InvalidTileIDError,
  PartialUploadError,
  ProviderTimeoutError,
  RetrievalCancelledError,
  RetrievalExhaustedError,
  UploadSourceError,
} from '../../../core/errors.js';
import { EXIT_CODES, errorReport, exitCodeFor, formatError, formatProduct, formatTable } from '../../../cli/lib/output.js';

const exhausted = new RetrievalExhaustedError('31TCJ', [
  { provider: 'aws', kind: 'ObjectNotFound', message: 'Object not found: sentinel-s2-l1c/tiles/31/T/CJ/' },
  { provider: 'federated', kind: 'ProviderTimeout', message: 'Attempt against federated timed out after 50ms' },
]);

describe('exitCodeFor', () => {
  it('should map error kinds to exit codes', () => {
    expect(exitCodeFor(new InvalidTileIDError('99ZZZ', 'bad zone'))).toBe(EXIT_CODES.INPUT_ERROR);
    expect(exitCodeFor(new UploadSourceError('/tmp/x', 'no such file'))).toBe(EXIT_CODES.INPUT_ERROR);
    expect(exitCodeFor(new ConfigError('bad yaml'))).toBe(EXIT_CODES.CONFIG_ERROR);
    expect(exitCodeFor(new ProviderTimeoutError('aws', 50))).toBe(EXIT_CODES.NETWORK_ERROR);
    expect(exitCodeFor(new RetrievalCancelledError('31TCJ', []))).toBe(EXIT_CODES.USER_CANCELLED);
    expect(exitCodeFor(exhausted)).toBe(EXIT_CODES.ERRORS);
    expect(exitCodeFor(new PartialUploadError('ewoc-ard', ['a'], 'b', new Error('x')))).toBe(EXIT_CODES.ERRORS);
  });

  it('should treat unknown failures as errors', () => {
    expect(exitCodeFor(new Error('boom'))).toBe(2);
    expect(exitCodeFor('boom')).toBe(2);
  });
});

describe('errorReport', () => {
  it('should carry the attempts of an exhausted retrieval', () => {
    expect(errorReport(exhausted)).toEqual({
      success: false,
      error: {
        kind: 'RetrievalExhausted',
        message: 'All 2 provider(s) failed for 31TCJ',
        attempts: exhausted.failures,
      },
    });
  });

  it('should report non-gateway errors as internal', () => {
    expect(errorReport(new Error('boom'))).toEqual({
      success: false,
      error: { kind: 'InternalError', message: 'boom' },
    });
  });
});

describe('formatError', () => {
  it('should print one line per failed provider', () => {
    expect(formatError(exhausted).split('\n')).toEqual([
      'Error [RetrievalExhausted]: All 2 provider(s) failed for 31TCJ',
      '  1. aws: [ObjectNotFound] Object not found: sentinel-s2-l1c/tiles/31/T/CJ/',
      '  2. federated: [ProviderTimeout] Attempt against federated timed out after 50ms',
    ]);
  });

  it('should print a single line otherwise', () => {
    expect(formatError(new ConfigError('bad yaml'))).toBe('Error [ConfigError]: bad yaml');
  });
});

describe('formatTable', () => {
  it('should align columns', () => {
    const table = formatTable(
      [
        { name: 'a', size: 10 },
        { name: 'bbb', size: 2 },
      ],
      [
        { key: 'name', header: 'Name' },
        { key: 'size', header: 'Size', align: 'right' },
      ]
    );

    expect(table.split('\n')).toEqual(['Name | Size', '-----+-----', 'a    |   10', 'bbb  |    2']);
  });

  it('should truncate cells wider than a fixed width', () => {
    const table = formatTable([{ id: 'abcdef' }], [{ key: 'id', header: 'Id', width: 3 }]);

    expect(table.split('\n')[2]).toBe('ab~');
  });

  it('should say when there are no rows', () => {
    expect(formatTable([], [{ key: 'id', header: 'Id' }])).toBe('No entries found.');
  });
});

describe('formatProduct', () => {
  const product = {
    localPath: '/data/x',
    sourceProvider: 'aws' as const,
    byteSize: 2048,
    retrievedAt: new Date('2021-07-14T00:00:00Z'),
    files: ['a.tif', 'b.tif'],
  };

  it('should list the product fields', () => {
    expect(formatProduct(product).split('\n')).toEqual([
      'Field    | Value  ',
      '---------+--------',
      'Provider | aws    ',
      'Path     | /data/x',
      'Files    | 2      ',
      'Size     | 2.00 KB',
    ]);
  });

  it('should add the checksum when present', () => {
    const lines = formatProduct({ ...product, checksum: 'abc' }).split('\n');

    expect(lines).toHaveLength(7);
    expect(lines[6]).toBe('SHA-256  | abc    ');
  });
});
