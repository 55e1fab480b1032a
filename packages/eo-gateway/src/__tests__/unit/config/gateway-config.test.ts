/**
 * Configuration loading and precedence
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { join } from 'node:path';
import {
  DEFAULT_ATTEMPT_TIMEOUT_MS,
  DEFAULT_HTTP_RETRIES,
  findConfigFile,
  loadConfig,
  overrideEnvVar,
  resolveConfig,
} from '../../../config/gateway-config.js';
import { ConfigError, UnknownProviderError } from '../../../core/errors.js';
import { makeTempDir, removeDir, writeTree } from '../../utils/mocks.js';

describe('resolveConfig', () => {
  it('should apply defaults', () => {
    const config = resolveConfig({ env: {} });

    expect(config.attemptTimeoutMs).toBe(DEFAULT_ATTEMPT_TIMEOUT_MS);
    expect(config.httpRetries).toBe(DEFAULT_HTTP_RETRIES);
    expect(config.devMode).toBe(false);
    expect(config.cloudProvider).toBeUndefined();
    expect(config.providers.s2L2aCogs).toBe(true);
    expect(config.endpoints.search).toBe('https://earth-search.aws.element84.com/v1');
    expect(config.credentials).toEqual({});
  });

  it('should name override variables after the kind', () => {
    expect(overrideEnvVar('DemCOP1s')).toBe('EWOC_FORCE_DEMCOP1S');
  });

  it('should prefer the environment over the file', () => {
    const config = resolveConfig({
      env: { EWOC_S2_PROVIDER: 'CREODIAS', EWOC_FORCE_DEMCOP1S: 'aws', EO_GATEWAY_TIMEOUT: '2000' },
      file: {
        providers: { preferences: { Sentinel2L1C: 'aws', Landsat8: 'federated' } },
        defaults: { timeout: 5000 },
      },
    });

    expect(config.providers.preferences).toEqual({
      Sentinel2L1C: 'creodias',
      Sentinel2L2A: 'creodias',
      Landsat8: 'federated',
    });
    expect(config.providers.overrides).toEqual({ DemCOP1s: 'aws' });
    expect(config.attemptTimeoutMs).toBe(2000);
  });

  it('should read HTTP retries from the environment or the file', () => {
    expect(resolveConfig({ env: {}, file: { defaults: { http_retries: 5 } } }).httpRetries).toBe(5);
    expect(
      resolveConfig({ env: { EO_GATEWAY_HTTP_RETRIES: '0' }, file: { defaults: { http_retries: 5 } } }).httpRetries
    ).toBe(0);
    expect(() => resolveConfig({ env: { EO_GATEWAY_HTTP_RETRIES: '1.5' } })).toThrow(
      'EO_GATEWAY_HTTP_RETRIES must be a non-negative integer, got "1.5"'
    );
  });

  it('should prefer command-line overrides over the environment', () => {
    const config = resolveConfig({
      env: { EO_GATEWAY_TIMEOUT: '2000', EWOC_DEV_MODE: 'no', EWOC_CLOUD_PROVIDER: 'creodias' },
      overrides: { timeout: 100, devMode: true, cloudProvider: 'aws' },
    });

    expect(config.attemptTimeoutMs).toBe(100);
    expect(config.devMode).toBe(true);
    expect(config.cloudProvider).toBe('aws');
  });

  it('should read the DEM source from either variable', () => {
    expect(resolveConfig({ env: { EWOC_COPDEM_SOURCE: 'aws' } }).providers.demSource).toBe('aws');
    expect(resolveConfig({ env: { EWOC_DEM_SOURCE: 'esa', EWOC_COPDEM_SOURCE: 'aws' } }).providers.demSource).toBe(
      'esa'
    );
  });

  it('should drop empty credentials and let the environment win', () => {
    const config = resolveConfig({
      env: { AWS_ACCESS_KEY_ID: 'test-aws-key', AWS_SECRET_ACCESS_KEY: ' ' },
      file: { credentials: { AWS_ACCESS_KEY_ID: 'file-key', AWS_SECRET_ACCESS_KEY: 'test-secret' } },
    });

    expect(config.credentials).toEqual({
      AWS_ACCESS_KEY_ID: 'test-aws-key',
      AWS_SECRET_ACCESS_KEY: 'test-secret',
    });
  });

  it('should fail fast on unknown providers', () => {
    expect(() => resolveConfig({ env: { EWOC_FORCE_SENTINEL1: 'nasa' } })).toThrow(UnknownProviderError);
    expect(() => resolveConfig({ env: {}, file: { providers: { dem_source: 'nasa' } } })).toThrow(
      UnknownProviderError
    );
  });

  it('should reject unknown data kinds in provider maps', () => {
    expect(() => resolveConfig({ env: {}, file: { providers: { overrides: { Sentinel9: 'aws' } } } })).toThrow(
      'Unknown data kind "Sentinel9" in providers.overrides'
    );
  });

  it('should reject malformed files and values', () => {
    expect(() => resolveConfig({ env: {}, file: { colour: 'blue' } })).toThrow(ConfigError);
    expect(() => resolveConfig({ env: { EO_GATEWAY_TIMEOUT: '-1' } })).toThrow(
      'EO_GATEWAY_TIMEOUT must be a positive integer, got "-1"'
    );
    expect(() => resolveConfig({ env: { EWOC_DEV_MODE: 'maybe' } })).toThrow('Invalid boolean value "maybe"');
    expect(() => resolveConfig({ env: { EWOC_CLOUD_PROVIDER: 'gcp' } })).toThrow(ConfigError);
  });
});

describe('loadConfig', () => {
  let root: string;

  beforeEach(async () => {
    root = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(root);
  });

  it('should discover a YAML file in a parent directory', async () => {
    await writeTree(root, {
      '.eo-gatewayrc': 'version: 1\ndev_mode: true\nproviders:\n  overrides:\n    DemSRTM1s: esa\n',
      'work/placeholder': '',
    });

    const config = loadConfig({ env: {}, cwd: join(root, 'work') });

    expect(findConfigFile(join(root, 'work'))).toBe(join(root, '.eo-gatewayrc'));
    expect(config.configPath).toBe(join(root, '.eo-gatewayrc'));
    expect(config.devMode).toBe(true);
    expect(config.providers.overrides).toEqual({ DemSRTM1s: 'esa' });
  });

  it('should read an explicit JSON file', async () => {
    await writeTree(root, { 'gateway.json': JSON.stringify({ cloud_provider: 'creodias' }) });

    const config = loadConfig({ env: {}, configPath: join(root, 'gateway.json') });

    expect(config.cloudProvider).toBe('creodias');
  });

  it('should fail when the named file is missing', () => {
    expect(() => loadConfig({ env: {}, configPath: join(root, 'absent.yaml') })).toThrow(
      `Config file not found: ${join(root, 'absent.yaml')}`
    );
    expect(() => loadConfig({ env: { EO_GATEWAY_CONFIG: join(root, 'absent.yaml') } })).toThrow(
      '(from EO_GATEWAY_CONFIG)'
    );
  });

  it('should report unparsable files as ConfigError', async () => {
    await writeTree(root, { 'broken.json': '{ "version": ' });

    expect(() => loadConfig({ env: {}, configPath: join(root, 'broken.json') })).toThrow(ConfigError);
  });
});
