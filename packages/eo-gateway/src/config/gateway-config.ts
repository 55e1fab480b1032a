/**
 * EO Gateway Configuration
 *
 * Loads configuration from .eo-gatewayrc (YAML) with environment variable
 * overrides and defaults, and validates it with zod.
 *
 * Configuration precedence (highest to lowest):
 * 1. Command-line options
 * 2. Environment variables (EWOC_*, EO_GATEWAY_*, credential variables)
 * 3. Config file (.eo-gatewayrc or --config path)
 * 4. Default values
 *
 * resolveConfig() is pure: it takes the environment as an argument so provider
 * selection can be tested without touching process.env. loadConfig() feeds it
 * the real environment and the discovered file.
 *
 * @module config/gateway-config
 */

import { existsSync, readFileSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { ConfigError } from '../core/errors.js';
import {
  DATA_KINDS,
  isDataKind,
  type CredentialSet,
  type DataKind,
  type ProviderName,
} from '../core/types.js';
import { providerRegistry, type ProviderRegistry } from '../providers/registry.js';
import { DEFAULT_ENDPOINTS } from './endpoints.js';

// ============================================================================
// Configuration Types
// ============================================================================

/**
 * Cloud the process runs in; selects bucket-family defaults
 */
export type CloudProvider = 'aws' | 'creodias';

export type ProviderByKind = Readonly<Partial<Record<DataKind, ProviderName>>>;

export interface ProvidersConfig {
  /** Forced provider per kind: no fallback */
  readonly overrides: ProviderByKind;
  /** Preferred first candidate per kind */
  readonly preferences: ProviderByKind;
  /** Preferred first candidate for DEM kinds */
  readonly demSource?: ProviderName;
  /** Serve Sentinel-2 L2A from the COG bucket instead of the SAFE-like layout */
  readonly s2L2aCogs: boolean;
}

export interface EndpointsConfig {
  /** S3 endpoint of the EWoC private buckets */
  readonly ewoc: string;
  /** S3 endpoint of the DIAS eodata bucket */
  readonly creodias: string;
  /** STAC API root of the federated search service */
  readonly search: string;
  /** Base URL of the SRTM 1s archive on the ESA website */
  readonly esaDem: string;
}

export interface GatewayConfig {
  readonly version: 1;
  readonly cloudProvider?: CloudProvider;
  readonly providers: ProvidersConfig;
  /** Switches the upload archive to its development namespace */
  readonly devMode: boolean;
  readonly credentials: CredentialSet;
  readonly endpoints: EndpointsConfig;
  /** Bound for a single provider attempt */
  readonly attemptTimeoutMs: number;
  /** Retries of a transient HTTP failure within one attempt */
  readonly httpRetries: number;

  // Runtime flags
  readonly verbose: boolean;
  readonly json: boolean;
  readonly configPath: string | null;
}

export type Environment = Readonly<Record<string, string | undefined>>;

export interface ConfigOverrides {
  readonly verbose?: boolean;
  readonly json?: boolean;
  readonly timeout?: number;
  readonly cloudProvider?: CloudProvider;
  readonly devMode?: boolean;
}

// ============================================================================
// Config File Schema
// ============================================================================

const providerMapSchema = z.record(z.string(), z.string());

const configFileSchema = z
  .object({
    version: z.literal(1).optional(),
    cloud_provider: z.enum(['aws', 'creodias']).optional(),
    dev_mode: z.boolean().optional(),
    providers: z
      .object({
        overrides: providerMapSchema.optional(),
        preferences: providerMapSchema.optional(),
        dem_source: z.string().optional(),
        s2_l2a_cogs: z.boolean().optional(),
      })
      .strict()
      .optional(),
    credentials: z.record(z.string(), z.string()).optional(),
    endpoints: z
      .object({
        ewoc: z.string().url().optional(),
        creodias: z.string().url().optional(),
        search: z.string().url().optional(),
        esa_dem: z.string().url().optional(),
      })
      .strict()
      .optional(),
    defaults: z
      .object({
        timeout: z.number().int().positive().optional(),
        http_retries: z.number().int().nonnegative().optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

export type ConfigFile = z.infer<typeof configFileSchema>;

// ============================================================================
// Defaults
// ============================================================================

export const DEFAULT_ATTEMPT_TIMEOUT_MS = 10 * 60 * 1000;
export const DEFAULT_HTTP_RETRIES = 2;

const CLOUD_PROVIDERS: readonly CloudProvider[] = ['aws', 'creodias'];

/**
 * Per-kind preference variables and the kinds they set
 */
const PREFERENCE_ENV: ReadonlyArray<readonly [string, readonly DataKind[]]> = [
  ['EWOC_S1_PROVIDER', ['Sentinel1']],
  ['EWOC_S2_PROVIDER', ['Sentinel2L1C', 'Sentinel2L2A']],
  ['EWOC_L8_PROVIDER', ['Landsat8']],
];

/**
 * Environment variable forcing the provider of one kind, e.g. EWOC_FORCE_DEMCOP1S
 */
export function overrideEnvVar(kind: DataKind): string {
  return `EWOC_FORCE_${kind.toUpperCase()}`;
}

// ============================================================================
// Parsing Helpers
// ============================================================================

function parseBool(value: string | undefined): boolean | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on', 'y', 't'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'off', 'n', 'f'].includes(normalized)) return false;
  throw new ConfigError(`Invalid boolean value "${value}"`);
}

function parsePositiveInt(name: string, value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  const num = parseInt(value, 10);
  if (isNaN(num) || num <= 0) {
    throw new ConfigError(`${name} must be a positive integer, got "${value}"`);
  }
  return num;
}

function parseNonNegativeInt(name: string, value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  const text = value.trim();
  if (!/^\d+$/.test(text)) {
    throw new ConfigError(`${name} must be a non-negative integer, got "${value}"`);
  }
  return parseInt(text, 10);
}

function nonEmpty(value: string | undefined): string | undefined {
  return value !== undefined && value.trim() !== '' ? value.trim() : undefined;
}

function parseCloudProvider(value: string | undefined): CloudProvider | undefined {
  const text = nonEmpty(value)?.toLowerCase();
  if (text === undefined) return undefined;
  const found = CLOUD_PROVIDERS.find((p) => p === text);
  if (!found) {
    throw new ConfigError(`Unsupported cloud provider "${value}" (expected ${CLOUD_PROVIDERS.join(', ')})`);
  }
  return found;
}

function toProviderName(registry: ProviderRegistry, value: string): ProviderName {
  return registry.getProvider(value.trim().toLowerCase()).name;
}

function toProviderMap(
  registry: ProviderRegistry,
  source: Readonly<Record<string, string>> | undefined,
  label: string
): Partial<Record<DataKind, ProviderName>> {
  const result: Partial<Record<DataKind, ProviderName>> = {};
  for (const [kind, provider] of Object.entries(source ?? {})) {
    if (!isDataKind(kind)) {
      throw new ConfigError(`Unknown data kind "${kind}" in ${label} (expected one of ${DATA_KINDS.join(', ')})`);
    }
    result[kind] = toProviderName(registry, provider);
  }
  return result;
}

// ============================================================================
// Resolution
// ============================================================================

export interface ResolveConfigOptions {
  readonly env: Environment;
  readonly file?: unknown;
  readonly configPath?: string | null;
  readonly overrides?: ConfigOverrides;
  readonly registry?: ProviderRegistry;
}

/**
 * Merge defaults, config file, environment and CLI overrides
 *
 * @throws {ConfigError} for malformed files or values
 * @throws {UnknownProviderError} when any setting names an unknown provider
 */
export function resolveConfig(options: ResolveConfigOptions): GatewayConfig {
  const registry = options.registry ?? providerRegistry;
  const env = options.env;

  const parsed = configFileSchema.safeParse(options.file ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid config file${options.configPath ? ` ${options.configPath}` : ''}: ${issues}`);
  }
  const file = parsed.data;

  // Provider preferences: env over file
  const preferences = toProviderMap(registry, file.providers?.preferences, 'providers.preferences');
  for (const [variable, kinds] of PREFERENCE_ENV) {
    const value = nonEmpty(env[variable]);
    if (value === undefined) continue;
    const provider = toProviderName(registry, value);
    for (const kind of kinds) preferences[kind] = provider;
  }

  // Forced providers: env over file
  const overrides = toProviderMap(registry, file.providers?.overrides, 'providers.overrides');
  for (const kind of DATA_KINDS) {
    const value = nonEmpty(env[overrideEnvVar(kind)]);
    if (value !== undefined) overrides[kind] = toProviderName(registry, value);
  }

  const demSourceText =
    nonEmpty(env.EWOC_DEM_SOURCE) ?? nonEmpty(env.EWOC_COPDEM_SOURCE) ?? file.providers?.dem_source;
  const demSource = demSourceText !== undefined ? toProviderName(registry, demSourceText) : undefined;

  // Credentials: env over file, empty values dropped
  const credentials: Record<string, string> = {};
  for (const [key, value] of Object.entries(file.credentials ?? {})) {
    const text = nonEmpty(value);
    if (text !== undefined) credentials[key] = text;
  }
  for (const key of registry.credentialKeys()) {
    const text = nonEmpty(env[key]);
    if (text !== undefined) credentials[key] = text;
  }

  return {
    version: 1,
    cloudProvider:
      options.overrides?.cloudProvider ??
      parseCloudProvider(env.EWOC_CLOUD_PROVIDER) ??
      file.cloud_provider,
    providers: {
      overrides: Object.freeze(overrides),
      preferences: Object.freeze(preferences),
      demSource,
      s2L2aCogs: parseBool(env.EWOC_S2_L2A_COGS) ?? file.providers?.s2_l2a_cogs ?? true,
    },
    devMode: options.overrides?.devMode ?? parseBool(env.EWOC_DEV_MODE) ?? file.dev_mode ?? false,
    credentials: Object.freeze(credentials),
    endpoints: {
      ewoc: nonEmpty(env.EWOC_S3_ENDPOINT) ?? file.endpoints?.ewoc ?? DEFAULT_ENDPOINTS.ewoc,
      creodias:
        nonEmpty(env.EWOC_CREODIAS_ENDPOINT) ?? file.endpoints?.creodias ?? DEFAULT_ENDPOINTS.creodias,
      search: nonEmpty(env.EWOC_SEARCH_URL) ?? file.endpoints?.search ?? DEFAULT_ENDPOINTS.search,
      esaDem: nonEmpty(env.EWOC_ESA_DEM_URL) ?? file.endpoints?.esa_dem ?? DEFAULT_ENDPOINTS.esaDem,
    },
    attemptTimeoutMs:
      options.overrides?.timeout ??
      parsePositiveInt('EO_GATEWAY_TIMEOUT', env.EO_GATEWAY_TIMEOUT) ??
      file.defaults?.timeout ??
      DEFAULT_ATTEMPT_TIMEOUT_MS,
    httpRetries:
      parseNonNegativeInt('EO_GATEWAY_HTTP_RETRIES', env.EO_GATEWAY_HTTP_RETRIES) ??
      file.defaults?.http_retries ??
      DEFAULT_HTTP_RETRIES,
    verbose: options.overrides?.verbose ?? parseBool(env.EO_GATEWAY_VERBOSE) ?? false,
    json: options.overrides?.json ?? parseBool(env.EO_GATEWAY_JSON) ?? false,
    configPath: options.configPath ?? null,
  };
}

// ============================================================================
// Config File Discovery
// ============================================================================

const CONFIG_FILE_NAMES = [
  '.eo-gatewayrc',
  '.eo-gatewayrc.yaml',
  '.eo-gatewayrc.yml',
  '.eo-gatewayrc.json',
];

/**
 * Find config file in the directory or its parents
 */
export function findConfigFile(startDir: string): string | null {
  let dir = resolve(startDir);

  for (;;) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const filePath = join(dir, fileName);
      if (existsSync(filePath)) {
        return filePath;
      }
    }
    const parent = resolve(dir, '..');
    if (parent === dir) return null;
    dir = parent;
  }
}

/**
 * Parse config file content (YAML also accepts plain JSON)
 */
export function parseConfigFile(filePath: string): unknown {
  const content = readFileSync(filePath, 'utf-8');
  try {
    return filePath.endsWith('.json') ? JSON.parse(content) : parseYaml(content);
  } catch (error) {
    throw new ConfigError(
      `Cannot parse config file ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error }
    );
  }
}

export interface LoadConfigOptions {
  /** Explicit config file path */
  readonly configPath?: string;
  /** CLI flag overrides */
  readonly overrides?: ConfigOverrides;
  /** Defaults to process.env */
  readonly env?: Environment;
  /** Directory where the config file search starts; defaults to process.cwd() */
  readonly cwd?: string;
}

/**
 * Load and merge configuration from all sources
 */
export function loadConfig(options: LoadConfigOptions = {}): GatewayConfig {
  const env = options.env ?? process.env;
  let configPath: string | null = null;
  let file: unknown = {};

  if (options.configPath) {
    configPath = resolve(options.configPath);
    if (!existsSync(configPath)) {
      throw new ConfigError(`Config file not found: ${configPath}`);
    }
    file = parseConfigFile(configPath);
  } else {
    const envConfigPath = nonEmpty(env.EO_GATEWAY_CONFIG);
    if (envConfigPath) {
      configPath = resolve(envConfigPath);
      if (!existsSync(configPath)) {
        throw new ConfigError(`Config file not found: ${configPath} (from EO_GATEWAY_CONFIG)`);
      }
      file = parseConfigFile(configPath);
    } else {
      configPath = findConfigFile(options.cwd ?? process.cwd());
      if (configPath) {
        file = parseConfigFile(configPath);
      }
    }
  }

  return resolveConfig({ env, file: file ?? {}, configPath, overrides: options.overrides });
}
