/**
 * EO Gateway Error Types
 *
 * Every failure the gateway raises carries a `kind` from a closed taxonomy so
 * callers (and the CLI) can branch on it without string matching.
 *
 * Families:
 * - Input errors (InvalidTileID, EmptyFootprint, InvalidProductID): caller
 *   mistakes, raised before any network call.
 * - Configuration errors (UnknownProvider, NoProviderAvailable, ConfigError):
 *   need operator action.
 * - Provider-local errors (ObjectNotFound, InvalidKeyPattern, ProviderNetwork,
 *   ProviderTimeout, ProviderAccessDenied, UnsupportedDataKind): converted into
 *   fallback signals by the orchestrator and recorded for the exhaustion report.
 * - Terminal / destination errors (RetrievalExhausted, RetrievalCancelled,
 *   InvalidOutputTarget, UploadDenied, PartialUpload, UploadSourceError).
 */

import type { DataKind, ProviderName } from './types.js';

export type GatewayErrorKind =
  | 'InvalidTileID'
  | 'EmptyFootprint'
  | 'InvalidProductID'
  | 'UnknownProvider'
  | 'NoProviderAvailable'
  | 'ConfigError'
  | 'ObjectNotFound'
  | 'InvalidKeyPattern'
  | 'ProviderNetworkError'
  | 'ProviderTimeout'
  | 'ProviderAccessDenied'
  | 'UnsupportedDataKind'
  | 'RetrievalExhausted'
  | 'RetrievalCancelled'
  | 'InvalidOutputTarget'
  | 'UploadDenied'
  | 'PartialUpload'
  | 'UploadSourceError';

// ============================================================================
// Base Class
// ============================================================================

export abstract class GatewayError extends Error {
  abstract readonly kind: GatewayErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;

    // Maintain proper stack trace for where error was thrown (V8 only)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  /**
   * Single-line rendering used by loggers and the CLI
   */
  toLogString(): string {
    return `${this.kind}: ${this.message}`;
  }
}

// ============================================================================
// Input Errors
// ============================================================================

export class InvalidTileIDError extends GatewayError {
  readonly kind = 'InvalidTileID';

  constructor(
    public readonly tileId: string,
    public readonly reason: string
  ) {
    super(`Invalid tile identifier "${tileId}": ${reason}`);
  }
}

export class EmptyFootprintError extends GatewayError {
  readonly kind = 'EmptyFootprint';

  constructor(public readonly bbox: readonly number[]) {
    super(`Footprint has zero area: [${bbox.join(', ')}]`);
  }
}

export class InvalidProductIDError extends GatewayError {
  readonly kind = 'InvalidProductID';

  constructor(
    public readonly productId: string,
    public readonly reason: string
  ) {
    super(`Invalid product identifier "${productId}": ${reason}`);
  }
}

// ============================================================================
// Configuration Errors
// ============================================================================

export class UnknownProviderError extends GatewayError {
  readonly kind = 'UnknownProvider';

  constructor(public readonly providerName: string) {
    super(`Unknown provider "${providerName}"`);
  }
}

/**
 * Provider that supports the data kind but was dropped for missing credentials
 */
export interface ExcludedProvider {
  readonly provider: ProviderName;
  readonly missingCredentials: readonly string[];
}

export class NoProviderAvailableError extends GatewayError {
  readonly kind = 'NoProviderAvailable';

  constructor(
    public readonly dataKind: DataKind,
    public readonly excluded: readonly ExcludedProvider[]
  ) {
    const detail =
      excluded.length > 0
        ? excluded
            .map((e) => `${e.provider} (missing ${e.missingCredentials.join(', ')})`)
            .join('; ')
        : 'no provider supports this data kind';
    super(`No provider available for ${dataKind}: ${detail}`);
  }
}

export class ConfigError extends GatewayError {
  readonly kind = 'ConfigError';
}

// ============================================================================
// Provider-Local Errors
// ============================================================================

export class ObjectNotFoundError extends GatewayError {
  readonly kind = 'ObjectNotFound';

  constructor(
    public readonly location: string,
    public readonly key: string
  ) {
    super(`Object not found: ${location}/${key}`);
  }
}

export class InvalidKeyPatternError extends GatewayError {
  readonly kind = 'InvalidKeyPattern';

  constructor(
    public readonly layout: string,
    reason: string
  ) {
    super(`Cannot build ${layout} key: ${reason}`);
  }
}

export class ProviderNetworkError extends GatewayError {
  readonly kind = 'ProviderNetworkError';

  constructor(
    public readonly target: string,
    cause: unknown
  ) {
    super(
      `Network failure reaching ${target}: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause }
    );
  }
}

export class ProviderTimeoutError extends GatewayError {
  readonly kind = 'ProviderTimeout';

  constructor(
    public readonly provider: ProviderName,
    public readonly timeoutMs: number
  ) {
    super(`Attempt against ${provider} timed out after ${timeoutMs}ms`);
  }
}

export class ProviderAccessDeniedError extends GatewayError {
  readonly kind = 'ProviderAccessDenied';

  constructor(
    public readonly target: string,
    cause?: unknown
  ) {
    super(`Access denied to ${target}`, { cause });
  }
}

export class UnsupportedDataKindError extends GatewayError {
  readonly kind = 'UnsupportedDataKind';

  constructor(
    public readonly provider: ProviderName,
    public readonly dataKind: DataKind,
    detail?: string
  ) {
    super(`${provider} cannot serve ${dataKind}${detail ? ` (${detail})` : ''}`);
  }
}

// ============================================================================
// Terminal Errors
// ============================================================================

/**
 * Why one candidate provider failed
 */
export interface AttemptFailure {
  readonly provider: ProviderName;
  readonly kind: GatewayErrorKind | 'ProviderFailure';
  readonly message: string;
}

export class RetrievalExhaustedError extends GatewayError {
  readonly kind = 'RetrievalExhausted';

  constructor(
    public readonly subject: string,
    public readonly failures: readonly AttemptFailure[]
  ) {
    super(`All ${failures.length} provider(s) failed for ${subject}`);
  }

  /**
   * One line per attempted provider, in candidate order
   */
  getSummary(): string {
    const lines = [this.message];
    this.failures.forEach((failure, index) => {
      lines.push(`  ${index + 1}. ${failure.provider}: [${failure.kind}] ${failure.message}`);
    });
    return lines.join('\n');
  }

  override toLogString(): string {
    return `${this.kind}: ${this.getSummary()}`;
  }
}

export class RetrievalCancelledError extends GatewayError {
  readonly kind = 'RetrievalCancelled';

  constructor(
    public readonly subject: string,
    public readonly attempted: readonly AttemptFailure[]
  ) {
    super(`Retrieval of ${subject} cancelled after ${attempted.length} attempt(s)`);
  }
}

export class InvalidOutputTargetError extends GatewayError {
  readonly kind = 'InvalidOutputTarget';

  constructor(
    public readonly path: string,
    public readonly reason: string
  ) {
    super(`Invalid output directory "${path}": ${reason}`);
  }
}

export class UploadDeniedError extends GatewayError {
  readonly kind = 'UploadDenied';

  constructor(
    public readonly bucket: string,
    public readonly key: string,
    cause?: unknown
  ) {
    super(`Upload to ${bucket}/${key} denied`, { cause });
  }
}

export class PartialUploadError extends GatewayError {
  readonly kind = 'PartialUpload';

  constructor(
    public readonly bucket: string,
    public readonly uploadedKeys: readonly string[],
    public readonly failedKey: string,
    cause: unknown
  ) {
    super(
      `Upload to ${bucket} interrupted at ${failedKey} after ${uploadedKeys.length} file(s): ${
        cause instanceof Error ? cause.message : String(cause)
      }`,
      { cause }
    );
  }
}

export class UploadSourceError extends GatewayError {
  readonly kind = 'UploadSourceError';

  constructor(
    public readonly path: string,
    public readonly reason: string
  ) {
    super(`Cannot upload "${path}": ${reason}`);
  }
}

// ============================================================================
// Type Guards
// ============================================================================

export function isGatewayError(error: unknown): error is GatewayError {
  return error instanceof GatewayError;
}

export function isRetrievalExhaustedError(error: unknown): error is RetrievalExhaustedError {
  return error instanceof RetrievalExhaustedError;
}

/**
 * Message of any thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * `code` of a Node.js system error (ENOENT, EACCES, ...)
 */
export function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
