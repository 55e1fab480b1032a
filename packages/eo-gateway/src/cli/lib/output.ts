/**
 * Output Formatting for CLI Commands
 *
 * Results go to stdout, errors to stderr. Every error is reported as one
 * `Error [<Kind>]: <message>` line (plus the per-provider reasons of an
 * exhausted retrieval), or as a single JSON document under `--json`.
 *
 * @module cli/lib/output
 */

import { isGatewayError, isRetrievalExhaustedError, errorMessage, type AttemptFailure } from '../../core/errors.js';
import type { MaterializedProduct } from '../../core/types.js';
import { formatBytes } from './logger.js';

// ============================================================================
// Exit Codes
// ============================================================================

export const EXIT_CODES = {
  SUCCESS: 0,
  ERRORS: 2,
  CONFIG_ERROR: 3,
  NETWORK_ERROR: 4,
  INPUT_ERROR: 5,
  USER_CANCELLED: 10,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

/**
 * Exit code of a failed command
 */
export function exitCodeFor(error: unknown): ExitCode {
  if (!isGatewayError(error)) return EXIT_CODES.ERRORS;

  switch (error.kind) {
    case 'InvalidTileID':
    case 'EmptyFootprint':
    case 'InvalidProductID':
    case 'InvalidOutputTarget':
    case 'UploadSourceError':
      return EXIT_CODES.INPUT_ERROR;
    case 'UnknownProvider':
    case 'NoProviderAvailable':
    case 'ConfigError':
      return EXIT_CODES.CONFIG_ERROR;
    case 'ObjectNotFound':
    case 'InvalidKeyPattern':
    case 'ProviderNetworkError':
    case 'ProviderTimeout':
    case 'ProviderAccessDenied':
    case 'UnsupportedDataKind':
      return EXIT_CODES.NETWORK_ERROR;
    case 'RetrievalCancelled':
      return EXIT_CODES.USER_CANCELLED;
    case 'RetrievalExhausted':
    case 'UploadDenied':
    case 'PartialUpload':
      return EXIT_CODES.ERRORS;
  }
}

// ============================================================================
// Error Reports
// ============================================================================

export interface ErrorReport {
  readonly success: false;
  readonly error: {
    readonly kind: string;
    readonly message: string;
    readonly attempts?: readonly AttemptFailure[];
  };
}

export function errorReport(error: unknown): ErrorReport {
  const kind = isGatewayError(error) ? error.kind : 'InternalError';
  const attempts = isRetrievalExhaustedError(error) ? error.failures : undefined;
  return {
    success: false,
    error: {
      kind,
      message: errorMessage(error),
      ...(attempts && { attempts }),
    },
  };
}

/**
 * Human rendering: the error line, then one line per failed provider
 */
export function formatError(error: unknown): string {
  const report = errorReport(error);
  const lines = [`Error [${report.error.kind}]: ${report.error.message}`];
  report.error.attempts?.forEach((attempt, index) => {
    lines.push(`  ${index + 1}. ${attempt.provider}: [${attempt.kind}] ${attempt.message}`);
  });
  return lines.join('\n');
}

// ============================================================================
// Tables
// ============================================================================

/**
 * Column definition for table output
 */
export interface TableColumn {
  readonly key: string;
  readonly header: string;
  readonly width?: number;
  readonly align?: 'left' | 'right';
  readonly formatter?: (value: unknown) => string;
}

function cellText(row: Readonly<Record<string, unknown>>, column: TableColumn): string {
  const value = row[column.key];
  return column.formatter ? column.formatter(value) : String(value ?? '');
}

/**
 * Format rows as an aligned text table
 */
export function formatTable(data: readonly Readonly<Record<string, unknown>>[], columns: readonly TableColumn[]): string {
  if (data.length === 0) {
    return 'No entries found.';
  }

  const widths = columns.map((column) => {
    if (column.width) return column.width;
    return Math.max(column.header.length, ...data.map((row) => cellText(row, column).length));
  });

  const headerRow = columns.map((column, i) => padCell(column.header, widths[i], column.align ?? 'left')).join(' | ');
  const separator = widths.map((w) => '-'.repeat(w)).join('-+-');
  const dataRows = data.map((row) =>
    columns.map((column, i) => padCell(cellText(row, column), widths[i], column.align ?? 'left')).join(' | ')
  );

  return [headerRow, separator, ...dataRows].join('\n');
}

function padCell(value: string, width: number, align: 'left' | 'right'): string {
  const truncated = value.length > width ? value.slice(0, width - 1) + '~' : value;
  return align === 'right' ? truncated.padStart(width) : truncated.padEnd(width);
}

/**
 * Format data as JSON
 */
export function formatJson<T>(data: T, pretty = true): string {
  return pretty ? JSON.stringify(data, null, 2) : JSON.stringify(data);
}

// ============================================================================
// Results
// ============================================================================

const FIELD_COLUMNS: readonly TableColumn[] = [
  { key: 'field', header: 'Field' },
  { key: 'value', header: 'Value' },
];

/**
 * Two-column summary of a retrieved product
 */
export function formatProduct(product: MaterializedProduct): string {
  const rows: { field: string; value: string | number }[] = [
    { field: 'Provider', value: product.sourceProvider },
    { field: 'Path', value: product.localPath },
    { field: 'Files', value: product.files.length },
    { field: 'Size', value: formatBytes(product.byteSize) },
  ];
  if (product.checksum) {
    rows.push({ field: 'SHA-256', value: product.checksum });
  }
  return formatTable(rows, FIELD_COLUMNS);
}

// ============================================================================
// Printing
// ============================================================================

export function printOutput(output: string): void {
  console.log(output);
}

export function printError(error: unknown, json: boolean): void {
  console.error(json ? formatJson(errorReport(error)) : formatError(error));
}
