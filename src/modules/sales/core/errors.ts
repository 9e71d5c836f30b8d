/**
 * Sales Module - Domain Errors
 *
 * All errors are discriminated unions with a 'type' field for easy matching.
 * Cell-level parse failures are not errors; they become `null` fields.
 */

import type { Dimension } from './types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Source File Errors
// ─────────────────────────────────────────────────────────────────────────────

export type SalesFileError =
  | { readonly type: 'NotFound'; readonly message: string; readonly path: string }
  | { readonly type: 'ReadError'; readonly message: string; readonly path: string }
  | { readonly type: 'ParseError'; readonly message: string; readonly path: string };

// ─────────────────────────────────────────────────────────────────────────────
// Input Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * A membership filter targets a dimension whose column the source lacks.
 */
export interface UnknownDimensionError {
  readonly type: 'UnknownDimension';
  readonly message: string;
  readonly dimension: Dimension;
}

export interface InvalidDateRangeError {
  readonly type: 'InvalidDateRange';
  readonly message: string;
}

export interface InvalidDateError {
  readonly type: 'InvalidDate';
  readonly message: string;
  readonly field: string;
  readonly value: string;
}

export type SalesInputError = UnknownDimensionError | InvalidDateRangeError | InvalidDateError;

// ─────────────────────────────────────────────────────────────────────────────
// Store Errors
// ─────────────────────────────────────────────────────────────────────────────

export interface SalesNotLoadedError {
  readonly type: 'NotLoaded';
  readonly message: string;
}

export type SalesError = SalesFileError | SalesInputError | SalesNotLoadedError;

// ─────────────────────────────────────────────────────────────────────────────
// Factories
// ─────────────────────────────────────────────────────────────────────────────

export const createUnknownDimensionError = (
  dimension: Dimension,
  column: string
): UnknownDimensionError => ({
  type: 'UnknownDimension',
  message: `Cannot filter by ${dimension}: the source has no '${column}' column`,
  dimension,
});

export const createInvalidDateRangeError = (from: string, to: string): InvalidDateRangeError => ({
  type: 'InvalidDateRange',
  message: `dateFrom (${from}) is after dateTo (${to})`,
});

export const createInvalidDateError = (field: string, value: string): InvalidDateError => ({
  type: 'InvalidDate',
  message: `${field} '${value}' is not a calendar date (expected yyyy-MM-dd)`,
  field,
  value,
});

export const createNotLoadedError = (): SalesNotLoadedError => ({
  type: 'NotLoaded',
  message: 'Sales data has not been loaded',
});

// ─────────────────────────────────────────────────────────────────────────────
// HTTP Status Mapping
// ─────────────────────────────────────────────────────────────────────────────

export type SalesErrorHttpStatus = 400 | 404 | 500 | 503;

export const SALES_ERROR_HTTP_STATUS: Record<SalesError['type'], SalesErrorHttpStatus> = {
  UnknownDimension: 400,
  InvalidDateRange: 400,
  InvalidDate: 400,
  NotFound: 404,
  NotLoaded: 503,
  ReadError: 500,
  ParseError: 500,
};

export const getHttpStatusForError = (error: SalesError): SalesErrorHttpStatus => {
  return SALES_ERROR_HTTP_STATUS[error.type];
};
