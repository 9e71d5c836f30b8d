import { endOfDay, startOfDay } from 'date-fns';
import { err, ok, type Result } from 'neverthrow';

import { formatDay } from '../dates.js';
import {
  createInvalidDateRangeError,
  createUnknownDimensionError,
  type SalesInputError,
} from '../errors.js';
import {
  DIMENSIONS,
  DIMENSION_SOURCE,
  type Dimension,
  type NormalizedSalesRecord,
  type NormalizedSalesTable,
  type SalesFilters,
} from '../types.js';

type Predicate = (record: NormalizedSalesRecord) => boolean;

const makeDatePredicate = (filters: SalesFilters): Predicate => {
  const includeInvalid = filters.includeInvalidDates === true;
  const from = filters.dateFrom !== undefined ? startOfDay(filters.dateFrom) : undefined;
  const to = filters.dateTo !== undefined ? endOfDay(filters.dateTo) : undefined;

  return (record) => {
    if (record.saleDate === null) return includeInvalid;
    if (from !== undefined && record.saleDate < from) return false;
    if (to !== undefined && record.saleDate > to) return false;
    return true;
  };
};

const makeMembershipPredicate = (dimension: Dimension, values: readonly string[]): Predicate => {
  const allowed = new Set(values);
  return (record) => {
    const value = record[dimension];
    return value !== undefined && value !== null && allowed.has(value);
  };
};

/**
 * Applies dashboard filters and returns a new table.
 *
 * Records without a valid sale date are kept only when `includeInvalidDates`
 * is set. An empty membership list does not filter. The input table is
 * left untouched.
 */
export const filterSalesRecords = (
  table: NormalizedSalesTable,
  filters: SalesFilters
): Result<NormalizedSalesTable, SalesInputError> => {
  if (
    filters.dateFrom !== undefined &&
    filters.dateTo !== undefined &&
    startOfDay(filters.dateFrom) > startOfDay(filters.dateTo)
  ) {
    return err(createInvalidDateRangeError(formatDay(filters.dateFrom), formatDay(filters.dateTo)));
  }

  const columns = new Set(table.columns);
  const predicates: Predicate[] = [makeDatePredicate(filters)];

  for (const dimension of DIMENSIONS) {
    const values = filters[dimension];
    if (values === undefined || values.length === 0) continue;

    const column = DIMENSION_SOURCE[dimension];
    if (!columns.has(column)) {
      return err(createUnknownDimensionError(dimension, column));
    }
    predicates.push(makeMembershipPredicate(dimension, values));
  }

  return ok({
    columns: table.columns,
    records: table.records.filter((record) => predicates.every((matches) => matches(record))),
  });
};
