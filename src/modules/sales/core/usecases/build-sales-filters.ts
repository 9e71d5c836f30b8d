import { isValid, parse } from 'date-fns';
import { err, ok, type Result } from 'neverthrow';

import { createInvalidDateError, type SalesInputError } from '../errors.js';
import { DIMENSIONS, type Dimension, type SalesFilters } from '../types.js';

/**
 * Filter values as they arrive from a client: calendar days as `yyyy-MM-dd`.
 */
export type SalesFilterInput = {
  dateFrom?: string;
  dateTo?: string;
  includeInvalidDates?: boolean;
} & Partial<Record<Dimension, readonly string[]>>;

const DAY_RE = /^\d{4}-\d{2}-\d{2}$/;

const parseDay = (field: string, value: string): Result<Date, SalesInputError> => {
  const date = DAY_RE.test(value) ? parse(value, 'yyyy-MM-dd', new Date(2000, 0, 1)) : null;
  return date !== null && isValid(date) ? ok(date) : err(createInvalidDateError(field, value));
};

/**
 * Converts client filter input into `SalesFilters`.
 */
export const buildSalesFilters = (input: SalesFilterInput): Result<SalesFilters, SalesInputError> => {
  const filters: SalesFilters = {};

  if (input.dateFrom !== undefined) {
    const from = parseDay('dateFrom', input.dateFrom);
    if (from.isErr()) return err(from.error);
    filters.dateFrom = from.value;
  }

  if (input.dateTo !== undefined) {
    const to = parseDay('dateTo', input.dateTo);
    if (to.isErr()) return err(to.error);
    filters.dateTo = to.value;
  }

  if (input.includeInvalidDates !== undefined) {
    filters.includeInvalidDates = input.includeInvalidDates;
  }

  for (const dimension of DIMENSIONS) {
    const values = input[dimension];
    if (values !== undefined && values.length > 0) {
      filters[dimension] = values;
    }
  }

  return ok(filters);
};
