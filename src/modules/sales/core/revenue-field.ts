import { err, ok, type Result } from 'neverthrow';

import { createValidationError, type ValidationError } from '@/common/types/errors.js';

import { REVENUE_FIELDS, isRevenueField, type RevenueField } from './types.js';

/**
 * Validates a revenue field name received from outside the process.
 */
export const parseRevenueField = (value: string): Result<RevenueField, ValidationError> => {
  if (isRevenueField(value)) {
    return ok(value);
  }
  return err(
    createValidationError(
      `Unknown revenue field '${value}'. Expected one of: ${REVENUE_FIELDS.join(', ')}`,
      'revenueField',
      value
    )
  );
};
