import { Decimal } from 'decimal.js';

import type { ClusterKey } from './types.js';

/**
 * Normalizes a caller-supplied precision to an integer digit count.
 * Non-integers are truncated; negative values round left of the decimal point.
 */
export const toPrecision = (precision: number): number => {
  if (!Number.isFinite(precision)) {
    throw new RangeError(`Precision must be a finite number, got ${String(precision)}`);
  }
  return Math.trunc(precision);
};

/**
 * Rounds half to even at `precision` decimal digits.
 *
 * Ties are decided on the shortest decimal text of `value`, not on its binary
 * double: `roundTo(2.675, 2)` is 2.68 and `roundTo(0.0005, 3)` is 0, where
 * binary rounding gives 2.67 and 0.001.
 */
export const roundTo = (value: number, precision: number): number => {
  const digits = toPrecision(precision);
  const decimal = new Decimal(value);

  if (digits >= 0) {
    return decimal.toDecimalPlaces(digits, Decimal.ROUND_HALF_EVEN).toNumber();
  }

  const step = new Decimal(10).pow(-digits);
  return decimal.div(step).toDecimalPlaces(0, Decimal.ROUND_HALF_EVEN).mul(step).toNumber();
};

/**
 * Cluster key shared by the normalizer's per-record column and the aggregator.
 * Null unless both coordinates are present.
 */
export const clusterKeyOf = (
  latitude: number | null,
  longitude: number | null,
  precision: number
): ClusterKey | null => {
  if (latitude === null || longitude === null) return null;
  return [roundTo(latitude, precision), roundTo(longitude, precision)];
};

/**
 * Stable string identity of a cluster key for grouping.
 * `-0` and `0` map to the same bucket.
 */
export const clusterKeyId = (key: ClusterKey): string => `${String(key[0])}|${String(key[1])}`;
