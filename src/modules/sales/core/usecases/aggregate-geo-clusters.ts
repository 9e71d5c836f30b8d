import { Decimal } from 'decimal.js';

import { clusterKeyId, clusterKeyOf, toPrecision } from '../geo.js';

import type {
  ClusterBucket,
  ClusterKey,
  NormalizedSalesTable,
  RevenueField,
} from '../types.js';

interface BucketAccumulator {
  key: ClusterKey;
  revenue: Decimal;
  latitudeSum: Decimal;
  longitudeSum: Decimal;
  count: number;
}

/**
 * Groups coordinate-bearing records into rounded-coordinate buckets.
 *
 * Records missing either coordinate are left out of every bucket. A null
 * revenue value counts toward `count` but adds nothing to `revenue`.
 * Output is sorted by revenue descending; ties keep first-encounter order.
 *
 * @param precision - Decimal digits; negative values round left of the point
 */
export const aggregateGeoClusters = (
  table: Pick<NormalizedSalesTable, 'records'>,
  precision: number,
  revenueField: RevenueField
): ClusterBucket[] => {
  const digits = toPrecision(precision);
  const groups = new Map<string, BucketAccumulator>();

  for (const record of table.records) {
    const { latitude, longitude } = record;
    if (latitude === null || longitude === null) continue;

    const key = clusterKeyOf(latitude, longitude, digits);
    if (key === null) continue;

    const id = clusterKeyId(key);
    let group = groups.get(id);
    if (group === undefined) {
      group = {
        key,
        revenue: new Decimal(0),
        latitudeSum: new Decimal(0),
        longitudeSum: new Decimal(0),
        count: 0,
      };
      groups.set(id, group);
    }

    const revenue = record[revenueField];
    if (revenue !== null) {
      group.revenue = group.revenue.plus(revenue);
    }
    group.latitudeSum = group.latitudeSum.plus(latitude);
    group.longitudeSum = group.longitudeSum.plus(longitude);
    group.count += 1;
  }

  const buckets = Array.from(groups.values(), (group) => ({
    cluster: group.key,
    latitude: group.latitudeSum.div(group.count).toNumber(),
    longitude: group.longitudeSum.div(group.count).toNumber(),
    revenue: group.revenue.toNumber(),
    count: group.count,
  }));

  // Array.prototype.sort is stable; Map iteration preserves first-encounter order
  return buckets.sort((a, b) => b.revenue - a.revenue);
};
