/**
 * Memoized geo-cluster aggregation.
 *
 * Keys combine a content fingerprint of the input records with the precision
 * and revenue field, so filtered copies of the same data share entries.
 * The owner must call `invalidate()` when the canonical table is replaced.
 */

import { createHash } from 'node:crypto';

import { LRUCache } from 'lru-cache';

import { toPrecision } from '../../core/geo.js';
import { aggregateGeoClusters } from '../../core/usecases/aggregate-geo-clusters.js';

import type {
  ClusterBucket,
  NormalizedSalesRecord,
  NormalizedSalesTable,
  RevenueField,
} from '../../core/types.js';

export interface ClusterCacheOptions {
  /** Maximum number of cached aggregations. Default: 100 */
  maxEntries?: number;
  /** Entry lifetime in milliseconds. Default: 3600000 (1 hour) */
  ttlMs?: number;
}

export interface ClusterCacheStats {
  hits: number;
  misses: number;
  size: number;
}

export interface ClusterCache {
  aggregate(
    table: Pick<NormalizedSalesTable, 'records'>,
    precision: number,
    revenueField: RevenueField
  ): readonly ClusterBucket[];
  invalidate(): void;
  stats(): ClusterCacheStats;
}

const fingerprintValue = (value: number | null): string => (value === null ? '' : String(value));

/**
 * SHA-256 over the fields aggregation reads, truncated to 16 hex characters.
 */
export const fingerprintRecords = (records: readonly NormalizedSalesRecord[]): string => {
  const hash = createHash('sha256');
  for (const record of records) {
    hash.update(
      [
        record.latitude,
        record.longitude,
        record.revenueInvoiced,
        record.revenueLine,
        record.revenueDefault,
      ]
        .map(fingerprintValue)
        .join(';')
    );
    hash.update('\n');
  }
  return hash.digest('hex').substring(0, 16);
};

export const createClusterCache = (options: ClusterCacheOptions = {}): ClusterCache => {
  const lru = new LRUCache<string, readonly ClusterBucket[]>({
    max: options.maxEntries ?? 100,
    ttl: options.ttlMs ?? 60 * 60 * 1000,
  });
  let hits = 0;
  let misses = 0;

  return {
    aggregate(table, precision, revenueField) {
      const digits = toPrecision(precision);
      const key = `${fingerprintRecords(table.records)}:${String(digits)}:${revenueField}`;

      const cached = lru.get(key);
      if (cached !== undefined) {
        hits++;
        return cached;
      }

      misses++;
      const buckets = aggregateGeoClusters(table, digits, revenueField);
      lru.set(key, buckets);
      return buckets;
    },

    invalidate() {
      lru.clear();
    },

    stats() {
      return { hits, misses, size: lru.size };
    },
  };
};
