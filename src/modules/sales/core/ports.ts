import type { SalesFileError, SalesNotLoadedError } from './errors.js';
import type { ClusterBucket, NormalizedSalesTable, RevenueField } from './types.js';
import type { Result } from 'neverthrow';

/**
 * Source of the normalized sales table.
 */
export type SalesLoader = () => Promise<Result<NormalizedSalesTable, SalesFileError>>;

export interface LoadSummary {
  recordCount: number;
  invalidDateCount: number;
  columns: readonly string[];
}

/**
 * Holds the canonical table for the lifetime of one load.
 */
export interface SalesStore {
  /**
   * Replaces the canonical table. On failure the previous table is kept.
   */
  load(): Promise<Result<LoadSummary, SalesFileError>>;

  /**
   * The canonical table. Consumers must treat it as read-only and filter into copies.
   */
  current(): Result<NormalizedSalesTable, SalesNotLoadedError>;

  /**
   * Memoized cluster aggregation for a (possibly filtered) table.
   */
  clusters(
    table: Pick<NormalizedSalesTable, 'records'>,
    precision: number,
    revenueField: RevenueField
  ): readonly ClusterBucket[];
}
