import { err, ok, type Result } from 'neverthrow';

import { createNotLoadedError, type SalesFileError } from '../../core/errors.js';
import { countInvalidDates } from '../../core/usecases/summarize-sales.js';
import { createClusterCache, type ClusterCache } from '../cache/cluster-cache.js';
import { loadSalesFile } from '../repo/sales-file-reader.js';

import type { LoadSummary, SalesLoader, SalesStore } from '../../core/ports.js';
import type { NormalizedSalesTable } from '../../core/types.js';
import type { Logger } from 'pino';

export interface SalesStoreDeps {
  loader: SalesLoader;
  logger: Logger;
  cache?: ClusterCache;
}

/**
 * In-memory holder of the canonical sales table.
 * Every successful load invalidates the cluster cache.
 */
export const createSalesStore = (deps: SalesStoreDeps): SalesStore => {
  const { loader, logger } = deps;
  const cache = deps.cache ?? createClusterCache();
  let table: NormalizedSalesTable | null = null;

  return {
    async load(): Promise<Result<LoadSummary, SalesFileError>> {
      const startedAt = Date.now();
      const result = await loader();

      if (result.isErr()) {
        logger.error({ err: result.error }, 'Failed to load sales data');
        return err(result.error);
      }

      table = result.value;
      cache.invalidate();

      const summary: LoadSummary = {
        recordCount: table.records.length,
        invalidDateCount: countInvalidDates(table),
        columns: table.columns,
      };

      logger.info(
        {
          recordCount: summary.recordCount,
          invalidDateCount: summary.invalidDateCount,
          durationMs: Date.now() - startedAt,
        },
        'Sales data loaded'
      );
      if (summary.invalidDateCount > 0) {
        logger.warn(
          { invalidDateCount: summary.invalidDateCount },
          'Sales records with unparseable FechaVta'
        );
      }

      return ok(summary);
    },

    current() {
      return table !== null ? ok(table) : err(createNotLoadedError());
    },

    clusters(input, precision, revenueField) {
      return cache.aggregate(input, precision, revenueField);
    },
  };
};

export interface SalesFileStoreOptions {
  filePath: string;
  geoClusterPrecision: number;
  logger: Logger;
  cache?: ClusterCache;
}

/**
 * Store backed by the `;`-delimited export on disk.
 */
export const createSalesFileStore = (options: SalesFileStoreOptions): SalesStore => {
  const { filePath, geoClusterPrecision, logger, cache } = options;

  return createSalesStore({
    loader: () => loadSalesFile(filePath, geoClusterPrecision),
    logger: logger.child({ component: 'sales-store', filePath }),
    ...(cache !== undefined && { cache }),
  });
};
