// Core parsing
export { toNumber, parseDecimalLiteral } from './core/numbers.js';
export { extractLatLon, type LatLon, type MaybeLatLon } from './core/coordinates.js';
export { parseSaleDate, formatDay, formatMonth, formatTimestamp } from './core/dates.js';
export { roundTo, clusterKeyOf, clusterKeyId, toPrecision } from './core/geo.js';
export { parseRevenueField } from './core/revenue-field.js';

// Use cases
export { normalizeSalesTable } from './core/usecases/normalize-sales-table.js';
export { aggregateGeoClusters } from './core/usecases/aggregate-geo-clusters.js';
export { filterSalesRecords } from './core/usecases/filter-sales-records.js';
export { buildSalesFilters, type SalesFilterInput } from './core/usecases/build-sales-filters.js';
export {
  countInvalidDates,
  summarizeKpis,
  monthlyRevenue,
  topByDimension,
  analyzeMargin,
  describeFilterOptions,
  summarizeSales,
} from './core/usecases/summarize-sales.js';

// Shell
export { parseSalesCsv, readSalesFile, loadSalesFile } from './shell/repo/sales-file-reader.js';
export { exportSalesCsv } from './shell/repo/sales-csv-writer.js';
export {
  createClusterCache,
  fingerprintRecords,
  type ClusterCache,
  type ClusterCacheOptions,
  type ClusterCacheStats,
} from './shell/cache/cluster-cache.js';
export {
  createSalesStore,
  createSalesFileStore,
  type SalesStoreDeps,
  type SalesFileStoreOptions,
} from './shell/store/sales-store.js';
export { makeSalesRoutes, type MakeSalesRoutesDeps } from './shell/rest/routes.js';

// Ports
export type { SalesStore, SalesLoader, LoadSummary } from './core/ports.js';

// Types
export {
  SourceColumn,
  SALES_DELIMITER,
  DIMENSIONS,
  REVENUE_FIELDS,
  isRevenueField,
} from './core/types.js';
export type {
  RawSalesRow,
  RawSalesTable,
  Dimension,
  ClusterKey,
  NormalizedSalesRecord,
  NormalizedSalesTable,
  RevenueField,
  ClusterBucket,
  SalesFilters,
  SalesKpis,
  MonthlyRevenuePoint,
  DimensionTotal,
  MarginAnalysis,
  ProductMargin,
  SalesSummary,
  FilterOptions,
} from './core/types.js';

// Errors
export type {
  SalesError,
  SalesFileError,
  SalesInputError,
  SalesNotLoadedError,
} from './core/errors.js';
export { getHttpStatusForError } from './core/errors.js';
