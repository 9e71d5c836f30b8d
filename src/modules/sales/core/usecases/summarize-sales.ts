import { addMonths, startOfMonth } from 'date-fns';
import { Decimal } from 'decimal.js';

import { formatDay, formatMonth } from '../dates.js';
import {
  DIMENSIONS,
  DIMENSION_SOURCE,
  SourceColumn,
  TOP_CLIENTS_LIMIT,
  TOP_LOCATIONS_LIMIT,
  TOP_MARGIN_LIMIT,
  TOP_PRODUCTS_LIMIT,
  type Dimension,
  type DimensionTotal,
  type FilterOptions,
  type MarginAnalysis,
  type MonthlyRevenuePoint,
  type NormalizedSalesTable,
  type RevenueField,
  type SalesKpis,
  type SalesSummary,
} from '../types.js';

const hasColumn = (table: NormalizedSalesTable, column: string): boolean =>
  table.columns.includes(column);

const sumNullable = (values: Iterable<number | null>): Decimal => {
  let total = new Decimal(0);
  for (const value of values) {
    if (value !== null) total = total.plus(value);
  }
  return total;
};

/**
 * Sums values per key, then orders by total descending.
 * Ties keep first-encounter order.
 */
const rankTotals = (entries: Iterable<readonly [string, number]>): [string, number][] => {
  const totals = new Map<string, Decimal>();
  for (const [key, value] of entries) {
    totals.set(key, (totals.get(key) ?? new Decimal(0)).plus(value));
  }
  return Array.from(totals, ([key, total]): [string, number] => [key, total.toNumber()]).sort(
    (a, b) => b[1] - a[1]
  );
};

/**
 * Number of records whose sale date did not parse.
 */
export const countInvalidDates = (table: NormalizedSalesTable): number =>
  table.records.filter((record) => !record.dateValid).length;

/**
 * Headline figures for the selected revenue field.
 * Without a units column, `totalUnits` falls back to the number of records
 * carrying a revenue value.
 */
export const summarizeKpis = (table: NormalizedSalesTable, field: RevenueField): SalesKpis => {
  const { records } = table;
  const totalRevenue = sumNullable(records.map((r) => r[field])).toNumber();
  const totalUnits = hasColumn(table, SourceColumn.UNITS)
    ? sumNullable(records.map((r) => r.units)).toNumber()
    : records.filter((r) => r[field] !== null).length;
  const recordCount = records.length;

  return {
    totalRevenue,
    totalUnits,
    recordCount,
    averageTicket: recordCount > 0 ? new Decimal(totalRevenue).div(recordCount).toNumber() : 0,
  };
};

/**
 * Revenue per calendar month over records with a valid sale date.
 * Months without sales between the first and last month are reported as 0.
 */
export const monthlyRevenue = (
  table: NormalizedSalesTable,
  field: RevenueField
): MonthlyRevenuePoint[] => {
  const totals = new Map<string, Decimal>();
  let first: Date | undefined;
  let last: Date | undefined;

  for (const record of table.records) {
    if (record.saleDate === null) continue;

    const month = startOfMonth(record.saleDate);
    if (first === undefined || month < first) first = month;
    if (last === undefined || month > last) last = month;

    const key = formatMonth(month);
    const value = record[field];
    const total = totals.get(key) ?? new Decimal(0);
    totals.set(key, value !== null ? total.plus(value) : total);
  }

  if (first === undefined || last === undefined) return [];

  const series: MonthlyRevenuePoint[] = [];
  for (let month = first; month <= last; month = addMonths(month, 1)) {
    const key = formatMonth(month);
    series.push({ month: key, revenue: totals.get(key)?.toNumber() ?? 0 });
  }
  return series;
};

/**
 * Revenue per value of a dimension, highest first.
 * Returns null when the source has no column for the dimension.
 */
export const topByDimension = (
  table: NormalizedSalesTable,
  dimension: Dimension,
  field: RevenueField,
  limit?: number
): DimensionTotal[] | null => {
  if (!hasColumn(table, DIMENSION_SOURCE[dimension])) return null;

  const entries: [string, number][] = [];
  for (const record of table.records) {
    const value = record[dimension];
    if (value === undefined || value === null) continue;
    entries.push([value, record[field] ?? 0]);
  }

  const ranked = rankTotals(entries).map(([value, revenue]) => ({ value, revenue }));
  return limit !== undefined ? ranked.slice(0, limit) : ranked;
};

/**
 * Margin of the selected revenue over cost, with missing values read as 0.
 * Returns null when the source has no cost column.
 */
export const analyzeMargin = (
  table: NormalizedSalesTable,
  field: RevenueField,
  limit: number = TOP_MARGIN_LIMIT
): MarginAnalysis | null => {
  if (!hasColumn(table, SourceColumn.COST)) return null;

  let totalMargin = new Decimal(0);
  let totalRevenue = new Decimal(0);
  const byProduct: [string, number][] = [];

  for (const record of table.records) {
    const revenue = record[field];
    const margin = new Decimal(revenue ?? 0).minus(record.cost ?? 0);

    totalMargin = totalMargin.plus(margin);
    if (revenue !== null) totalRevenue = totalRevenue.plus(revenue);

    if (record.product !== undefined && record.product !== null) {
      byProduct.push([record.product, margin.toNumber()]);
    }
  }

  return {
    totalMargin: totalMargin.toNumber(),
    marginPct: totalRevenue.isZero() ? 0 : totalMargin.div(totalRevenue).toNumber(),
    topProducts: rankTotals(byProduct)
      .slice(0, limit)
      .map(([product, margin]) => ({ product, margin })),
  };
};

/**
 * Choices for the dashboard's filter widgets.
 */
export const describeFilterOptions = (table: NormalizedSalesTable): FilterOptions => {
  const dimensions: Partial<Record<Dimension, string[]>> = {};

  for (const dimension of DIMENSIONS) {
    if (!hasColumn(table, DIMENSION_SOURCE[dimension])) continue;

    const values = new Set<string>();
    for (const record of table.records) {
      const value = record[dimension];
      if (value !== undefined && value !== null) values.add(value);
    }
    dimensions[dimension] = [...values].sort();
  }

  let min: Date | undefined;
  let max: Date | undefined;
  for (const { saleDate } of table.records) {
    if (saleDate === null) continue;
    if (min === undefined || saleDate < min) min = saleDate;
    if (max === undefined || saleDate > max) max = saleDate;
  }

  return {
    dimensions,
    minDate: min !== undefined ? formatDay(min) : null,
    maxDate: max !== undefined ? formatDay(max) : null,
  };
};

/**
 * Everything the dashboard's overview page shows for one revenue field.
 */
export const summarizeSales = (table: NormalizedSalesTable, field: RevenueField): SalesSummary => ({
  revenueField: field,
  kpis: summarizeKpis(table, field),
  monthly: monthlyRevenue(table, field),
  topProducts: topByDimension(table, 'product', field, TOP_PRODUCTS_LIMIT),
  topClients: topByDimension(table, 'client', field, TOP_CLIENTS_LIMIT),
  byCity: topByDimension(table, 'city', field, TOP_LOCATIONS_LIMIT),
  byZone: topByDimension(table, 'zone', field, TOP_LOCATIONS_LIMIT),
  margin: analyzeMargin(table, field),
});
