import { Decimal } from 'decimal.js';

import { extractLatLon } from '../coordinates.js';
import { parseSaleDate } from '../dates.js';
import { clusterKeyOf } from '../geo.js';
import { toNumber } from '../numbers.js';
import {
  DIMENSIONS,
  DIMENSION_SOURCE,
  SourceColumn,
  type Dimension,
  type NormalizedSalesRecord,
  type NormalizedSalesTable,
  type RawSalesRow,
  type RawSalesTable,
} from '../types.js';

/** Empty cells carry no value */
const cell = (row: RawSalesRow, column: string): string | null => {
  const value = row[column];
  return value === undefined || value === '' ? null : value;
};

const numericCell = (row: RawSalesRow, column: string, present: boolean): number | null =>
  present ? toNumber(cell(row, column)) : null;

const computeMargin = (
  revenueLine: number | null,
  cost: number | null
): { margin: number | null; marginPct: number | null } => {
  if (revenueLine === null || cost === null) {
    return { margin: null, marginPct: null };
  }

  const margin = new Decimal(revenueLine).minus(cost);
  const marginPct = revenueLine === 0 ? null : margin.div(revenueLine).toNumber();
  return { margin: margin.toNumber(), marginPct };
};

/**
 * Builds normalized records from a raw export.
 *
 * Each derived field checks its source column first; a missing column leaves
 * the field null (numerics, coordinates) or absent (dimension aliases).
 * The raw table is not modified.
 *
 * @param raw - Parsed export with trimmed column names
 * @param geoClusterPrecision - Decimal digits for the per-record `geoCluster` key
 */
export const normalizeSalesTable = (
  raw: RawSalesTable,
  geoClusterPrecision: number
): NormalizedSalesTable => {
  const has = new Set(raw.columns);
  const hasDate = has.has(SourceColumn.SALE_DATE);
  const hasUnits = has.has(SourceColumn.UNITS);
  const hasCost = has.has(SourceColumn.COST);
  const hasInvoiced = has.has(SourceColumn.REVENUE_INVOICED);
  const hasLine = has.has(SourceColumn.REVENUE_LINE);
  const hasGeo = has.has(SourceColumn.GEO);
  const presentDimensions = DIMENSIONS.filter((d) => has.has(DIMENSION_SOURCE[d]));

  const records = raw.rows.map((row): NormalizedSalesRecord => {
    const saleDateRaw = hasDate ? cell(row, SourceColumn.SALE_DATE) : null;
    const saleDate = parseSaleDate(saleDateRaw);

    const revenueInvoiced = numericCell(row, SourceColumn.REVENUE_INVOICED, hasInvoiced);
    const revenueLine = numericCell(row, SourceColumn.REVENUE_LINE, hasLine);
    const cost = numericCell(row, SourceColumn.COST, hasCost);

    const [latitude, longitude] = hasGeo
      ? extractLatLon(cell(row, SourceColumn.GEO))
      : [null, null];

    const aliases: Partial<Record<Dimension, string | null>> = {};
    for (const dimension of presentDimensions) {
      aliases[dimension] = cell(row, DIMENSION_SOURCE[dimension]);
    }

    return {
      saleDate,
      ...(hasDate && { saleDateRaw }),
      dateValid: saleDate !== null,
      units: numericCell(row, SourceColumn.UNITS, hasUnits),
      cost,
      revenueInvoiced,
      revenueLine,
      revenueDefault: revenueInvoiced ?? revenueLine,
      latitude,
      longitude,
      geoCluster: clusterKeyOf(latitude, longitude, geoClusterPrecision),
      ...aliases,
      ...computeMargin(revenueLine, cost),
      source: row,
    };
  });

  return { columns: raw.columns, records };
};
