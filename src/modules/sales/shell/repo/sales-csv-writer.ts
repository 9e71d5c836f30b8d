import Papa from 'papaparse';

import { formatTimestamp } from '../../core/dates.js';
import { SALES_DELIMITER, type NormalizedSalesRecord, type NormalizedSalesTable } from '../../core/types.js';

const DERIVED_COLUMNS = [
  'sale_date',
  'date_valid',
  'revenue_invoiced',
  'revenue_line',
  'revenue_default',
  'latitude',
  'longitude',
  'geo_cluster',
  'margin',
  'margin_pct',
] as const;

const num = (value: number | null): string => (value === null ? '' : String(value));

const derivedCells = (record: NormalizedSalesRecord): string[] => [
  record.saleDate !== null ? formatTimestamp(record.saleDate) : '',
  String(record.dateValid),
  num(record.revenueInvoiced),
  num(record.revenueLine),
  num(record.revenueDefault),
  num(record.latitude),
  num(record.longitude),
  record.geoCluster !== null ? record.geoCluster.join(',') : '',
  num(record.margin),
  num(record.marginPct),
];

/**
 * Serializes a table to the export's `;`-delimited format.
 *
 * Source columns are written with their raw text, in file order, so the
 * output normalizes back to the same records. Derived columns follow, unless
 * the source already carries a column of the same name.
 *
 * The header row carries the reader's column names: a repeated source header
 * comes out suffixed (`Ciudad;Ciudad.1`), which reads back to the same columns.
 */
export const exportSalesCsv = (table: NormalizedSalesTable): string => {
  const sourceColumns = new Set(table.columns);
  const derived = DERIVED_COLUMNS.filter((column) => !sourceColumns.has(column));
  const derivedIndexes = DERIVED_COLUMNS.flatMap((column, index) =>
    sourceColumns.has(column) ? [] : [index]
  );

  const data = table.records.map((record) => {
    const cells = derivedCells(record);
    return [
      ...table.columns.map((column) => record.source[column] ?? ''),
      ...derivedIndexes.map((index) => cells[index] ?? ''),
    ];
  });

  return Papa.unparse(
    { fields: [...table.columns, ...derived], data },
    { delimiter: SALES_DELIMITER, newline: '\n' }
  );
};
