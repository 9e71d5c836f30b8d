/**
 * Prints the summary and geo clusters of a sales export as JSON.
 *
 * Usage:
 *   tsx scripts/inspect-sales.ts --file data/TblVenta.csv [--field revenueLine]
 *     [--precision 2] [--from 2024-01-01] [--to 2024-03-31] [--include-invalid-dates]
 *     [--out filtered.csv]
 */

import fs from 'node:fs/promises';
import { parseArgs } from 'node:util';

import {
  aggregateGeoClusters,
  buildSalesFilters,
  exportSalesCsv,
  filterSalesRecords,
  loadSalesFile,
  parseRevenueField,
  summarizeSales,
} from '../src/modules/sales/index.js';

const DEFAULT_FILE = 'data/TblVenta.csv';
const DEFAULT_PRECISION = 3;

const { values } = parseArgs({
  options: {
    file: { type: 'string' },
    field: { type: 'string' },
    precision: { type: 'string' },
    from: { type: 'string' },
    to: { type: 'string' },
    'include-invalid-dates': { type: 'boolean' },
    out: { type: 'string' },
  },
});

function fail(message: string): never {
  console.error(message);
  process.exit(1);
}

const main = async (): Promise<void> => {
  const file = values.file ?? DEFAULT_FILE;
  const revenueField = parseRevenueField(values.field ?? 'revenueInvoiced');
  if (revenueField.isErr()) {
    fail(revenueField.error.message);
  }

  const precision =
    values.precision !== undefined ? Number.parseInt(values.precision, 10) : DEFAULT_PRECISION;
  if (!Number.isInteger(precision)) {
    fail(`Invalid precision '${values.precision ?? ''}'`);
  }

  const loaded = await loadSalesFile(file, precision);
  if (loaded.isErr()) {
    fail(loaded.error.message);
  }

  const filtered = buildSalesFilters({
    ...(values.from !== undefined && { dateFrom: values.from }),
    ...(values.to !== undefined && { dateTo: values.to }),
    includeInvalidDates: values['include-invalid-dates'] === true,
  }).andThen((filters) => filterSalesRecords(loaded.value, filters));

  if (filtered.isErr()) {
    fail(filtered.error.message);
  }

  const table = filtered.value;
  const output = {
    file,
    loadedRecords: loaded.value.records.length,
    filteredRecords: table.records.length,
    summary: summarizeSales(table, revenueField.value),
    clusters: aggregateGeoClusters(table, precision, revenueField.value),
  };

  console.log(JSON.stringify(output, null, 2));

  if (values.out !== undefined) {
    await fs.writeFile(values.out, exportSalesCsv(table), 'utf8');
    console.error(`Wrote ${String(table.records.length)} rows to ${values.out}`);
  }
};

await main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
