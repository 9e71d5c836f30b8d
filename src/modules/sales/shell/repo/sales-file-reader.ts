import fs from 'node:fs/promises';

import { parse } from 'csv-parse/sync';
import { err, ok, type Result } from 'neverthrow';

import { normalizeSalesTable } from '../../core/usecases/normalize-sales-table.js';
import { SALES_DELIMITER, type NormalizedSalesTable, type RawSalesTable } from '../../core/types.js';

import type { SalesFileError } from '../../core/errors.js';

const isStringMatrix = (value: unknown): value is string[][] =>
  Array.isArray(value) &&
  value.every((row) => Array.isArray(row) && row.every((c) => typeof c === 'string'));

/**
 * Trims header names and suffixes repeats (`Ciudad`, `Ciudad.1`) so every
 * column keeps its own cells.
 */
const normalizeHeader = (header: readonly string[]): string[] => {
  const seen = new Map<string, number>();
  return header.map((name) => {
    const trimmed = name.trim();
    const occurrences = seen.get(trimmed) ?? 0;
    seen.set(trimmed, occurrences + 1);
    return occurrences === 0 ? trimmed : `${trimmed}.${String(occurrences)}`;
  });
};

/**
 * Parses `;`-delimited export text into a raw table.
 * Short rows are padded with empty cells; rows with extra cells are rejected.
 * A quote inside an unquoted cell is kept as text.
 */
export const parseSalesCsv = (
  contents: string,
  source = '<memory>'
): Result<RawSalesTable, SalesFileError> => {
  let parsed: unknown;
  try {
    parsed = parse(contents, {
      delimiter: SALES_DELIMITER,
      bom: true,
      skip_empty_lines: true,
      relax_column_count_less: true,
      relax_quotes: true,
    });
  } catch (error) {
    return err({
      type: 'ParseError',
      message: `Failed to parse sales file at ${source}: ${(error as Error).message}`,
      path: source,
    });
  }

  if (!isStringMatrix(parsed)) {
    return err({
      type: 'ParseError',
      message: `Unexpected record shape in sales file at ${source}`,
      path: source,
    });
  }

  const [header, ...body] = parsed;
  if (header === undefined) {
    return err({
      type: 'ParseError',
      message: `Sales file at ${source} has no header row`,
      path: source,
    });
  }

  const columns = normalizeHeader(header);
  const rows = body.map((cells) => {
    const row: Record<string, string> = {};
    columns.forEach((column, index) => {
      row[column] = cells[index] ?? '';
    });
    return row;
  });

  return ok({ columns, rows });
};

/**
 * Reads the sales export from disk. This is the only fatal failure of a load.
 */
export const readSalesFile = async (
  filePath: string
): Promise<Result<RawSalesTable, SalesFileError>> => {
  let contents: string;

  try {
    contents = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    const code = (error as NodeJS.ErrnoException).code;
    if (code === 'ENOENT') {
      return err({
        type: 'NotFound',
        message: `Sales file not found at ${filePath}`,
        path: filePath,
      });
    }

    return err({
      type: 'ReadError',
      message: `Failed to read sales file at ${filePath}: ${(error as Error).message}`,
      path: filePath,
    });
  }

  return parseSalesCsv(contents, filePath);
};

/**
 * Reads and normalizes the sales export in one step.
 */
export const loadSalesFile = async (
  filePath: string,
  geoClusterPrecision: number
): Promise<Result<NormalizedSalesTable, SalesFileError>> => {
  const raw = await readSalesFile(filePath);
  return raw.map((table) => normalizeSalesTable(table, geoClusterPrecision));
};
