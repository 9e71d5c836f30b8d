import { describe, expect, it } from 'vitest';

import { normalizeSalesTable } from '@/modules/sales/core/usecases/normalize-sales-table.js';
import { exportSalesCsv } from '@/modules/sales/shell/repo/sales-csv-writer.js';
import { parseSalesCsv } from '@/modules/sales/shell/repo/sales-file-reader.js';

import { SAMPLE_ROWS, makeSalesTable } from '../../fixtures/builders.js';

import type { NormalizedSalesRecord } from '@/modules/sales/core/types.js';

const DERIVED_HEADER =
  'sale_date;date_valid;revenue_invoiced;revenue_line;revenue_default;latitude;longitude;geo_cluster;margin;margin_pct';

const comparable = ({ source: _source, ...rest }: NormalizedSalesRecord) => rest;

describe('exportSalesCsv', () => {
  const table = makeSalesTable(SAMPLE_ROWS);
  const lines = exportSalesCsv(table).split('\n');

  it('writes source columns followed by derived columns', () => {
    expect(lines[0]).toBe(
      'FechaVta;NombreComercial;DescMaterial;DescGrArticulo;Ciudad;ZonaVenta;Unidades;' +
        `VtaFacturada;ValVentaLi;Costo;Georeferenciado;${DERIVED_HEADER}`
    );
  });

  it('keeps the raw cell text and appends derived values', () => {
    expect(lines[1]).toBe(
      '15/01/2024;Farmacia Central;Paracetamol 500mg;Analgesicos;La Paz;Norte;10;100.50;100;60;' +
        '-16.5001,-68.1501;2024-01-15 00:00:00;true;100.5;100;100.5;-16.5001;-68.1501;' +
        '-16.5,-68.15;40;0.4'
    );
  });

  it('writes empty derived cells for missing values', () => {
    expect(lines[4]).toBe(
      'sin fecha;Botica del Sur;Paracetamol 500mg;Analgesicos;La Paz;Sur;1;10;10;6;' +
        ';;false;10;10;10;;;;4;0.4'
    );
  });

  it('writes one line per record without a trailing newline', () => {
    expect(lines).toHaveLength(5);
  });

  it('normalizes back to the same records', () => {
    const reparsed = normalizeSalesTable(parseSalesCsv(exportSalesCsv(table))._unsafeUnwrap(), 3);

    expect(reparsed.records.map(comparable)).toEqual(table.records.map(comparable));
  });

  it('quotes cells containing the delimiter', () => {
    const quoted = makeSalesTable([{ NombreComercial: 'Farmacia; Central' }], ['NombreComercial']);
    const [, row] = exportSalesCsv(quoted).split('\n');

    expect(row).toBe('"Farmacia; Central";;false;;;;;;;;');
  });

  it('does not repeat a derived column the source already has', () => {
    const withMargin = makeSalesTable([{ margin: 'alta' }], ['margin']);
    const [header, row] = exportSalesCsv(withMargin).split('\n');

    expect(header).toBe(
      'margin;sale_date;date_valid;revenue_invoiced;revenue_line;revenue_default;latitude;' +
        'longitude;geo_cluster;margin_pct'
    );
    expect(row).toBe('alta;;false;;;;;;;');
  });

  it('writes repeated source headers with their suffixes', () => {
    const raw = parseSalesCsv('Ciudad;Ciudad\nLa Paz;Sucre\n')._unsafeUnwrap();
    const exported = exportSalesCsv(normalizeSalesTable(raw, 3));
    const [header, row] = exported.split('\n');

    expect(header).toBe(`Ciudad;Ciudad.1;${DERIVED_HEADER}`);
    expect(row?.startsWith('La Paz;Sucre;')).toBe(true);
    expect(parseSalesCsv(exported)._unsafeUnwrap().columns.slice(0, 2)).toEqual([
      'Ciudad',
      'Ciudad.1',
    ]);
  });

  it('writes only the header for an empty table', () => {
    const empty = makeSalesTable([], ['Ciudad']);

    const nonEmptyLines = exportSalesCsv(empty)
      .split('\n')
      .filter((line) => line !== '');

    expect(nonEmptyLines).toEqual([`Ciudad;${DERIVED_HEADER}`]);
  });
});
