import { describe, expect, it } from 'vitest';

import { SourceColumn } from '@/modules/sales/core/types.js';
import {
  analyzeMargin,
  countInvalidDates,
  describeFilterOptions,
  monthlyRevenue,
  summarizeKpis,
  summarizeSales,
  topByDimension,
} from '@/modules/sales/core/usecases/summarize-sales.js';

import { SAMPLE_ROWS, makeSalesTable } from '../../fixtures/builders.js';

const table = makeSalesTable(SAMPLE_ROWS);

describe('countInvalidDates', () => {
  it('counts records whose date did not parse', () => {
    expect(countInvalidDates(table)).toBe(1);
  });
});

describe('summarizeKpis', () => {
  it('totals revenue and units', () => {
    expect(summarizeKpis(table, 'revenueInvoiced')).toEqual({
      totalRevenue: 360.5,
      totalUnits: 18,
      recordCount: 4,
      averageTicket: 90.125,
    });
  });

  it('uses the selected revenue field', () => {
    expect(summarizeKpis(table, 'revenueLine').totalRevenue).toBe(348);
  });

  it('counts revenue-bearing records as units without a units column', () => {
    const noUnits = makeSalesTable(
      [{ VtaFacturada: '5' }, { VtaFacturada: '' }, { VtaFacturada: '7' }],
      [SourceColumn.REVENUE_INVOICED]
    );

    expect(summarizeKpis(noUnits, 'revenueInvoiced')).toEqual({
      totalRevenue: 12,
      totalUnits: 2,
      recordCount: 3,
      averageTicket: 4,
    });
  });

  it('reports zeros for an empty table', () => {
    expect(summarizeKpis(makeSalesTable([]), 'revenueInvoiced')).toEqual({
      totalRevenue: 0,
      totalUnits: 0,
      recordCount: 0,
      averageTicket: 0,
    });
  });
});

describe('monthlyRevenue', () => {
  it('sums per month and fills gaps with zero', () => {
    expect(monthlyRevenue(table, 'revenueInvoiced')).toEqual([
      { month: '2024-01', revenue: 150.5 },
      { month: '2024-02', revenue: 0 },
      { month: '2024-03', revenue: 200 },
    ]);
  });

  it('spans a year boundary', () => {
    const rows = [
      { FechaVta: '10/01/2024', VtaFacturada: '1' },
      { FechaVta: '31/12/2023', VtaFacturada: '2' },
    ];

    expect(monthlyRevenue(makeSalesTable(rows), 'revenueInvoiced')).toEqual([
      { month: '2023-12', revenue: 2 },
      { month: '2024-01', revenue: 1 },
    ]);
  });

  it('is empty when no record has a valid date', () => {
    const undated = makeSalesTable([{ FechaVta: 'x', VtaFacturada: '3' }]);

    expect(monthlyRevenue(undated, 'revenueInvoiced')).toEqual([]);
  });
});

describe('topByDimension', () => {
  it('ranks values by revenue', () => {
    expect(topByDimension(table, 'product', 'revenueInvoiced')).toEqual([
      { value: 'Amoxicilina 250mg', revenue: 200 },
      { value: 'Paracetamol 500mg', revenue: 110.5 },
      { value: 'Ibuprofeno 400mg', revenue: 50 },
    ]);
  });

  it('applies the limit', () => {
    expect(topByDimension(table, 'client', 'revenueInvoiced', 1)).toEqual([
      { value: 'Farmacia Central', revenue: 300.5 },
    ]);
  });

  it('skips records with an empty value', () => {
    const rows = [
      { Ciudad: 'Potosi', VtaFacturada: '4' },
      { Ciudad: '', VtaFacturada: '9' },
    ];

    expect(topByDimension(makeSalesTable(rows), 'city', 'revenueInvoiced')).toEqual([
      { value: 'Potosi', revenue: 4 },
    ]);
  });

  it('returns null when the column is absent', () => {
    const noZone = makeSalesTable([{ VtaFacturada: '1' }], [SourceColumn.REVENUE_INVOICED]);

    expect(topByDimension(noZone, 'zone', 'revenueInvoiced')).toBeNull();
  });
});

describe('analyzeMargin', () => {
  it('totals revenue minus cost', () => {
    const margin = analyzeMargin(table, 'revenueInvoiced');

    expect(margin?.totalMargin).toBe(144.5);
    expect(margin?.marginPct).toBeCloseTo(144.5 / 360.5, 12);
    expect(margin?.topProducts).toEqual([
      { product: 'Amoxicilina 250mg', margin: 80 },
      { product: 'Paracetamol 500mg', margin: 44.5 },
      { product: 'Ibuprofeno 400mg', margin: 20 },
    ]);
  });

  it('reports a zero percentage without revenue', () => {
    const rows = [{ Costo: '3', VtaFacturada: '' }];

    expect(analyzeMargin(makeSalesTable(rows), 'revenueInvoiced')).toEqual({
      totalMargin: -3,
      marginPct: 0,
      topProducts: [],
    });
  });

  it('returns null without a cost column', () => {
    const noCost = makeSalesTable([{ VtaFacturada: '1' }], [SourceColumn.REVENUE_INVOICED]);

    expect(analyzeMargin(noCost, 'revenueInvoiced')).toBeNull();
  });
});

describe('describeFilterOptions', () => {
  it('lists sorted distinct values and the date span', () => {
    expect(describeFilterOptions(table)).toEqual({
      dimensions: {
        category: ['Analgesicos', 'Antibioticos'],
        product: ['Amoxicilina 250mg', 'Ibuprofeno 400mg', 'Paracetamol 500mg'],
        client: ['Botica del Sur', 'Farmacia Central'],
        city: ['La Paz', 'Santa Cruz'],
        zone: ['Norte', 'Sur'],
      },
      minDate: '2024-01-15',
      maxDate: '2024-03-03',
    });
  });

  it('omits absent dimensions and reports no dates', () => {
    const minimal = makeSalesTable([{ Ciudad: 'Tarija' }], [SourceColumn.CITY]);

    expect(describeFilterOptions(minimal)).toEqual({
      dimensions: { city: ['Tarija'] },
      minDate: null,
      maxDate: null,
    });
  });
});

describe('summarizeSales', () => {
  it('combines every section for one revenue field', () => {
    const summary = summarizeSales(table, 'revenueInvoiced');

    expect(summary.revenueField).toBe('revenueInvoiced');
    expect(summary.kpis.totalRevenue).toBe(360.5);
    expect(summary.monthly).toHaveLength(3);
    expect(summary.byCity).toEqual([
      { value: 'Santa Cruz', revenue: 200 },
      { value: 'La Paz', revenue: 160.5 },
    ]);
    expect(summary.byZone).toEqual([
      { value: 'Norte', revenue: 300.5 },
      { value: 'Sur', revenue: 60 },
    ]);
    expect(summary.margin?.totalMargin).toBe(144.5);
  });
});
