import { describe, expect, it } from 'vitest';

import { REVENUE_FIELDS, SourceColumn } from '@/modules/sales/core/types.js';
import { aggregateGeoClusters } from '@/modules/sales/core/usecases/aggregate-geo-clusters.js';

import { SAMPLE_ROWS, makeSalesTable } from '../../fixtures/builders.js';

import type { NormalizedSalesTable } from '@/modules/sales/core/types.js';

const totalRevenue = (table: NormalizedSalesTable): number =>
  table.records.reduce(
    (sum, r) => (r.latitude !== null && r.longitude !== null ? sum + (r.revenueInvoiced ?? 0) : sum),
    0
  );

describe('aggregateGeoClusters', () => {
  it('groups nearby records into one bucket', () => {
    const table = makeSalesTable(SAMPLE_ROWS);

    const buckets = aggregateGeoClusters(table, 3, 'revenueInvoiced');

    expect(buckets).toEqual([
      {
        cluster: [-17.783, -63.182],
        latitude: -17.7833,
        longitude: -63.1821,
        revenue: 200,
        count: 1,
      },
      {
        cluster: [-16.5, -68.15],
        latitude: -16.50025,
        longitude: -68.15025,
        revenue: 150.5,
        count: 2,
      },
    ]);
  });

  it('skips records without both coordinates', () => {
    const table = makeSalesTable([
      { Georeferenciado: '', VtaFacturada: '10' },
      { Georeferenciado: 'abc', VtaFacturada: '10' },
      { Georeferenciado: '1,1', VtaFacturada: '10' },
    ]);

    const buckets = aggregateGeoClusters(table, 3, 'revenueInvoiced');

    expect(buckets).toHaveLength(1);
    expect(buckets[0]?.count).toBe(1);
  });

  it('counts records with null revenue without adding to the sum', () => {
    const table = makeSalesTable([
      { Georeferenciado: '1,1', VtaFacturada: '10' },
      { Georeferenciado: '1,1', VtaFacturada: '' },
    ]);

    const [bucket] = aggregateGeoClusters(table, 3, 'revenueInvoiced');

    expect(bucket?.count).toBe(2);
    expect(bucket?.revenue).toBe(10);
  });

  it('sums the selected revenue field', () => {
    const table = makeSalesTable(SAMPLE_ROWS);

    const buckets = aggregateGeoClusters(table, 3, 'revenueLine');

    expect(buckets.map((b) => b.revenue)).toEqual([190, 148]);
  });

  it('keeps first-encounter order for equal revenue', () => {
    const table = makeSalesTable([
      { Georeferenciado: '2,2', VtaFacturada: '5' },
      { Georeferenciado: '1,1', VtaFacturada: '5' },
      { Georeferenciado: '3,3', VtaFacturada: '9' },
    ]);

    const buckets = aggregateGeoClusters(table, 3, 'revenueInvoiced');

    expect(buckets.map((b) => b.cluster)).toEqual([
      [3, 3],
      [2, 2],
      [1, 1],
    ]);
  });

  it('places records at the same rounded point in one bucket across signs of zero', () => {
    const table = makeSalesTable([
      { Georeferenciado: '-0.0001,0.0001', VtaFacturada: '1' },
      { Georeferenciado: '0.0001,-0.0001', VtaFacturada: '1' },
    ]);

    const buckets = aggregateGeoClusters(table, 3, 'revenueInvoiced');

    expect(buckets).toHaveLength(1);
    expect(buckets[0]?.count).toBe(2);
  });

  it('returns an empty list for an empty table', () => {
    expect(aggregateGeoClusters({ records: [] }, 3, 'revenueInvoiced')).toEqual([]);
  });

  it('returns an empty list for every revenue field when the source has no coordinates column', () => {
    const table = makeSalesTable(
      [{ VtaFacturada: '10', ValVentaLi: '9' }],
      [SourceColumn.REVENUE_INVOICED, SourceColumn.REVENUE_LINE]
    );

    for (const field of REVENUE_FIELDS) {
      expect(aggregateGeoClusters(table, 3, field)).toEqual([]);
    }
  });

  describe('invariants', () => {
    const table = makeSalesTable([
      ...SAMPLE_ROWS,
      { Georeferenciado: '-16.51,-68.12', VtaFacturada: '30.25' },
      { Georeferenciado: '-16.49,-68.11', VtaFacturada: '12.75' },
      { Georeferenciado: '-17.7801 -63.1899', VtaFacturada: '' },
    ]);

    it('conserves revenue and count of coordinate-bearing records', () => {
      for (const precision of [-1, 0, 1, 2, 3, 4]) {
        const buckets = aggregateGeoClusters(table, precision, 'revenueInvoiced');
        const revenue = buckets.reduce((sum, b) => sum + b.revenue, 0);
        const count = buckets.reduce((sum, b) => sum + b.count, 0);

        expect(revenue).toBeCloseTo(totalRevenue(table), 9);
        expect(count).toBe(6);
      }
    });

    it('never yields more buckets at a coarser precision', () => {
      const sizes = [4, 3, 2, 1, 0].map(
        (precision) => aggregateGeoClusters(table, precision, 'revenueInvoiced').length
      );

      for (let i = 1; i < sizes.length; i++) {
        expect(sizes[i]).toBeLessThanOrEqual(sizes[i - 1] ?? 0);
      }
    });

    it('returns the same output for the same input', () => {
      expect(aggregateGeoClusters(table, 2, 'revenueDefault')).toEqual(
        aggregateGeoClusters(table, 2, 'revenueDefault')
      );
    });

    it('sorts by revenue descending', () => {
      const revenues = aggregateGeoClusters(table, 2, 'revenueInvoiced').map((b) => b.revenue);

      expect(revenues).toEqual([...revenues].sort((a, b) => b - a));
    });
  });
});
