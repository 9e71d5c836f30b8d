import { describe, expect, it } from 'vitest';

import { createClusterCache, fingerprintRecords } from '@/modules/sales/shell/cache/cluster-cache.js';

import { SAMPLE_ROWS, makeSalesTable } from '../../fixtures/builders.js';

describe('fingerprintRecords', () => {
  it('is stable for equal content', () => {
    const first = makeSalesTable(SAMPLE_ROWS);
    const second = makeSalesTable(SAMPLE_ROWS);

    expect(fingerprintRecords(first.records)).toBe(fingerprintRecords(second.records));
    expect(fingerprintRecords(first.records)).toMatch(/^[0-9a-f]{16}$/);
  });

  it('changes when revenue or coordinates change', () => {
    const fingerprint = (geo: string, revenue: string): string =>
      fingerprintRecords(makeSalesTable([{ Georeferenciado: geo, VtaFacturada: revenue }]).records);

    const base = fingerprint('1,1', '1');
    const moved = fingerprint('1,2', '1');
    const repriced = fingerprint('1,1', '2');

    expect(moved).not.toBe(base);
    expect(repriced).not.toBe(base);
  });

  it('ignores fields the aggregation does not read', () => {
    const a = makeSalesTable([{ Georeferenciado: '1,1', VtaFacturada: '1', Ciudad: 'Sucre' }]);
    const b = makeSalesTable([{ Georeferenciado: '1,1', VtaFacturada: '1', Ciudad: 'Oruro' }]);

    expect(fingerprintRecords(a.records)).toBe(fingerprintRecords(b.records));
  });
});

describe('createClusterCache', () => {
  const table = makeSalesTable(SAMPLE_ROWS);

  it('returns the cached result for the same content, precision and field', () => {
    const cache = createClusterCache();

    const first = cache.aggregate(table, 3, 'revenueInvoiced');
    const second = cache.aggregate(makeSalesTable(SAMPLE_ROWS), 3, 'revenueInvoiced');

    expect(second).toBe(first);
    expect(cache.stats()).toEqual({ hits: 1, misses: 1, size: 1 });
  });

  it('keys entries by precision and revenue field', () => {
    const cache = createClusterCache();

    cache.aggregate(table, 3, 'revenueInvoiced');
    cache.aggregate(table, 2, 'revenueInvoiced');
    cache.aggregate(table, 3, 'revenueLine');

    expect(cache.stats().size).toBe(3);
  });

  it('shares entries between precisions that truncate to the same digits', () => {
    const cache = createClusterCache();

    const first = cache.aggregate(table, 3, 'revenueInvoiced');

    expect(cache.aggregate(table, 3.7, 'revenueInvoiced')).toBe(first);
  });

  it('drops every entry on invalidate', () => {
    const cache = createClusterCache();
    cache.aggregate(table, 3, 'revenueInvoiced');

    cache.invalidate();

    expect(cache.stats().size).toBe(0);
  });

  it('evicts the least recently used aggregation', () => {
    const cache = createClusterCache({ maxEntries: 2 });

    cache.aggregate(table, 3, 'revenueInvoiced');
    cache.aggregate(table, 2, 'revenueInvoiced');
    cache.aggregate(table, 3, 'revenueInvoiced');
    cache.aggregate(table, 1, 'revenueInvoiced');

    cache.aggregate(table, 3, 'revenueInvoiced');
    cache.aggregate(table, 2, 'revenueInvoiced');

    expect(cache.stats()).toEqual({ hits: 2, misses: 4, size: 2 });
  });

  it('honours maxEntries', () => {
    const cache = createClusterCache({ maxEntries: 1 });

    cache.aggregate(table, 3, 'revenueInvoiced');
    cache.aggregate(table, 2, 'revenueInvoiced');

    expect(cache.stats().size).toBe(1);
  });
});
