import { describe, it, expect } from 'vitest';
import { DateTime } from 'luxon';
import { CancelledError, ConnectionError, FetchError } from '@wexport/utils';
import { buildRangeQuery, describeQuery, fetchRecords } from '../../src/record-fetcher.js';
import { FAKE_DIALECT, FakeWarehouse, orderRow } from '../helpers/fake-warehouse.js';

const interval = {
  start: DateTime.fromISO('1995-01-01', { zone: 'utc' }),
  end: DateTime.fromISO('1995-02-01', { zone: 'utc' }),
};

describe('buildRangeQuery', () => {
  it('binds both boundaries through the dialect cast', () => {
    const query = buildRangeQuery(FAKE_DIALECT, 'SALES.PUBLIC.ORDERS', 'SHIPPED_ON', interval);

    expect(query.text).toBe(
      'SELECT * FROM SALES.PUBLIC.ORDERS WHERE SHIPPED_ON >= CAST(? AS DATE) AND SHIPPED_ON < CAST(? AS DATE)'
    );
    expect(query.binds).toEqual([
      { type: 'date', value: '1995-01-01' },
      { type: 'date', value: '1995-02-01' },
    ]);
  });

  it('passes the parameter position to the dialect', () => {
    const dialect = { name: 'numbered', dateParameter: (position: number) => `:${position + 1}` };

    expect(buildRangeQuery(dialect, 'T', 'D', interval).text).toBe(
      'SELECT * FROM T WHERE D >= :1 AND D < :2'
    );
  });
});

describe('describeQuery', () => {
  it('appends the bound values', () => {
    expect(describeQuery({ text: 'SELECT 1', binds: [] })).toBe('SELECT 1');
    expect(
      describeQuery({
        text: 'SELECT ?',
        binds: [{ type: 'date', value: '2024-01-01' }],
      })
    ).toBe('SELECT ? -- binds: 2024-01-01');
  });
});

describe('fetchRecords', () => {
  it('returns the rows inside the interval in engine column order', async () => {
    const warehouse = new FakeWarehouse({
      rows: [
        orderRow('1994-12-31', 1),
        orderRow('1995-01-01', 2),
        orderRow('1995-01-31', 3),
        orderRow('1995-02-01', 4),
      ],
    });

    const result = await fetchRecords(warehouse, 'ORDERS', 'SHIPPED_ON', interval);

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.columns).toEqual(['SHIPPED_ON', 'SHIPMENT_ID', 'NOTE']);
      expect(result.value.rows).toEqual([
        ['1995-01-01', 2, 'order 2'],
        ['1995-01-31', 3, 'order 3'],
      ]);
    }
    expect(result.queryText).toBe(
      'SELECT * FROM ORDERS WHERE SHIPPED_ON >= CAST(? AS DATE) AND SHIPPED_ON < CAST(? AS DATE)' +
        ' -- binds: 1995-01-01, 1995-02-01'
    );
  });

  it('wraps query failures in a FetchError value', async () => {
    const cause = new Error('SQL compilation error: invalid identifier');
    const warehouse = new FakeWarehouse({ failures: { '1995-01-01': cause } });

    const result = await fetchRecords(warehouse, 'ORDERS', 'SHIPPED_ON', interval);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(FetchError);
      expect(result.error.message).toBe(
        'Query failed for 1995-01-01..1995-02-01: SQL compilation error: invalid identifier'
      );
      expect(result.error.cause).toBe(cause);
      expect(result.error.context).toEqual({ interval: '1995-01-01..1995-02-01', table: 'ORDERS' });
    }
  });

  it('passes connection errors through unchanged', async () => {
    const lost = new ConnectionError('Connection terminated');
    const warehouse = new FakeWarehouse({ failures: { '1995-01-01': lost } });

    const result = await fetchRecords(warehouse, 'ORDERS', 'SHIPPED_ON', interval);

    expect(result.ok).toBe(false);
    expect(result.ok ? undefined : result.error).toBe(lost);
  });

  it('reports an aborted query as cancelled', async () => {
    const controller = new AbortController();
    const warehouse = new FakeWarehouse({ delays: { '1995-01-01': 1000 } });

    const pending = fetchRecords(warehouse, 'ORDERS', 'SHIPPED_ON', interval, {
      signal: controller.signal,
    });
    controller.abort();
    const result = await pending;

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(CancelledError);
      expect(result.error.message).toBe('Export cancelled while the query was running');
    }
  });
});
