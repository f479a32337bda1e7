import { describe, it, expect } from 'vitest';
import { CancelledError } from '@wexport/utils';
import { SerializedQueryHandle, withExclusiveAccess } from '../../src/serialized-query-handle.js';
import { FakeWarehouse } from '../helpers/fake-warehouse.js';

function dayQuery(day: string) {
  return {
    text: 'SELECT * FROM T WHERE D >= ? AND D < ?',
    binds: [
      { type: 'date' as const, value: day },
      { type: 'date' as const, value: '2099-01-01' },
    ],
  };
}

describe('withExclusiveAccess', () => {
  it('returns a concurrency-safe handle unchanged', () => {
    const warehouse = new FakeWarehouse({ concurrencySafe: true });
    expect(withExclusiveAccess(warehouse)).toBe(warehouse);
  });

  it('wraps a handle that is not concurrency-safe', () => {
    const warehouse = new FakeWarehouse({ concurrencySafe: false });
    const wrapped = withExclusiveAccess(warehouse);

    expect(wrapped).toBeInstanceOf(SerializedQueryHandle);
    expect(wrapped.concurrencySafe).toBe(true);
    expect(wrapped.dialect).toBe(warehouse.dialect);
  });
});

describe('SerializedQueryHandle', () => {
  it('runs one query at a time in submission order', async () => {
    const warehouse = new FakeWarehouse({
      concurrencySafe: false,
      delays: { '2024-01-01': 20, '2024-01-02': 1, '2024-01-03': 5 },
    });
    const handle = new SerializedQueryHandle(warehouse);

    await Promise.all(['2024-01-01', '2024-01-02', '2024-01-03'].map((d) => handle.execute(dayQuery(d))));

    expect(warehouse.maxInFlight).toBe(1);
    expect(warehouse.startDates()).toEqual(['2024-01-01', '2024-01-02', '2024-01-03']);
  });

  it('releases the lock after a failed query', async () => {
    const warehouse = new FakeWarehouse({
      concurrencySafe: false,
      failures: { '2024-01-01': new Error('syntax error') },
    });
    const handle = new SerializedQueryHandle(warehouse);

    const results = await Promise.allSettled([
      handle.execute(dayQuery('2024-01-01')),
      handle.execute(dayQuery('2024-01-02')),
    ]);

    expect(results.map((r) => r.status)).toEqual(['rejected', 'fulfilled']);
  });

  it('skips queries whose signal aborted while waiting', async () => {
    const warehouse = new FakeWarehouse({ concurrencySafe: false, delays: { '2024-01-01': 20 } });
    const handle = new SerializedQueryHandle(warehouse);
    const controller = new AbortController();

    const first = handle.execute(dayQuery('2024-01-01'));
    const second = handle.execute(dayQuery('2024-01-02'), { signal: controller.signal });
    controller.abort();

    const [firstResult, secondResult] = await Promise.allSettled([first, second]);

    expect(firstResult.status).toBe('fulfilled');
    expect(secondResult.status === 'rejected' ? secondResult.reason : undefined).toBeInstanceOf(
      CancelledError
    );
    expect(warehouse.startDates()).toEqual(['2024-01-01']);
  });

  it('closes the wrapped handle', async () => {
    const warehouse = new FakeWarehouse({ concurrencySafe: false });
    await new SerializedQueryHandle(warehouse).close();
    expect(warehouse.closed).toBe(true);
  });
});
