/**
 * Logger Tests
 * ============
 * Tests for the centralized logging system
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { logger, Logger, winstonLogger, createLogger } from '../src/index.js';

describe('Logger', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  describe('Logger Instance', () => {
    it('should log info messages with namespace and context', () => {
      const spy = vi.spyOn(winstonLogger, 'info').mockImplementation(() => winstonLogger);
      logger.info('Unit completed', { table: 'DB.S.ORDERS', rows: 3 });
      expect(spy).toHaveBeenCalledWith('Unit completed', {
        namespace: 'wexport',
        table: 'DB.S.ORDERS',
        rows: 3,
      });
      spy.mockRestore();
    });

    it('should flatten Error objects on error()', () => {
      const spy = vi.spyOn(winstonLogger, 'error').mockImplementation(() => winstonLogger);
      const error = new Error('query failed');
      logger.error('Unit failed', error, { interval: '2024-01-01/2024-01-02' });

      const calls: unknown[][] = spy.mock.calls;
      const meta = calls[0]?.[1];
      expect(meta).toMatchObject({
        namespace: 'wexport',
        interval: '2024-01-01/2024-01-02',
        error: { message: 'query failed', name: 'Error' },
      });
      spy.mockRestore();
    });
  });

  describe('Logger Context', () => {
    it('should default the namespace when none is given', () => {
      const spy = vi.spyOn(winstonLogger, 'debug').mockImplementation(() => winstonLogger);
      new Logger().debug('Connecting');
      expect(spy).toHaveBeenCalledWith('Connecting', { namespace: 'wexport' });
      spy.mockRestore();
    });

    it('should create child logger that keeps namespace and context', () => {
      const parent = createLogger('export').child({ runId: 'run-2' });
      const child = parent.child({ interval: '2024-01' });
      const spy = vi.spyOn(winstonLogger, 'info').mockImplementation(() => winstonLogger);

      child.info('Unit started');
      expect(spy).toHaveBeenCalledWith('Unit started', {
        namespace: 'export',
        runId: 'run-2',
        interval: '2024-01',
      });
      spy.mockRestore();
    });

    it('should let call context override persistent context', () => {
      const child = createLogger('export').child({ interval: '2024-01' });
      const spy = vi.spyOn(winstonLogger, 'info').mockImplementation(() => winstonLogger);

      child.info('Unit retried', { interval: '2024-02' });
      expect(spy).toHaveBeenCalledWith('Unit retried', { namespace: 'export', interval: '2024-02' });
      spy.mockRestore();
    });

    it('should merge persistent and call context', () => {
      const child = logger.child({ runId: 'run-3' });
      const spy = vi.spyOn(winstonLogger, 'warn').mockImplementation(() => winstonLogger);

      child.warn('Unit failed', { artifact: 'orders_2024_01_01.csv' });
      expect(spy).toHaveBeenCalledWith('Unit failed', {
        namespace: 'wexport',
        runId: 'run-3',
        artifact: 'orders_2024_01_01.csv',
      });
      spy.mockRestore();
    });
  });
});
