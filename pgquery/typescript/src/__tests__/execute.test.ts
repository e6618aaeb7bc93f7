/**
 * Tests for query execution through a pg client.
 */

import type { QueryConfig, QueryResult } from 'pg';
import {
  QueryExecutor,
  QueryConverter,
  TextTransformer,
  createInMemoryObservability,
  MetricNames,
  LogLevel,
  ExecutionError,
  ParamsShapeError,
} from '../index.js';
import type { Queryable } from '../index.js';

function createResult(rows: Array<Record<string, unknown>>, command = 'SELECT'): QueryResult {
  return { command, rowCount: rows.length, oid: 0, fields: [], rows };
}

function createFakeClient(result: QueryResult = createResult([{ id: 1 }])) {
  const query = vi.fn(async (_config: QueryConfig): Promise<QueryResult> => result);
  const client: Queryable = { query };
  return { client, query };
}

describe('QueryExecutor', () => {
  let converter: QueryConverter;

  beforeEach(() => {
    converter = new QueryConverter();
  });

  describe('toQueryConfig', () => {
    it('should pass text parameters as strings', () => {
      const { client } = createFakeClient();
      const executor = new QueryExecutor(client, { converter });

      expect(executor.toQueryConfig('SELECT * FROM t WHERE a = %s AND b = %s', [1, 'x'])).toEqual({
        text: 'SELECT * FROM t WHERE a = $1 AND b = $2',
        values: ['1', 'x'],
      });
    });

    it('should keep binary parameters as buffers and nulls as null', () => {
      const { client } = createFakeClient();
      const executor = new QueryExecutor(client, { converter });

      expect(executor.toQueryConfig('INSERT INTO f VALUES (%s, %s)', [Buffer.from([1]), null])).toEqual({
        text: 'INSERT INTO f VALUES ($1, $2)',
        values: [Buffer.from([1]), null],
      });
    });

    it('should render literals client-side', () => {
      const { client } = createFakeClient();
      const executor = new QueryExecutor(client, { converter });

      expect(executor.toQueryConfig('SELECT %(a)s', { a: "o'k" }, { clientSide: true })).toEqual({
        text: "SELECT 'o''k'",
      });
    });

    it('should send queries without parameters as is', () => {
      const { client } = createFakeClient();
      const executor = new QueryExecutor(client, { converter });

      expect(executor.toQueryConfig('SELECT 100%%')).toEqual({ text: 'SELECT 100%%' });
    });

    it('should use the given transformer factory', () => {
      const { client } = createFakeClient();
      const createTransformer = vi.fn(() => new TextTransformer('latin1'));
      const executor = new QueryExecutor(client, { converter, createTransformer });

      expect(executor.toQueryConfig('SELECT %s', ['é'])).toEqual({ text: 'SELECT $1', values: ['é'] });
      expect(createTransformer).toHaveBeenCalledTimes(1);
    });
  });

  describe('execute', () => {
    it('should run the converted query', async () => {
      const { client, query } = createFakeClient();
      const observability = createInMemoryObservability();
      const executor = new QueryExecutor(client, { converter, observability });

      const result = await executor.execute('SELECT * FROM t WHERE id = %(id)s', { id: 1 });

      expect(query).toHaveBeenCalledWith({ text: 'SELECT * FROM t WHERE id = $1', values: ['1'] });
      expect(result.rows).toEqual([{ id: 1 }]);
      expect(result.rowCount).toBe(1);
      expect(result.command).toBe('SELECT');
      expect(
        observability.metrics.getCounter(MetricNames.QUERIES_TOTAL, { variant: 'server', status: 'success' })
      ).toBe(1);

      const spans = observability.tracer.getSpansByName('pgquery.execute');
      expect(spans).toHaveLength(1);
      expect(spans[0].status).toBe('OK');
      expect(spans[0].attributes).toEqual({ variant: 'server', param_count: 1, row_count: 1 });
    });

    it('should report the affected row count', async () => {
      const result: QueryResult = { command: 'UPDATE', rowCount: 3, oid: 0, fields: [], rows: [] };
      const { client } = createFakeClient(result);
      const executor = new QueryExecutor(client, { converter });

      const out = await executor.execute('UPDATE t SET x = %s', [1], { clientSide: true });

      expect(out.rowCount).toBe(3);
      expect(out.command).toBe('UPDATE');
    });

    it('should log the query text only for server-side binding', async () => {
      const { client } = createFakeClient();
      const observability = createInMemoryObservability();
      const executor = new QueryExecutor(client, { converter, observability });

      await executor.execute('SELECT * FROM users WHERE password = %s', ['test-secret'], { clientSide: true });
      await executor.execute('SELECT * FROM users WHERE password = %s', ['test-secret']);

      const logged = observability.logger.getEntriesAtLevel(LogLevel.DEBUG);
      expect(logged.map(e => e.context)).toEqual([
        { variant: 'client' },
        { query: 'SELECT * FROM users WHERE password = $1', variant: 'server' },
      ]);
    });

    it('should reject invalid parameters before reaching the client', async () => {
      const { client, query } = createFakeClient();
      const observability = createInMemoryObservability();
      const executor = new QueryExecutor(client, { converter, observability });

      await expect(executor.execute('SELECT %s', {})).rejects.toThrow(ParamsShapeError);
      expect(query).not.toHaveBeenCalled();
      expect(
        observability.metrics.getCounter(MetricNames.QUERIES_TOTAL, { variant: 'server', status: 'error' })
      ).toBe(1);
    });

    it('should wrap driver errors', async () => {
      const driverError = Object.assign(new Error('relation "t" does not exist'), { code: '42P01' });
      const query = vi.fn(async (_config: QueryConfig): Promise<QueryResult> => {
        throw driverError;
      });
      const observability = createInMemoryObservability();
      const executor = new QueryExecutor({ query }, { converter, observability });

      const error = await executor.execute('SELECT * FROM t').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ExecutionError);
      if (error instanceof ExecutionError) {
        expect(error.sqlState).toBe('42P01');
        expect(error.cause).toBe(driverError);
      }

      const logged = observability.logger.getEntriesAtLevel(LogLevel.ERROR);
      expect(logged).toHaveLength(1);
      expect(logged[0].context).toEqual({
        code: 'EXECUTION_ERROR',
        sqlState: '42P01',
        message: 'Query execution failed: relation "t" does not exist',
      });
      expect(observability.tracer.getSpansByName('pgquery.execute')[0].status).toBe('ERROR');
      expect(observability.metrics.getCounter(MetricNames.ERRORS_TOTAL, { code: 'EXECUTION_ERROR' })).toBe(1);
    });
  });
});
