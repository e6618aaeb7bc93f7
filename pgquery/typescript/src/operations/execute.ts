/**
 * Query execution through the pg driver.
 *
 * Converts `%s` / `%(name)s` queries with PostgresQuery or PostgresClientQuery
 * and hands the result to a pg client or pool.
 * @module operations/execute
 */

import type { QueryConfig, QueryResult as PgQueryResult, QueryResultRow } from 'pg';
import { Params, Query, Transformer, WireFormat } from '../types/index.js';
import { normalizeEncoding } from '../encoding/index.js';
import { wrapDriverError } from '../errors/index.js';
import {
  MetricNames,
  Observability,
  SpanContext,
  createNoopObservability,
} from '../observability/index.js';
import { QueryConverter, getDefaultConverter } from '../query/converter.js';
import { PostgresClientQuery, PostgresQuery } from '../query/postgres-query.js';
import { TextTransformer } from '../transformer/index.js';

/**
 * Anything with pg's `query(config)`: a Client, a PoolClient or a Pool.
 */
export interface Queryable {
  query(config: QueryConfig): Promise<PgQueryResult>;
}

/**
 * Per-call execution options.
 */
export interface ExecuteOptions {
  /** Render parameters as literals into the query instead of sending them apart */
  clientSide?: boolean;
}

/**
 * Execution result.
 */
export interface ExecutionResult<T = QueryResultRow> {
  rows: T[];
  /** Rows returned or affected */
  rowCount: number;
  /** SQL command executed (INSERT, UPDATE, DELETE, SELECT, etc.) */
  command: string;
  /** Execution duration in milliseconds */
  duration: number;
}

/**
 * Options for creating a QueryExecutor.
 */
export interface QueryExecutorOptions {
  /** Creates the transformer of each execution; a TextTransformer by default */
  createTransformer?: () => Transformer;
  /** Converter to parse through; the process-wide one by default */
  converter?: QueryConverter;
  /** Observability container */
  observability?: Observability;
  /** Connection encoding for the default transformer */
  encoding?: string;
}

/**
 * Executes `%s` / `%(name)s` queries on a pg client.
 *
 * @example
 * ```typescript
 * const executor = new QueryExecutor(pool);
 * const result = await executor.execute(
 *   'SELECT * FROM users WHERE name = %(name)s AND age > %(age)s',
 *   { name: 'alice', age: 18 }
 * );
 * ```
 */
export class QueryExecutor {
  private readonly client: Queryable;
  private readonly createTransformer: () => Transformer;
  private readonly converter: QueryConverter;
  private readonly observability: Observability;

  constructor(client: Queryable, options: QueryExecutorOptions = {}) {
    this.client = client;
    this.converter = options.converter ?? getDefaultConverter();
    const encoding = options.encoding ?? this.converter.config.encoding;
    this.createTransformer = options.createTransformer ?? (() => new TextTransformer(encoding));
    this.observability = options.observability ?? createNoopObservability();
  }

  /**
   * Converts a query and its parameters into a pg query config.
   *
   * Text parameters become strings; binary ones stay Buffers, which pg sends
   * in binary format.
   *
   * @throws {QueryError} If the query or parameters are invalid
   */
  toQueryConfig(query: Query, params?: Params | null, options: ExecuteOptions = {}): QueryConfig {
    const tx = this.createTransformer();
    const pgQuery = options.clientSide
      ? new PostgresClientQuery(tx, { converter: this.converter })
      : new PostgresQuery(tx, { converter: this.converter });
    pgQuery.convert(query, params);

    const encoding = normalizeEncoding(tx.encoding ?? this.converter.config.encoding);
    const text = pgQuery.query.toString(encoding);
    if (options.clientSide || pgQuery.params === null) {
      return { text };
    }

    const formats = pgQuery.formats;
    const values = pgQuery.params.map((param, index) => {
      if (param === null) return null;
      return formats?.[index] === WireFormat.Binary ? param : param.toString(encoding);
    });
    return { text, values };
  }

  /**
   * Executes a query and returns its rows.
   *
   * @template T - Row type
   * @throws {QueryError} If conversion or execution fails
   */
  async execute<T extends QueryResultRow = QueryResultRow>(
    query: Query,
    params?: Params | null,
    options: ExecuteOptions = {}
  ): Promise<ExecutionResult<T>> {
    const { logger, metrics, tracer } = this.observability;
    const variant = options.clientSide ? 'client' : 'server';

    return tracer.withSpan(
      'pgquery.execute',
      async (span: SpanContext) => {
        const startTime = Date.now();
        try {
          const config = this.toQueryConfig(query, params, options);
          span.setAttribute('param_count', config.values?.length ?? 0);
          // client-side text carries the parameter values as literals
          logger.debug(
            'Executing query',
            options.clientSide ? { variant } : { query: redactQuery(config.text), variant }
          );

          const result = await this.client.query(config);
          const duration = Date.now() - startTime;

          metrics.increment(MetricNames.QUERIES_TOTAL, 1, { variant, status: 'success' });
          metrics.timing(MetricNames.QUERY_DURATION_SECONDS, duration, { variant });
          span.setAttribute('row_count', result.rowCount ?? 0);

          return {
            rows: result.rows.filter(isRow<T>),
            rowCount: result.rowCount ?? result.rows.length,
            command: result.command,
            duration,
          };
        } catch (error) {
          const wrapped = wrapDriverError(error);
          metrics.increment(MetricNames.QUERIES_TOTAL, 1, { variant, status: 'error' });
          metrics.increment(MetricNames.ERRORS_TOTAL, 1, { code: wrapped.code });
          logger.error('Query execution failed', {
            code: wrapped.code,
            sqlState: wrapped.sqlState,
            message: wrapped.message,
          });
          span.recordException(wrapped);
          throw wrapped;
        }
      },
      { variant }
    );
  }
}

function isRow<T extends QueryResultRow>(row: unknown): row is T {
  return typeof row === 'object' && row !== null;
}

function redactQuery(query: string): string {
  return query.length > 200 ? query.substring(0, 200) + '...' : query;
}
