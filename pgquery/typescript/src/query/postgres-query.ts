/**
 * Bound queries: a query and one parameter set, ready for execution.
 * @module query/postgres-query
 */

import {
  Params,
  ParsedClientQuery,
  ParsedServerQuery,
  Query,
  Transformer,
  WireFormat,
  isComposable,
} from '../types/index.js';
import { ConversionError, NotConvertedError, ParamCountMismatchError } from '../errors/index.js';
import { encode, normalizeEncoding } from '../encoding/index.js';
import { QueryConverter, getDefaultConverter } from './converter.js';
import { countParams, describeType, validateAndReorderParams } from './params.js';

const NULL_LITERAL = Buffer.from('NULL', 'latin1');
const PERCENT = 0x25;
const LOWER_S = 0x73;

/**
 * Options for bound queries.
 */
export interface PostgresQueryOptions {
  /** Converter to parse through; the process-wide one by default */
  converter?: QueryConverter;
}

interface DumpedParams {
  params: ReadonlyArray<Buffer | null>;
  types: readonly number[];
  formats: readonly WireFormat[] | null;
}

/**
 * Converts a query with `%s` / `%(name)s` placeholders and its parameters
 * into PostgreSQL form for server-side binding.
 *
 * After `convert()`, `query` holds the `$n` query and `params`, `types` and
 * `formats` the dumped parameters. `dump()` binds another parameter set to the
 * same query without parsing it again. A call that throws leaves every field
 * as it was.
 *
 * @example
 * ```typescript
 * const pgq = new PostgresQuery(transformer);
 * pgq.convert('SELECT * FROM t WHERE a = %s AND b = %s', [1, 'x']);
 * pgq.query.toString(); // 'SELECT * FROM t WHERE a = $1 AND b = $2'
 * pgq.dump([2, 'y']);
 * ```
 */
export class PostgresQuery {
  /** Query bytes to send */
  query: Buffer = Buffer.alloc(0);
  /** Dumped parameters; null when no parameters were given */
  params: ReadonlyArray<Buffer | null> | null = null;
  /** Parameter type OIDs */
  types: readonly number[] = [];
  /** Parameter wire formats */
  formats: readonly WireFormat[] | null = null;

  protected readonly tx: Transformer;
  protected readonly converter: QueryConverter;
  protected readonly encoding: string;
  private bound: ParsedServerQuery | null = null;

  constructor(transformer: Transformer, options: PostgresQueryOptions = {}) {
    this.tx = transformer;
    this.converter = options.converter ?? getDefaultConverter();
    this.encoding = transformer.encoding ?? this.converter.config.encoding;
    normalizeEncoding(this.encoding);
  }

  /**
   * Sets up the query and parameters to convert.
   *
   * Without parameters the query is used as is: `%` sequences are not
   * interpreted.
   */
  convert(query: Query, params?: Params | null): void {
    const bquery = this.toBytes(query);

    if (params === null || params === undefined) {
      this.bound = null;
      this.query = bquery;
      this.clearParams();
      return;
    }

    const parsed = this.converter.parseServer(bquery, this.encoding, countParams(params));
    const dumped = this.dumpParams(parsed, params);
    this.bound = parsed;
    this.query = parsed.query;
    this.setParams(dumped);
  }

  /**
   * Binds a new parameter set to the query processed by `convert()`.
   *
   * Replaces `params`, `types` and `formats`.
   */
  dump(params?: Params | null): void {
    if (params === null || params === undefined) {
      this.clearParams();
      return;
    }
    if (this.bound === null) {
      throw new NotConvertedError();
    }
    this.setParams(this.dumpParams(this.bound, params));
  }

  protected toBytes(query: Query): Buffer {
    if (typeof query === 'string') {
      return encode(query, this.encoding);
    }
    if (Buffer.isBuffer(query)) {
      return query;
    }
    if (query instanceof Uint8Array) {
      return Buffer.from(query.buffer, query.byteOffset, query.byteLength);
    }
    if (isComposable(query)) {
      return query.asBytes(this.tx);
    }
    throw new ConversionError(
      `query should be a string, bytes or a composable object, got ${describeType(query)}`
    );
  }

  private dumpParams(parsed: ParsedServerQuery, params: Params): DumpedParams {
    const values = validateAndReorderParams(parsed.parts, params, parsed.order);
    return {
      params: this.tx.dumpSequence(values, parsed.formats),
      types: this.tx.types ?? [],
      formats: this.tx.formats,
    };
  }

  private setParams(dumped: DumpedParams): void {
    this.params = dumped.params;
    this.types = dumped.types;
    this.formats = dumped.formats;
  }

  private clearParams(): void {
    this.params = null;
    this.types = [];
    this.formats = null;
  }
}

/**
 * Converts a query and its parameters into a single query with the
 * parameters rendered as literals (client-side binding).
 *
 * `params` holds the rendered literals; `types` and `formats` are unused.
 */
export class PostgresClientQuery extends PostgresQuery {
  /** Query with `%s` markers, `%%` preserved */
  template: Buffer | null = null;

  private parsedTemplate: ParsedClientQuery | null = null;

  override convert(query: Query, params?: Params | null): void {
    const bquery = this.toBytes(query);

    if (params === null || params === undefined) {
      this.parsedTemplate = null;
      this.template = null;
      this.query = bquery;
      this.params = null;
      return;
    }

    const parsed = this.converter.parseClient(bquery, this.encoding, countParams(params));
    const literals = this.renderLiterals(parsed, params);
    const expanded = expandTemplate(parsed.template, literals);
    this.parsedTemplate = parsed;
    this.template = parsed.template;
    this.params = literals;
    this.query = expanded;
  }

  override dump(params?: Params | null): void {
    if (params === null || params === undefined) {
      this.params = null;
      return;
    }
    if (this.parsedTemplate === null) {
      throw new NotConvertedError();
    }
    const literals = this.renderLiterals(this.parsedTemplate, params);
    const expanded = expandTemplate(this.parsedTemplate.template, literals);
    this.params = literals;
    this.query = expanded;
  }

  private renderLiterals(parsed: ParsedClientQuery, params: Params): Buffer[] {
    const values = validateAndReorderParams(parsed.parts, params, parsed.order);
    return values.map(value =>
      value === null || value === undefined ? NULL_LITERAL : this.tx.asLiteral(value)
    );
  }
}

/**
 * Substitutes literals into a client-side template: each `%s` takes the next
 * literal and `%%` becomes `%`. Any other `%` is copied unchanged.
 *
 * @throws {ParamCountMismatchError} If the number of `%s` markers and literals differ
 */
export function expandTemplate(template: Buffer, literals: readonly Buffer[]): Buffer {
  const chunks: Buffer[] = [];
  let start = 0;
  let next = 0;
  let i = template.indexOf(PERCENT);

  while (i !== -1 && i + 1 < template.length) {
    const following = template[i + 1];
    if (following === LOWER_S || following === PERCENT) {
      chunks.push(template.subarray(start, i));
      if (following === PERCENT) {
        chunks.push(template.subarray(i, i + 1));
      } else {
        if (next >= literals.length) {
          throw new ParamCountMismatchError(countMarkers(template), literals.length);
        }
        chunks.push(literals[next++]);
      }
      start = i + 2;
      i = template.indexOf(PERCENT, start);
    } else {
      i = template.indexOf(PERCENT, i + 1);
    }
  }

  if (next !== literals.length) {
    throw new ParamCountMismatchError(next, literals.length);
  }
  chunks.push(template.subarray(start));
  return Buffer.concat(chunks);
}

function countMarkers(template: Buffer): number {
  let count = 0;
  for (let i = 0; i < template.length - 1; i++) {
    if (template[i] === PERCENT) {
      if (template[i + 1] === LOWER_S) count++;
      i++;
    }
  }
  return count;
}
