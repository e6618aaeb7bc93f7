/**
 * pgquery
 *
 * Converts queries written with `%s`, `%t`, `%b` and `%(name)s` placeholders
 * into what PostgreSQL executes:
 * - server-side binding: `$1`, `$2`, ... markers plus the parameters, dumped
 *   in the requested formats
 * - client-side binding: one query with the parameters rendered as literals
 *
 * @example Server-side binding
 * ```typescript
 * import { PostgresQuery, TextTransformer } from 'pgquery';
 *
 * const pgq = new PostgresQuery(new TextTransformer('utf8'));
 * pgq.convert('SELECT %(a)s, %(a)s, %(b)t', { a: 1, b: 2 });
 * pgq.query.toString();   // 'SELECT $1, $1, $2'
 * pgq.params;             // [Buffer('1'), Buffer('2')]
 * ```
 *
 * @example Client-side binding
 * ```typescript
 * import { PostgresClientQuery, TextTransformer } from 'pgquery';
 *
 * const pgq = new PostgresClientQuery(new TextTransformer('utf8'));
 * pgq.convert("SELECT 100%% WHERE name = %s", ["o'hara"]);
 * pgq.query.toString();   // "SELECT 100% WHERE name = 'o''hara'"
 * ```
 *
 * @module pgquery
 */

// =============================================================================
// Types
// =============================================================================

export {
  ParamFormat,
  WireFormat,
  TRAILING_ITEM,
  PG_TYPE_OID,
  formatFromChar,
  isComposable,
} from './types/index.js';
export type {
  QueryItem,
  QueryPart,
  ParsedServerQuery,
  ParsedClientQuery,
  Params,
  ParamsMapping,
  ParamsShape,
  Transformer,
  Composable,
  Query,
} from './types/index.js';

// =============================================================================
// Query Conversion
// =============================================================================

export {
  splitQuery,
  countPlaceholders,
  isNamed,
  isPositional,
  assembleServerQuery,
  assembleClientQuery,
  classifyParams,
  countParams,
  describeType,
  validateAndReorderParams,
  QueryConverter,
  cacheKey,
  getDefaultConverter,
  resetDefaultConverter,
  PostgresQuery,
  PostgresClientQuery,
  expandTemplate,
} from './query/index.js';
export type { BindVariant, QueryConverterOptions, PostgresQueryOptions } from './query/index.js';

// =============================================================================
// Composable Queries
// =============================================================================

export { SQL, Identifier, Literal, Composed } from './sql/index.js';

// =============================================================================
// Value Transformer
// =============================================================================

export { TextTransformer, toParameterValue, quoteString } from './transformer/index.js';
export type { ParameterValue } from './transformer/index.js';

// =============================================================================
// Execution
// =============================================================================

export { QueryExecutor } from './operations/execute.js';
export type {
  Queryable,
  ExecuteOptions,
  ExecutionResult,
  QueryExecutorOptions,
} from './operations/execute.js';

// =============================================================================
// Cache
// =============================================================================

export { LruCache } from './cache/index.js';
export type { CacheStats } from './cache/index.js';

// =============================================================================
// Configuration
// =============================================================================

export {
  MAX_CACHED_STATEMENT_LENGTH,
  MAX_CACHED_STATEMENT_PARAMS,
  DEFAULT_CACHE_CAPACITY,
  DEFAULT_ENCODING,
  validateConverterConfig,
  createDefaultConverterConfig,
  loadConverterConfigFromEnv,
} from './config/index.js';
export type { ConverterConfig } from './config/index.js';

export { normalizeEncoding, encode, decode } from './encoding/index.js';

// =============================================================================
// Errors
// =============================================================================

export {
  QueryError,
  QueryErrorCode,
  ConfigurationError,
  UnsupportedEncodingError,
  MalformedPlaceholderError,
  MixedPlaceholdersError,
  ConflictingFormatError,
  ParamsShapeError,
  ParamCountMismatchError,
  MissingParamsError,
  NotConvertedError,
  ConversionError,
  ExecutionError,
  wrapDriverError,
  isQueryError,
  isProgrammingError,
} from './errors/index.js';

// =============================================================================
// Observability
// =============================================================================

export {
  LogLevel,
  ConsoleLogger,
  NoopLogger,
  InMemoryLogger,
  MetricNames,
  NoopMetricsCollector,
  InMemoryMetricsCollector,
  NoopTracer,
  InMemoryTracer,
  createNoopObservability,
  createInMemoryObservability,
} from './observability/index.js';
export type {
  Logger,
  LogContext,
  LogEntry,
  ConsoleLoggerOptions,
  MetricsCollector,
  MetricTags,
  SpanStatus,
  SpanAttributes,
  SpanContext,
  RecordedSpan,
  Tracer,
  Observability,
} from './observability/index.js';
