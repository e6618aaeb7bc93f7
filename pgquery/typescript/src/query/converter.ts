/**
 * Query conversion service.
 *
 * Owns the parsed-query caches of both binding variants and decides which
 * queries may enter them.
 * @module query/converter
 */

import { ParsedClientQuery, ParsedServerQuery } from '../types/index.js';
import { CacheStats, LruCache } from '../cache/index.js';
import { ConverterConfig, createDefaultConverterConfig } from '../config/index.js';
import { Logger, MetricNames, MetricsCollector, NoopLogger, NoopMetricsCollector } from '../observability/index.js';
import { isQueryError } from '../errors/index.js';
import { assembleClientQuery, assembleServerQuery } from './assembler.js';

/**
 * Binding variant.
 */
export type BindVariant = 'server' | 'client';

/**
 * Options for creating a QueryConverter.
 */
export interface QueryConverterOptions {
  /** Configuration overrides */
  config?: Partial<ConverterConfig>;
  /** Logger */
  logger?: Logger;
  /** Metrics collector */
  metrics?: MetricsCollector;
  /** Cache for server-side parses; defaults to an LRU of `config.cacheCapacity` */
  serverCache?: LruCache<string, ParsedServerQuery>;
  /** Cache for client-side parses; defaults to an LRU of `config.cacheCapacity` */
  clientCache?: LruCache<string, ParsedClientQuery>;
}

/**
 * Parses queries for server-side and client-side binding, memoizing results.
 *
 * Queries longer than `maxCachedStatementLength` bytes, or bound to more than
 * `maxCachedStatementParams` parameters, are parsed on every call and never
 * stored.
 *
 * @example
 * ```typescript
 * const converter = new QueryConverter({ config: { cacheCapacity: 256 } });
 * const parsed = converter.parseServer(Buffer.from('SELECT %s'), 'utf8', 1);
 * parsed.query.toString(); // 'SELECT $1'
 * ```
 */
export class QueryConverter {
  readonly config: ConverterConfig;
  readonly serverCache: LruCache<string, ParsedServerQuery>;
  readonly clientCache: LruCache<string, ParsedClientQuery>;
  private readonly logger: Logger;
  private readonly metrics: MetricsCollector;

  constructor(options: QueryConverterOptions = {}) {
    this.config = createDefaultConverterConfig(options.config);
    this.logger = (options.logger ?? new NoopLogger()).child({ component: 'QueryConverter' });
    this.metrics = options.metrics ?? new NoopMetricsCollector();
    this.serverCache = options.serverCache ?? new LruCache(this.config.cacheCapacity);
    this.clientCache = options.clientCache ?? new LruCache(this.config.cacheCapacity);
  }

  /**
   * Whether a query and parameter count may be cached.
   */
  isCacheable(query: Buffer, paramCount: number): boolean {
    return (
      query.length <= this.config.maxCachedStatementLength &&
      paramCount <= this.config.maxCachedStatementParams
    );
  }

  /**
   * Parses a query for server-side binding.
   *
   * @param query - Raw query bytes
   * @param encoding - Connection encoding
   * @param paramCount - Number of parameters bound to the query
   */
  parseServer(query: Buffer, encoding: string, paramCount: number): ParsedServerQuery {
    return this.parse('server', this.serverCache, assembleServerQuery, query, encoding, paramCount);
  }

  /**
   * Parses a query for client-side binding.
   *
   * @param query - Raw query bytes
   * @param encoding - Connection encoding
   * @param paramCount - Number of parameters bound to the query
   */
  parseClient(query: Buffer, encoding: string, paramCount: number): ParsedClientQuery {
    return this.parse('client', this.clientCache, assembleClientQuery, query, encoding, paramCount);
  }

  private parse<T>(
    variant: BindVariant,
    cache: LruCache<string, T>,
    assemble: (query: Buffer, encoding: string) => T,
    query: Buffer,
    encoding: string,
    paramCount: number
  ): T {
    const tags = { variant };
    this.metrics.increment(MetricNames.CONVERSIONS_TOTAL, 1, tags);

    try {
      if (!this.isCacheable(query, paramCount)) {
        this.metrics.increment(MetricNames.CACHE_BYPASS_TOTAL, 1, tags);
        this.logger.trace('Query cache bypassed', {
          variant,
          length: query.length,
          paramCount,
        });
        return assemble(query, encoding);
      }

      let hit = true;
      const parsed = cache.getOrCompute(cacheKey(query, encoding), () => {
        hit = false;
        this.metrics.increment(MetricNames.CACHE_MISSES_TOTAL, 1, tags);
        return assemble(query, encoding);
      });
      if (hit) {
        this.metrics.increment(MetricNames.CACHE_HITS_TOTAL, 1, tags);
      }
      return parsed;
    } catch (error) {
      if (isQueryError(error)) {
        this.metrics.increment(MetricNames.CONVERSION_ERRORS_TOTAL, 1, { ...tags, code: error.code });
        this.logger.debug('Query conversion failed', { variant, code: error.code, message: error.message });
      }
      throw error;
    }
  }

  /**
   * Empties both caches and resets their counters.
   */
  clearCaches(): void {
    this.serverCache.clear();
    this.serverCache.resetStats();
    this.clientCache.clear();
    this.clientCache.resetStats();
  }

  /**
   * Counters of both caches.
   */
  cacheStats(): Record<BindVariant, CacheStats> {
    return {
      server: this.serverCache.stats(),
      client: this.clientCache.stats(),
    };
  }
}

/**
 * Cache key for a query: the encoding and the raw bytes, both significant.
 */
export function cacheKey(query: Buffer, encoding: string): string {
  return `${encoding}\u0000${query.toString('latin1')}`;
}

let defaultConverter: QueryConverter | undefined;

/**
 * Process-wide converter used when none is injected.
 */
export function getDefaultConverter(): QueryConverter {
  if (defaultConverter === undefined) {
    defaultConverter = new QueryConverter();
  }
  return defaultConverter;
}

/**
 * Replaces the process-wide converter; with no argument a fresh one is created
 * on next use.
 */
export function resetDefaultConverter(converter?: QueryConverter): void {
  defaultConverter = converter;
}
