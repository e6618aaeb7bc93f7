/**
 * Logging, metrics and tracing hooks used by the converter and the executor.
 *
 * Each concern has an interface, a no-op implementation and an in-memory one
 * that records what it receives.
 */

// ============================================================================
// Logging
// ============================================================================

export enum LogLevel {
  TRACE = 0,
  DEBUG = 1,
  INFO = 2,
  WARN = 3,
  ERROR = 4,
}

export type LogContext = Record<string, unknown>;

/**
 * Logger interface.
 */
export interface Logger {
  trace(message: string, context?: LogContext): void;
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  /** Logger adding `context` to every entry */
  child(context: LogContext): Logger;
}

/**
 * Shared level dispatch; subclasses only decide where an entry goes.
 */
abstract class BaseLogger implements Logger {
  constructor(protected readonly context: LogContext) {}

  trace(message: string, context?: LogContext): void {
    this.write(LogLevel.TRACE, message, { ...this.context, ...context });
  }

  debug(message: string, context?: LogContext): void {
    this.write(LogLevel.DEBUG, message, { ...this.context, ...context });
  }

  info(message: string, context?: LogContext): void {
    this.write(LogLevel.INFO, message, { ...this.context, ...context });
  }

  warn(message: string, context?: LogContext): void {
    this.write(LogLevel.WARN, message, { ...this.context, ...context });
  }

  error(message: string, context?: LogContext): void {
    this.write(LogLevel.ERROR, message, { ...this.context, ...context });
  }

  abstract child(context: LogContext): Logger;

  protected abstract write(level: LogLevel, message: string, context: LogContext): void;
}

/**
 * Options for ConsoleLogger.
 */
export interface ConsoleLoggerOptions {
  /** Lowest level written; INFO by default */
  level?: LogLevel;
  context?: LogContext;
  /** Context keys whose values are replaced, matched case-insensitively */
  redactKeys?: string[];
}

const DEFAULT_REDACT_KEYS = ['password', 'secret', 'token', 'params'];

/**
 * Writes one JSON object per line: errors to stderr, warnings through
 * `console.warn`, everything else to stdout.
 */
export class ConsoleLogger extends BaseLogger {
  private readonly level: LogLevel;
  private readonly redactKeys: ReadonlySet<string>;

  constructor(options: ConsoleLoggerOptions = {}) {
    super(options.context ?? {});
    this.level = options.level ?? LogLevel.INFO;
    this.redactKeys = new Set((options.redactKeys ?? DEFAULT_REDACT_KEYS).map(k => k.toLowerCase()));
  }

  child(context: LogContext): Logger {
    return new ConsoleLogger({
      level: this.level,
      context: { ...this.context, ...context },
      redactKeys: [...this.redactKeys],
    });
  }

  protected write(level: LogLevel, message: string, context: LogContext): void {
    if (level < this.level) return;

    const line = JSON.stringify({
      timestamp: new Date().toISOString(),
      level: LogLevel[level],
      message,
      ...(Object.keys(context).length > 0 ? { context: this.redact(context) } : {}),
    });

    if (level === LogLevel.ERROR) {
      console.error(line);
    } else if (level === LogLevel.WARN) {
      console.warn(line);
    } else {
      console.log(line);
    }
  }

  private redact(context: LogContext): LogContext {
    const out: LogContext = {};
    for (const [key, value] of Object.entries(context)) {
      if (this.redactKeys.has(key.toLowerCase())) {
        out[key] = '[REDACTED]';
      } else {
        out[key] = isPlainRecord(value) ? this.redact(value) : value;
      }
    }
    return out;
  }
}

function isPlainRecord(value: unknown): value is LogContext {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !Buffer.isBuffer(value);
}

/**
 * Discards everything.
 */
export class NoopLogger implements Logger {
  trace(): void {}
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
  child(_context: LogContext): Logger {
    return this;
  }
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  context: LogContext;
}

/**
 * Keeps entries in memory. Children append to their parent's list.
 */
export class InMemoryLogger extends BaseLogger {
  private readonly entries: LogEntry[];

  constructor(context: LogContext = {}, entries: LogEntry[] = []) {
    super(context);
    this.entries = entries;
  }

  child(context: LogContext): Logger {
    return new InMemoryLogger({ ...this.context, ...context }, this.entries);
  }

  protected write(level: LogLevel, message: string, context: LogContext): void {
    this.entries.push({ level, message, context });
  }

  getEntries(): LogEntry[] {
    return [...this.entries];
  }

  getEntriesAtLevel(level: LogLevel): LogEntry[] {
    return this.entries.filter(e => e.level === level);
  }

  clear(): void {
    this.entries.length = 0;
  }
}

// ============================================================================
// Metrics
// ============================================================================

export const MetricNames = {
  CONVERSIONS_TOTAL: 'pgquery_conversions_total',
  CONVERSION_ERRORS_TOTAL: 'pgquery_conversion_errors_total',
  CACHE_HITS_TOTAL: 'pgquery_cache_hits_total',
  CACHE_MISSES_TOTAL: 'pgquery_cache_misses_total',
  CACHE_BYPASS_TOTAL: 'pgquery_cache_bypass_total',
  QUERIES_TOTAL: 'pgquery_queries_total',
  QUERY_DURATION_SECONDS: 'pgquery_query_duration_seconds',
  ERRORS_TOTAL: 'pgquery_errors_total',
} as const;

export type MetricTags = Record<string, string>;

/**
 * Metrics collector interface.
 */
export interface MetricsCollector {
  increment(name: string, value?: number, tags?: MetricTags): void;
  timing(name: string, durationMs: number, tags?: MetricTags): void;
}

export class NoopMetricsCollector implements MetricsCollector {
  increment(): void {}
  timing(): void {}
}

/**
 * Sums counters and keeps timings per name and tag set.
 */
export class InMemoryMetricsCollector implements MetricsCollector {
  private readonly counters = new Map<string, number>();
  private readonly timings = new Map<string, number[]>();

  increment(name: string, value: number = 1, tags?: MetricTags): void {
    const key = seriesKey(name, tags);
    this.counters.set(key, (this.counters.get(key) ?? 0) + value);
  }

  timing(name: string, durationMs: number, tags?: MetricTags): void {
    const key = seriesKey(name, tags);
    const recorded = this.timings.get(key) ?? [];
    recorded.push(durationMs);
    this.timings.set(key, recorded);
  }

  getCounter(name: string, tags?: MetricTags): number {
    return this.counters.get(seriesKey(name, tags)) ?? 0;
  }

  getTimings(name: string, tags?: MetricTags): number[] {
    return [...(this.timings.get(seriesKey(name, tags)) ?? [])];
  }

  clear(): void {
    this.counters.clear();
    this.timings.clear();
  }
}

/**
 * `name{k1=v1,k2=v2}` with tags sorted by key.
 */
function seriesKey(name: string, tags?: MetricTags): string {
  if (!tags) return name;
  const pairs = Object.keys(tags)
    .sort()
    .map(key => `${key}=${tags[key]}`);
  return pairs.length > 0 ? `${name}{${pairs.join(',')}}` : name;
}

// ============================================================================
// Tracing
// ============================================================================

export type SpanStatus = 'OK' | 'ERROR' | 'UNSET';
export type SpanAttributes = Record<string, string | number | boolean>;

/**
 * Span handed to traced functions.
 */
export interface SpanContext {
  setAttribute(key: string, value: string | number | boolean): void;
  recordException(error: Error): void;
}

/**
 * Tracer interface.
 */
export interface Tracer {
  /** Runs `fn` inside a span, ending it when `fn` settles */
  withSpan<T>(name: string, fn: (span: SpanContext) => T | Promise<T>, attributes?: SpanAttributes): Promise<T>;
}

const NOOP_SPAN: SpanContext = {
  setAttribute: () => {},
  recordException: () => {},
};

export class NoopTracer implements Tracer {
  async withSpan<T>(_name: string, fn: (span: SpanContext) => T | Promise<T>): Promise<T> {
    return fn(NOOP_SPAN);
  }
}

/**
 * A finished or running span as recorded by InMemoryTracer.
 */
export interface RecordedSpan {
  readonly name: string;
  readonly attributes: SpanAttributes;
  readonly status: SpanStatus;
  readonly error?: Error;
  readonly ended: boolean;
}

class RecordingSpan implements SpanContext, RecordedSpan {
  readonly attributes: SpanAttributes;
  status: SpanStatus = 'UNSET';
  error?: Error;
  ended = false;

  constructor(readonly name: string, attributes: SpanAttributes = {}) {
    this.attributes = { ...attributes };
  }

  setAttribute(key: string, value: string | number | boolean): void {
    this.attributes[key] = value;
  }

  recordException(error: Error): void {
    this.error = error;
    this.status = 'ERROR';
  }
}

/**
 * Records spans in memory.
 */
export class InMemoryTracer implements Tracer {
  private readonly spans: RecordingSpan[] = [];

  async withSpan<T>(
    name: string,
    fn: (span: SpanContext) => T | Promise<T>,
    attributes?: SpanAttributes
  ): Promise<T> {
    const span = new RecordingSpan(name, attributes);
    this.spans.push(span);
    try {
      const result = await fn(span);
      if (span.status === 'UNSET') span.status = 'OK';
      return result;
    } catch (error) {
      if (span.status === 'UNSET') {
        span.recordException(error instanceof Error ? error : new Error(String(error)));
      }
      throw error;
    } finally {
      span.ended = true;
    }
  }

  getSpans(): RecordedSpan[] {
    return [...this.spans];
  }

  getSpansByName(name: string): RecordedSpan[] {
    return this.spans.filter(s => s.name === name);
  }

  clear(): void {
    this.spans.length = 0;
  }
}

// ============================================================================
// Container
// ============================================================================

export interface Observability {
  logger: Logger;
  metrics: MetricsCollector;
  tracer: Tracer;
}

export function createNoopObservability(): Observability {
  return {
    logger: new NoopLogger(),
    metrics: new NoopMetricsCollector(),
    tracer: new NoopTracer(),
  };
}

/**
 * In-memory container whose parts can be inspected after the fact.
 */
export function createInMemoryObservability(): Observability & {
  logger: InMemoryLogger;
  metrics: InMemoryMetricsCollector;
  tracer: InMemoryTracer;
} {
  return {
    logger: new InMemoryLogger(),
    metrics: new InMemoryMetricsCollector(),
    tracer: new InMemoryTracer(),
  };
}
