/**
 * Tests for observability components.
 */

import {
  LogLevel,
  ConsoleLogger,
  NoopLogger,
  InMemoryLogger,
  InMemoryMetricsCollector,
  NoopTracer,
  InMemoryTracer,
} from '../index.js';

describe('Logging', () => {
  describe('InMemoryLogger', () => {
    it('should store log messages', () => {
      const logger = new InMemoryLogger();
      logger.info('test message', { key: 'value' });

      const entries = logger.getEntries();
      expect(entries).toHaveLength(1);
      expect(entries[0].level).toBe(LogLevel.INFO);
      expect(entries[0].context).toEqual({ key: 'value' });
    });

    it('should share entries with children', () => {
      const logger = new InMemoryLogger({ module: 'parent' });
      logger.child({ component: 'child' }).warn('child message');

      const entries = logger.getEntriesAtLevel(LogLevel.WARN);
      expect(entries).toHaveLength(1);
      expect(entries[0].context).toEqual({ module: 'parent', component: 'child' });
    });

    it('should clear entries', () => {
      const logger = new InMemoryLogger();
      logger.error('test');
      logger.clear();

      expect(logger.getEntries()).toHaveLength(0);
    });
  });

  describe('ConsoleLogger', () => {
    afterEach(() => {
      vi.restoreAllMocks();
    });

    it('should write JSON lines with sensitive keys redacted', () => {
      const spy = vi.spyOn(console, 'log').mockImplementation(() => {});
      const logger = new ConsoleLogger({ context: { component: 'test' } });

      logger.info('hello', { password: 'test-secret', nested: { token: 'test-token', ok: 1 } });

      expect(spy).toHaveBeenCalledTimes(1);
      const output: unknown = JSON.parse(String(spy.mock.calls[0][0]));
      expect(output).toMatchObject({
        level: 'INFO',
        message: 'hello',
        context: { component: 'test', password: '[REDACTED]', nested: { token: '[REDACTED]', ok: 1 } },
      });
    });

    it('should skip messages below its level', () => {
      const spy = vi.spyOn(console, 'log').mockImplementation(() => {});
      const logger = new ConsoleLogger({ level: LogLevel.WARN });

      logger.info('ignored');
      logger.debug('ignored');

      expect(spy).not.toHaveBeenCalled();
    });

    it('should send errors to stderr', () => {
      const spy = vi.spyOn(console, 'error').mockImplementation(() => {});
      new ConsoleLogger().error('failed');

      expect(spy).toHaveBeenCalledTimes(1);
    });
  });

  it('should return itself as child of a noop logger', () => {
    const logger = new NoopLogger();
    expect(logger.child({ a: 1 })).toBe(logger);
  });
});

describe('Metrics', () => {
  it('should accumulate counters per tag set', () => {
    const metrics = new InMemoryMetricsCollector();
    metrics.increment('hits', 1, { variant: 'server' });
    metrics.increment('hits', 2, { variant: 'server' });
    metrics.increment('hits', 1, { variant: 'client' });

    expect(metrics.getCounter('hits', { variant: 'server' })).toBe(3);
    expect(metrics.getCounter('hits', { variant: 'client' })).toBe(1);
    expect(metrics.getCounter('hits')).toBe(0);
  });

  it('should ignore tag order', () => {
    const metrics = new InMemoryMetricsCollector();
    metrics.increment('errors', 1, { variant: 'server', code: 'X' });

    expect(metrics.getCounter('errors', { code: 'X', variant: 'server' })).toBe(1);
  });

  it('should keep timings per series', () => {
    const metrics = new InMemoryMetricsCollector();
    metrics.timing('duration', 12, { variant: 'server' });
    metrics.timing('duration', 7, { variant: 'server' });

    expect(metrics.getTimings('duration', { variant: 'server' })).toEqual([12, 7]);
    expect(metrics.getTimings('duration')).toEqual([]);
  });

  it('should clear counters and timings', () => {
    const metrics = new InMemoryMetricsCollector();
    metrics.increment('hits');
    metrics.timing('duration', 1);
    metrics.clear();

    expect(metrics.getCounter('hits')).toBe(0);
    expect(metrics.getTimings('duration')).toEqual([]);
  });
});

describe('Tracing', () => {
  it('should record spans with status', async () => {
    const tracer = new InMemoryTracer();

    await tracer.withSpan('ok', () => 1, { variant: 'server' });
    await expect(
      tracer.withSpan('fail', () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');

    const [ok, fail] = tracer.getSpans();
    expect(ok.status).toBe('OK');
    expect(ok.attributes).toEqual({ variant: 'server' });
    expect(ok.ended).toBe(true);
    expect(fail.status).toBe('ERROR');
    expect(fail.error?.message).toBe('boom');
    expect(fail.ended).toBe(true);
  });

  it('should keep an exception recorded by the traced function', async () => {
    const tracer = new InMemoryTracer();
    const recorded = new Error('recorded');

    await expect(
      tracer.withSpan('fail', span => {
        span.recordException(recorded);
        throw new Error('rethrown');
      })
    ).rejects.toThrow('rethrown');

    expect(tracer.getSpansByName('fail')[0].error).toBe(recorded);
  });

  it('should run functions inside a noop span', async () => {
    const tracer = new NoopTracer();
    await expect(tracer.withSpan('noop', () => 'done')).resolves.toBe('done');
  });
});
