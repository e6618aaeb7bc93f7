/**
 * Tests for error types.
 */

import {
  QueryError,
  QueryErrorCode,
  ConfigurationError,
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
} from '../index.js';

describe('QueryError', () => {
  it('should create a basic error', () => {
    const error = new QueryError({
      code: QueryErrorCode.ParamsShape,
      message: 'Test error',
    });

    expect(error).toBeInstanceOf(Error);
    expect(error.code).toBe(QueryErrorCode.ParamsShape);
    expect(error.message).toBe('Test error');
    expect(error.retryable).toBe(false);
  });

  it('should serialize to JSON', () => {
    const error = new ExecutionError('deadlock detected', '40P01');

    expect(error.toJSON()).toEqual({
      name: 'ExecutionError',
      code: QueryErrorCode.ExecutionError,
      sqlState: '40P01',
      message: 'Query execution failed: deadlock detected',
      retryable: false,
      details: undefined,
    });
  });
});

describe('conversion errors', () => {
  it('should carry codes and names', () => {
    const cases: Array<[QueryError, QueryErrorCode, string]> = [
      [new ConfigurationError('bad'), QueryErrorCode.ConfigurationError, 'ConfigurationError'],
      [new MalformedPlaceholderError('bad', '%('), QueryErrorCode.MalformedPlaceholder, 'MalformedPlaceholderError'],
      [new MixedPlaceholdersError(), QueryErrorCode.MixedPlaceholders, 'MixedPlaceholdersError'],
      [new ConflictingFormatError('a'), QueryErrorCode.ConflictingFormat, 'ConflictingFormatError'],
      [new ParamsShapeError('bad'), QueryErrorCode.ParamsShape, 'ParamsShapeError'],
      [new ParamCountMismatchError(1, 2), QueryErrorCode.ParamCountMismatch, 'ParamCountMismatchError'],
      [new MissingParamsError(['a']), QueryErrorCode.MissingParams, 'MissingParamsError'],
      [new NotConvertedError(), QueryErrorCode.NotConverted, 'NotConvertedError'],
      [new ConversionError('bad'), QueryErrorCode.ConversionError, 'ConversionError'],
    ];

    for (const [error, code, name] of cases) {
      expect(error.code).toBe(code);
      expect(error.name).toBe(name);
      expect(error.retryable).toBe(false);
    }
  });

  it('should sort and pluralize missing names', () => {
    expect(new MissingParamsError(['b']).message).toBe('missing parameter: b');
    expect(new MissingParamsError(['b', 'a']).message).toBe('missing parameters: a, b');
  });

  it('should prefix configuration and conversion messages', () => {
    expect(new ConfigurationError('bad value').message).toBe('Configuration error: bad value');
    expect(new ConversionError('bad value').message).toBe('Conversion error: bad value');
  });
});

describe('wrapDriverError', () => {
  it('should keep the SQLSTATE of driver errors', () => {
    const driverError = Object.assign(new Error('relation "t" does not exist'), { code: '42P01' });
    const wrapped = wrapDriverError(driverError);

    expect(wrapped).toBeInstanceOf(ExecutionError);
    expect(wrapped.sqlState).toBe('42P01');
    expect(wrapped.message).toBe('Query execution failed: relation "t" does not exist');
    expect(wrapped.cause).toBe(driverError);
  });

  it('should wrap errors without a code', () => {
    const wrapped = wrapDriverError(new Error('connection reset'));

    expect(wrapped.sqlState).toBeUndefined();
    expect(wrapped.message).toBe('Query execution failed: connection reset');
  });

  it('should wrap non-errors', () => {
    expect(wrapDriverError('boom').message).toBe('Query execution failed: boom');
  });

  it('should pass query errors through', () => {
    const error = new MixedPlaceholdersError();
    expect(wrapDriverError(error)).toBe(error);
  });
});

describe('guards', () => {
  it('should recognize query errors', () => {
    expect(isQueryError(new NotConvertedError())).toBe(true);
    expect(isQueryError(new Error('x'))).toBe(false);
  });

  it('should recognize programming errors', () => {
    expect(isProgrammingError(new MixedPlaceholdersError())).toBe(true);
    expect(isProgrammingError(new MissingParamsError(['a']))).toBe(true);
    expect(isProgrammingError(new ConfigurationError('x'))).toBe(false);
    expect(isProgrammingError(new ExecutionError('x'))).toBe(false);
    expect(isProgrammingError(new Error('x'))).toBe(false);
  });
});
