/**
 * Error types for query conversion.
 *
 * Conversion errors are raised synchronously, before anything reaches the
 * backend, and are never retryable: they report a mistake in the query or in
 * the parameters supplied with it.
 */

/**
 * Error codes.
 */
export enum QueryErrorCode {
  // Configuration errors
  ConfigurationError = 'CONFIGURATION_ERROR',
  UnsupportedEncoding = 'UNSUPPORTED_ENCODING',

  // Placeholder errors
  MalformedPlaceholder = 'MALFORMED_PLACEHOLDER',
  MixedPlaceholders = 'MIXED_PLACEHOLDERS',
  ConflictingFormat = 'CONFLICTING_FORMAT',

  // Parameter errors
  ParamsShape = 'PARAMS_SHAPE',
  ParamCountMismatch = 'PARAM_COUNT_MISMATCH',
  MissingParams = 'MISSING_PARAMS',
  NotConverted = 'NOT_CONVERTED',
  ConversionError = 'CONVERSION_ERROR',

  // Execution errors
  ExecutionError = 'EXECUTION_ERROR',
}

/**
 * Base error class.
 */
export class QueryError extends Error {
  /** Error code */
  readonly code: QueryErrorCode;
  /** SQLSTATE code (if from PostgreSQL) */
  readonly sqlState?: string;
  /** Whether this error is retryable */
  readonly retryable: boolean;
  /** Additional error details */
  readonly details?: Record<string, unknown>;

  constructor(options: {
    code: QueryErrorCode;
    message: string;
    sqlState?: string;
    retryable?: boolean;
    details?: Record<string, unknown>;
    cause?: Error;
  }) {
    super(options.message, options.cause ? { cause: options.cause } : undefined);
    this.name = 'QueryError';
    this.code = options.code;
    this.sqlState = options.sqlState;
    this.retryable = options.retryable ?? false;
    this.details = options.details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, QueryError);
    }
  }

  /**
   * Creates a JSON representation of the error.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      sqlState: this.sqlState,
      message: this.message,
      retryable: this.retryable,
      details: this.details,
    };
  }
}

// ============================================================================
// Configuration Errors
// ============================================================================

/**
 * Configuration error.
 */
export class ConfigurationError extends QueryError {
  constructor(message: string) {
    super({
      code: QueryErrorCode.ConfigurationError,
      message: `Configuration error: ${message}`,
    });
    this.name = 'ConfigurationError';
  }
}

/**
 * The connection encoding has no Node.js counterpart.
 */
export class UnsupportedEncodingError extends QueryError {
  constructor(encoding: string) {
    super({
      code: QueryErrorCode.UnsupportedEncoding,
      message: `unsupported connection encoding: '${encoding}'`,
      details: { encoding },
    });
    this.name = 'UnsupportedEncodingError';
  }
}

// ============================================================================
// Placeholder Errors
// ============================================================================

/**
 * Unterminated `%(`, a bare `% `, or an unsupported placeholder character.
 */
export class MalformedPlaceholderError extends QueryError {
  constructor(message: string, fragment: string) {
    super({
      code: QueryErrorCode.MalformedPlaceholder,
      message,
      details: { fragment },
    });
    this.name = 'MalformedPlaceholderError';
  }
}

/**
 * Positional and named placeholders in the same query.
 */
export class MixedPlaceholdersError extends QueryError {
  constructor() {
    super({
      code: QueryErrorCode.MixedPlaceholders,
      message: 'positional and named placeholders cannot be mixed',
    });
    this.name = 'MixedPlaceholdersError';
  }
}

/**
 * A named placeholder used with two different formats.
 */
export class ConflictingFormatError extends QueryError {
  constructor(name: string) {
    super({
      code: QueryErrorCode.ConflictingFormat,
      message: `placeholder '${name}' cannot have different formats`,
      details: { name },
    });
    this.name = 'ConflictingFormatError';
  }
}

// ============================================================================
// Parameter Errors
// ============================================================================

/**
 * Parameters of the wrong shape for the query.
 */
export class ParamsShapeError extends QueryError {
  constructor(message: string) {
    super({
      code: QueryErrorCode.ParamsShape,
      message,
    });
    this.name = 'ParamsShapeError';
  }
}

/**
 * Sequence length differs from the number of placeholders.
 */
export class ParamCountMismatchError extends QueryError {
  constructor(expected: number, actual: number) {
    super({
      code: QueryErrorCode.ParamCountMismatch,
      message: `the query has ${expected} placeholders but ${actual} parameters were passed`,
      details: { expected, actual },
    });
    this.name = 'ParamCountMismatchError';
  }
}

/**
 * Named placeholders absent from the parameter mapping.
 */
export class MissingParamsError extends QueryError {
  /** Missing names, sorted */
  readonly missing: readonly string[];

  constructor(missing: readonly string[]) {
    const names = [...missing].sort();
    super({
      code: QueryErrorCode.MissingParams,
      message: `missing parameter${names.length === 1 ? '' : 's'}: ${names.join(', ')}`,
      details: { missing: names },
    });
    this.name = 'MissingParamsError';
    this.missing = names;
  }
}

/**
 * Parameters bound to a query that convert() did not parse.
 */
export class NotConvertedError extends QueryError {
  constructor() {
    super({
      code: QueryErrorCode.NotConverted,
      message: 'the query was converted without parameters; call convert() with parameters first',
    });
    this.name = 'NotConvertedError';
  }
}

/**
 * A value the transformer cannot represent.
 */
export class ConversionError extends QueryError {
  constructor(message: string, cause?: Error) {
    super({
      code: QueryErrorCode.ConversionError,
      message: `Conversion error: ${message}`,
      cause,
    });
    this.name = 'ConversionError';
  }
}

// ============================================================================
// Execution Errors
// ============================================================================

/**
 * Query execution error.
 */
export class ExecutionError extends QueryError {
  constructor(message: string, sqlState?: string, cause?: Error) {
    super({
      code: QueryErrorCode.ExecutionError,
      message: `Query execution failed: ${message}`,
      sqlState,
      cause,
    });
    this.name = 'ExecutionError';
  }
}

/**
 * Wraps an error thrown by the driver.
 */
export function wrapDriverError(error: unknown): QueryError {
  if (error instanceof QueryError) {
    return error;
  }
  if (error instanceof Error) {
    // pg reports the SQLSTATE as `code`
    const sqlState = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
    return new ExecutionError(error.message, sqlState, error);
  }
  return new ExecutionError(String(error));
}

// ============================================================================
// Guards
// ============================================================================

/**
 * Checks whether an error is a QueryError.
 */
export function isQueryError(error: unknown): error is QueryError {
  return error instanceof QueryError;
}

/**
 * Checks whether an error reports a mistake in the query or its parameters.
 */
export function isProgrammingError(error: unknown): error is QueryError {
  if (!(error instanceof QueryError)) {
    return false;
  }
  switch (error.code) {
    case QueryErrorCode.MalformedPlaceholder:
    case QueryErrorCode.MixedPlaceholders:
    case QueryErrorCode.ConflictingFormat:
    case QueryErrorCode.ParamsShape:
    case QueryErrorCode.ParamCountMismatch:
    case QueryErrorCode.MissingParams:
    case QueryErrorCode.NotConverted:
      return true;
    default:
      return false;
  }
}
