/**
 * Core types for placeholder conversion.
 *
 * Query fragments, parameter formats, parameter shapes and the value
 * transformer contract shared by the scanner, assemblers and bound queries.
 */

// ============================================================================
// Formats
// ============================================================================

/**
 * Format requested by a placeholder: `%s` (auto), `%t` (text), `%b` (binary).
 */
export enum ParamFormat {
  /** Let the transformer pick the format (`%s`) */
  Auto = 's',
  /** Text format (`%t`) */
  Text = 't',
  /** Binary format (`%b`) */
  Binary = 'b',
}

/**
 * Format of a parameter as transmitted to the backend.
 */
export enum WireFormat {
  Text = 0,
  Binary = 1,
}

/**
 * Maps a placeholder format character to its format.
 *
 * @returns The format, or undefined if the character is not a format
 */
export function formatFromChar(char: string): ParamFormat | undefined {
  switch (char) {
    case 's':
      return ParamFormat.Auto;
    case 't':
      return ParamFormat.Text;
    case 'b':
      return ParamFormat.Binary;
    default:
      return undefined;
  }
}

// ============================================================================
// Query Parts
// ============================================================================

/**
 * Placeholder reference: the zero-based ordinal of a positional placeholder,
 * or the name of a named one.
 */
export type QueryItem = number | string;

/**
 * Item carried by the trailing part, which has no placeholder after it.
 */
export const TRAILING_ITEM = -1;

/**
 * A query fragment followed by a placeholder.
 */
export interface QueryPart {
  /** Raw bytes preceding the placeholder (or the trailing bytes) */
  readonly pre: Buffer;
  /** Placeholder ordinal or name; TRAILING_ITEM for the last part */
  readonly item: QueryItem;
  /** Requested format */
  readonly format: ParamFormat;
}

/**
 * Output of the server-side assembler.
 */
export interface ParsedServerQuery {
  /** Query rewritten with `$1`, `$2`, ... markers */
  readonly query: Buffer;
  /** One format per distinct marker, in marker order */
  readonly formats: readonly ParamFormat[];
  /** First-occurrence order of names; null for positional queries */
  readonly order: readonly string[] | null;
  /** Scanned parts, used to validate parameters */
  readonly parts: readonly QueryPart[];
}

/**
 * Output of the client-side assembler.
 */
export interface ParsedClientQuery {
  /** Query rewritten with `%s` substitution markers, `%%` preserved */
  readonly template: Buffer;
  /** Every occurrence of every name; null for positional queries */
  readonly order: readonly string[] | null;
  /** Scanned parts, used to validate parameters */
  readonly parts: readonly QueryPart[];
}

// ============================================================================
// Parameters
// ============================================================================

/**
 * Parameters mapped by placeholder name.
 */
export type ParamsMapping = ReadonlyMap<string, unknown> | { readonly [name: string]: unknown };

/**
 * Parameters accepted by `convert()`.
 */
export type Params = readonly unknown[] | ParamsMapping;

/**
 * Result of classifying a parameter set.
 */
export type ParamsShape =
  | { readonly kind: 'sequence'; readonly values: readonly unknown[] }
  | { readonly kind: 'mapping'; readonly values: ReadonlyMap<string, unknown> };

// ============================================================================
// Value Transformer
// ============================================================================

/**
 * Converts parameter values to their backend representation.
 *
 * `types` and `formats` describe the last `dumpSequence()` call.
 */
export interface Transformer {
  /** Connection encoding name; the converter's default when absent */
  readonly encoding?: string;
  /** Type OIDs of the last dumped sequence */
  readonly types: readonly number[] | null;
  /** Wire formats of the last dumped sequence */
  readonly formats: readonly WireFormat[] | null;
  /** Dumps values to wire bytes in the requested formats */
  dumpSequence(values: readonly unknown[], formats: readonly ParamFormat[]): Array<Buffer | null>;
  /** Renders a non-null value as a SQL literal */
  asLiteral(value: unknown): Buffer;
}

// ============================================================================
// Queries
// ============================================================================

/**
 * An object able to render itself to query bytes.
 */
export interface Composable {
  asBytes(tx: Transformer): Buffer;
}

/**
 * Query accepted by `convert()`.
 */
export type Query = string | Buffer | Uint8Array | Composable;

/**
 * Checks whether a value is a composable query object.
 */
export function isComposable(value: unknown): value is Composable {
  return (
    typeof value === 'object' &&
    value !== null &&
    'asBytes' in value &&
    typeof value.asBytes === 'function'
  );
}

/**
 * PostgreSQL type OIDs used by the reference transformer.
 */
export const PG_TYPE_OID = {
  UNKNOWN: 0,
  BOOL: 16,
  BYTEA: 17,
  INT8: 20,
  FLOAT8: 701,
  TIMESTAMPTZ: 1184,
  JSONB: 3802,
} as const;
