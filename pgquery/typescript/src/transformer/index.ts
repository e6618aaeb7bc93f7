/**
 * Reference value transformer.
 *
 * Dumps JavaScript values to PostgreSQL text (and, for bytea, binary)
 * representation and renders them as SQL literals.
 * @module transformer
 */

import { PG_TYPE_OID, ParamFormat, Transformer, WireFormat } from '../types/index.js';
import { ConversionError } from '../errors/index.js';
import { encode } from '../encoding/index.js';
import { describeType } from '../query/params.js';

/**
 * Typed view of a parameter value.
 */
export type ParameterValue =
  | { type: 'null' }
  | { type: 'boolean'; value: boolean }
  | { type: 'integer'; value: number }
  | { type: 'float'; value: number }
  | { type: 'bigint'; value: bigint }
  | { type: 'string'; value: string }
  | { type: 'binary'; value: Buffer }
  | { type: 'timestamptz'; value: Date }
  | { type: 'json'; value: unknown };

/**
 * Classifies a value for dumping.
 *
 * @throws {ConversionError} For functions, symbols and invalid dates
 */
export function toParameterValue(v: unknown): ParameterValue {
  if (v === null || v === undefined) {
    return { type: 'null' };
  }
  if (typeof v === 'boolean') {
    return { type: 'boolean', value: v };
  }
  if (typeof v === 'number') {
    return Number.isSafeInteger(v) ? { type: 'integer', value: v } : { type: 'float', value: v };
  }
  if (typeof v === 'bigint') {
    return { type: 'bigint', value: v };
  }
  if (typeof v === 'string') {
    return { type: 'string', value: v };
  }
  if (v instanceof Uint8Array) {
    return { type: 'binary', value: Buffer.from(v.buffer, v.byteOffset, v.byteLength) };
  }
  if (v instanceof Date) {
    if (Number.isNaN(v.getTime())) {
      throw new ConversionError('cannot adapt an invalid Date');
    }
    return { type: 'timestamptz', value: v };
  }
  if (typeof v === 'object') {
    return { type: 'json', value: v };
  }
  throw new ConversionError(`cannot adapt type '${describeType(v)}'`);
}

function typeOid(value: ParameterValue): number {
  switch (value.type) {
    case 'null':
    case 'string':
      // Let the server infer the type from context
      return PG_TYPE_OID.UNKNOWN;
    case 'boolean':
      return PG_TYPE_OID.BOOL;
    case 'integer':
    case 'bigint':
      return PG_TYPE_OID.INT8;
    case 'float':
      return PG_TYPE_OID.FLOAT8;
    case 'binary':
      return PG_TYPE_OID.BYTEA;
    case 'timestamptz':
      return PG_TYPE_OID.TIMESTAMPTZ;
    case 'json':
      return PG_TYPE_OID.JSONB;
  }
}

function floatText(value: number): string {
  if (Number.isNaN(value)) return 'NaN';
  if (value === Infinity) return 'Infinity';
  if (value === -Infinity) return '-Infinity';
  return String(value);
}

/**
 * Text representation of a non-null value.
 */
function toText(value: Exclude<ParameterValue, { type: 'null' }>): string {
  switch (value.type) {
    case 'boolean':
      return value.value ? 't' : 'f';
    case 'integer':
    case 'bigint':
      return value.value.toString();
    case 'float':
      return floatText(value.value);
    case 'string':
      return value.value;
    case 'binary':
      return `\\x${value.value.toString('hex')}`;
    case 'timestamptz':
      return value.value.toISOString();
    case 'json':
      return toJson(value.value);
  }
}

function toJson(value: unknown): string {
  try {
    return JSON.stringify(value);
  } catch (error) {
    throw new ConversionError(
      `cannot serialize ${describeType(value)} to JSON`,
      error instanceof Error ? error : undefined
    );
  }
}

/**
 * Quotes a string as a SQL literal.
 *
 * Single quotes are doubled; if the string contains backslashes, they are
 * doubled too and the escape-string syntax (` E'...'`) is used.
 *
 * @throws {ConversionError} If the string contains NUL characters
 */
export function quoteString(text: string): string {
  if (text.includes('\u0000')) {
    throw new ConversionError('PostgreSQL text fields cannot contain NUL (0x00) characters');
  }
  const quoted = text.replace(/'/g, "''");
  if (quoted.includes('\\')) {
    return ` E'${quoted.replace(/\\/g, '\\\\')}'`;
  }
  return `'${quoted}'`;
}

/**
 * Value transformer dumping parameters in text format, except bytea values,
 * which go in binary unless `%t` asks for text.
 *
 * @example
 * ```typescript
 * const tx = new TextTransformer('utf8');
 * tx.dumpSequence([1, 'x'], [ParamFormat.Auto, ParamFormat.Auto]);
 * // [Buffer('1'), Buffer('x')], tx.types = [20, 0], tx.formats = [0, 0]
 * tx.asLiteral("it's").toString(); // "'it''s'"
 * ```
 */
export class TextTransformer implements Transformer {
  readonly encoding: string;
  types: readonly number[] | null = null;
  formats: readonly WireFormat[] | null = null;

  constructor(encoding: string = 'utf8') {
    this.encoding = encoding;
  }

  dumpSequence(values: readonly unknown[], formats: readonly ParamFormat[]): Array<Buffer | null> {
    if (values.length !== formats.length) {
      throw new ConversionError(`got ${values.length} values but ${formats.length} formats`);
    }

    const out: Array<Buffer | null> = [];
    const types: number[] = [];
    const wireFormats: WireFormat[] = [];

    values.forEach((raw, index) => {
      const value = toParameterValue(raw);
      const format = formats[index];
      types.push(typeOid(value));

      if (value.type === 'null') {
        out.push(null);
        wireFormats.push(WireFormat.Text);
      } else if (value.type === 'binary' && format !== ParamFormat.Text) {
        out.push(value.value);
        wireFormats.push(WireFormat.Binary);
      } else if (format === ParamFormat.Binary) {
        throw new ConversionError(
          `no binary dumper for ${value.type} values (parameter ${index + 1}); use %s or %t`
        );
      } else {
        out.push(encode(toText(value), this.encoding));
        wireFormats.push(WireFormat.Text);
      }
    });

    this.types = types;
    this.formats = wireFormats;
    return out;
  }

  asLiteral(raw: unknown): Buffer {
    return encode(this.literalText(toParameterValue(raw)), this.encoding);
  }

  private literalText(value: ParameterValue): string {
    switch (value.type) {
      case 'null':
        return 'NULL';
      case 'boolean':
        return value.value ? 'true' : 'false';
      case 'integer':
      case 'bigint': {
        // A leading space keeps `- %s` from turning into a `--` comment
        const text = value.value.toString();
        return text.startsWith('-') ? ` ${text}` : text;
      }
      case 'float': {
        if (!Number.isFinite(value.value)) {
          return `'${floatText(value.value)}'::float8`;
        }
        const text = String(value.value);
        return text.startsWith('-') ? ` ${text}` : text;
      }
      case 'string':
        return quoteString(value.value);
      case 'binary':
        return `'\\x${value.value.toString('hex')}'::bytea`;
      case 'timestamptz':
        return `'${value.value.toISOString()}'::timestamptz`;
      case 'json':
        return `${quoteString(toJson(value.value))}::jsonb`;
    }
  }
}
