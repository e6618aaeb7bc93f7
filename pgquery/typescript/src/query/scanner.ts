/**
 * Placeholder scanner.
 *
 * Splits raw query bytes into the fragments around `%s`, `%t`, `%b` and
 * `%(name)s|t|b` placeholders.
 * @module query/scanner
 */

import { ParamFormat, QueryItem, QueryPart, TRAILING_ITEM, formatFromChar } from '../types/index.js';
import { MalformedPlaceholderError, MixedPlaceholdersError } from '../errors/index.js';
import { decode } from '../encoding/index.js';

/**
 * A `%` followed by a name in parentheses and one character, or by any one
 * character. Newlines never complete a placeholder.
 *
 * Matched against the latin1 view of the query, one character per byte.
 */
const PLACEHOLDER_PATTERN = /%(?:\(([^)]+)\)[^\n]|[^\n])/g;

/**
 * Splits a query into parts, one per placeholder plus the trailing fragment.
 *
 * `%%` is merged into the surrounding text: as a single `%` when
 * `collapseDoublePercent` is set, unchanged otherwise.
 *
 * @param query - Raw query bytes
 * @param encoding - Encoding of placeholder names and error fragments
 * @param collapseDoublePercent - Whether `%%` becomes `%`
 * @returns The parts; the last one holds the bytes after the last placeholder
 * @throws {MalformedPlaceholderError} On `%(` without `)`, `% `, or an unsupported format
 * @throws {MixedPlaceholdersError} If positional and named placeholders are both used
 */
export function splitQuery(
  query: Buffer,
  encoding: string = 'ascii',
  collapseDoublePercent: boolean = true
): QueryPart[] {
  const text = query.toString('latin1');
  const re = new RegExp(PLACEHOLDER_PATTERN.source, 'g');
  const parts: QueryPart[] = [];
  let pending: Buffer[] = [];
  let cur = 0;
  let style: 'positional' | 'named' | undefined;

  let m: RegExpExecArray | null;
  while ((m = re.exec(text)) !== null) {
    const ph = m[0];
    const pre = query.subarray(cur, m.index);
    cur = m.index + ph.length;

    if (ph === '%%') {
      pending.push(pre, Buffer.from(collapseDoublePercent ? '%' : '%%', 'latin1'));
      continue;
    }

    if (ph === '%(') {
      const fragment = decodeLatin1(text.slice(m.index).split(/[ \t\n\r\v\f]/, 1)[0], encoding);
      throw new MalformedPlaceholderError(`incomplete placeholder: '${fragment}'`, fragment);
    }
    if (ph === '% ') {
      throw new MalformedPlaceholderError(
        "incomplete placeholder: '%'; if you want to use '%' as an operator" +
          " you can double it up, i.e. use '%%'",
        ph
      );
    }

    const format = formatFromChar(ph.charAt(ph.length - 1));
    if (format === undefined) {
      const fragment = decodeLatin1(ph, encoding);
      throw new MalformedPlaceholderError(
        `only '%s', '%b', '%t' are allowed as placeholders, got '${fragment}'`,
        fragment
      );
    }

    const name = m[1];
    const item: QueryItem = name !== undefined ? decodeLatin1(name, encoding) : parts.length;
    const itemStyle = typeof item === 'string' ? 'named' : 'positional';
    if (style === undefined) {
      style = itemStyle;
    } else if (style !== itemStyle) {
      throw new MixedPlaceholdersError();
    }

    pending.push(pre);
    parts.push(Object.freeze({ pre: Buffer.concat(pending), item, format }));
    pending = [];
  }

  pending.push(query.subarray(cur));
  parts.push(Object.freeze({ pre: Buffer.concat(pending), item: TRAILING_ITEM, format: ParamFormat.Auto }));
  return parts;
}

/**
 * Decodes a latin1 view of raw bytes with the connection encoding.
 */
function decodeLatin1(view: string, encoding: string): string {
  return decode(Buffer.from(view, 'latin1'), encoding);
}

/**
 * Number of placeholders in a parsed query.
 */
export function countPlaceholders(parts: readonly QueryPart[]): number {
  return parts.length - 1;
}

/**
 * Whether the query uses named placeholders.
 */
export function isNamed(parts: readonly QueryPart[]): boolean {
  return parts.length > 1 && typeof parts[0].item === 'string';
}

/**
 * Whether the query uses positional placeholders.
 */
export function isPositional(parts: readonly QueryPart[]): boolean {
  return parts.length > 1 && typeof parts[0].item === 'number';
}
