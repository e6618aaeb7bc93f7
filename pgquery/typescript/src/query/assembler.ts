/**
 * Query assemblers.
 *
 * Rewrite scanned placeholders either into PostgreSQL `$n` markers
 * (server-side binding) or into `%s` markers of a template that literals are
 * later substituted into (client-side binding).
 * @module query/assembler
 */

import { ParamFormat, ParsedClientQuery, ParsedServerQuery } from '../types/index.js';
import { ConflictingFormatError } from '../errors/index.js';
import { isNamed, splitQuery } from './scanner.js';

const CLIENT_MARKER = Buffer.from('%s', 'latin1');

function marker(index: number): Buffer {
  return Buffer.from(`$${index}`, 'latin1');
}

/**
 * Converts a query into PostgreSQL form for server-side binding.
 *
 * - `%s`, `%t`, `%b` become `$1`, `$2`, ... in order of occurrence.
 * - `%(name)s` placeholders get one marker per distinct name; repeated names
 *   reuse the marker of their first occurrence.
 * - `%%` becomes `%`.
 *
 * @throws {ConflictingFormatError} If a name is used with two formats
 */
export function assembleServerQuery(query: Buffer, encoding: string): ParsedServerQuery {
  const parts = splitQuery(query, encoding);
  const chunks: Buffer[] = [];
  const formats: ParamFormat[] = [];
  let order: string[] | null = null;

  if (isNamed(parts)) {
    const seen = new Map<string, { marker: Buffer; format: ParamFormat }>();
    order = [];
    for (const part of parts.slice(0, -1)) {
      const name = String(part.item);
      chunks.push(part.pre);
      const first = seen.get(name);
      if (first === undefined) {
        const ph = marker(seen.size + 1);
        seen.set(name, { marker: ph, format: part.format });
        order.push(name);
        formats.push(part.format);
        chunks.push(ph);
      } else {
        if (first.format !== part.format) {
          throw new ConflictingFormatError(name);
        }
        chunks.push(first.marker);
      }
    }
  } else {
    parts.slice(0, -1).forEach((part, index) => {
      chunks.push(part.pre, marker(index + 1));
      formats.push(part.format);
    });
  }

  chunks.push(parts[parts.length - 1].pre);

  return Object.freeze({
    query: Buffer.concat(chunks),
    formats: Object.freeze(formats),
    order: order && Object.freeze(order),
    parts: Object.freeze(parts),
  });
}

/**
 * Converts a query into a template for client-side binding.
 *
 * Every placeholder becomes `%s` and `%%` is kept, so that the template can be
 * expanded once against the rendered literals. For named queries the order
 * lists every occurrence, repeats included, one per `%s`.
 */
export function assembleClientQuery(query: Buffer, encoding: string): ParsedClientQuery {
  const parts = splitQuery(query, encoding, false);
  const chunks: Buffer[] = [];
  const named = isNamed(parts);
  const order: string[] = [];

  for (const part of parts.slice(0, -1)) {
    chunks.push(part.pre, CLIENT_MARKER);
    if (named) {
      order.push(String(part.item));
    }
  }

  chunks.push(parts[parts.length - 1].pre);

  return Object.freeze({
    template: Buffer.concat(chunks),
    order: named ? Object.freeze(order) : null,
    parts: Object.freeze(parts),
  });
}
