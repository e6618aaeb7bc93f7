/**
 * Connection encodings.
 *
 * Queries are scanned as bytes; the encoding is needed to turn string queries
 * into bytes and placeholder names back into strings.
 * @module encoding
 */

import { UnsupportedEncodingError } from '../errors/index.js';

/**
 * PostgreSQL and Node.js encoding names with a Node.js codec.
 */
const ENCODINGS: ReadonlyMap<string, BufferEncoding> = new Map<string, BufferEncoding>([
  // PostgreSQL names
  ['utf8', 'utf8'],
  ['unicode', 'utf8'],
  ['sql_ascii', 'ascii'],
  ['latin1', 'latin1'],
  // Node.js names
  ['utf-8', 'utf8'],
  ['ascii', 'ascii'],
  ['binary', 'latin1'],
]);

/**
 * Resolves a connection encoding name to a Node.js codec.
 *
 * @throws {UnsupportedEncodingError} If the encoding has no Node.js codec
 */
export function normalizeEncoding(name: string): BufferEncoding {
  const encoding = ENCODINGS.get(name.trim().toLowerCase());
  if (encoding === undefined) {
    throw new UnsupportedEncodingError(name);
  }
  return encoding;
}

/**
 * Encodes a string with a connection encoding.
 */
export function encode(text: string, encoding: string): Buffer {
  return Buffer.from(text, normalizeEncoding(encoding));
}

/**
 * Decodes bytes with a connection encoding.
 */
export function decode(bytes: Buffer, encoding: string): string {
  return bytes.toString(normalizeEncoding(encoding));
}
