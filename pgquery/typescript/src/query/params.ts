/**
 * Parameter validation and reordering.
 * @module query/params
 */

import { ParamsShape, QueryPart } from '../types/index.js';
import { MissingParamsError, ParamCountMismatchError, ParamsShapeError } from '../errors/index.js';
import { countPlaceholders, isNamed, isPositional } from './scanner.js';

/**
 * Classifies a parameter set as a sequence or a mapping.
 *
 * Arrays are sequences; Maps and plain objects are mappings. Strings and
 * byte arrays are values, never parameter sequences.
 *
 * @throws {ParamsShapeError} For any other value
 */
export function classifyParams(params: unknown): ParamsShape {
  if (Array.isArray(params)) {
    return { kind: 'sequence', values: params };
  }
  if (params instanceof Map) {
    const values = new Map<string, unknown>();
    for (const [key, value] of params) {
      values.set(String(key), value);
    }
    return { kind: 'mapping', values };
  }
  if (isPlainObject(params)) {
    return { kind: 'mapping', values: new Map(Object.entries(params)) };
  }
  throw new ParamsShapeError(
    `query parameters should be a sequence or a mapping, got ${describeType(params)}`
  );
}

/**
 * Number of values in a parameter set, for cache eligibility.
 *
 * Never throws: values of the wrong shape count as 0 and are rejected later,
 * once the query has been parsed.
 */
export function countParams(params: unknown): number {
  if (Array.isArray(params)) return params.length;
  if (params instanceof Map) return params.size;
  if (isPlainObject(params)) return Object.keys(params).length;
  return 0;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Runtime type name used in error messages.
 */
export function describeType(value: unknown): string {
  if (value === null) return 'null';
  if (typeof value !== 'object') return typeof value;
  const ctor: unknown = value.constructor;
  return typeof ctor === 'function' && ctor.name ? ctor.name : 'object';
}

/**
 * Checks a parameter set against a parsed query and returns the values in
 * marker order.
 *
 * @param parts - Scanned query parts
 * @param params - Parameters supplied by the caller
 * @param order - Names to look up, for named queries
 * @throws {ParamsShapeError} If the parameters are neither a sequence nor a
 *   mapping, or do not match the placeholder style
 * @throws {ParamCountMismatchError} If a sequence has the wrong length
 * @throws {MissingParamsError} If names in `order` are absent from a mapping
 */
export function validateAndReorderParams(
  parts: readonly QueryPart[],
  params: unknown,
  order: readonly string[] | null
): readonly unknown[] {
  const shape = classifyParams(params);

  if (shape.kind === 'sequence') {
    const expected = countPlaceholders(parts);
    if (shape.values.length !== expected) {
      throw new ParamCountMismatchError(expected, shape.values.length);
    }
    if (shape.values.length > 0 && isNamed(parts)) {
      throw new ParamsShapeError('named placeholders require a mapping of parameters');
    }
    return shape.values;
  }

  const mapping = shape.values;
  if (isPositional(parts)) {
    throw new ParamsShapeError('positional placeholders (%s) require a sequence of parameters');
  }
  if (!order || order.length === 0) {
    return [];
  }

  const values: unknown[] = [];
  for (const name of order) {
    if (!mapping.has(name)) {
      throw new MissingParamsError(findMissing(order, mapping));
    }
    values.push(mapping.get(name));
  }
  return values;
}

function findMissing(order: readonly string[], mapping: ReadonlyMap<string, unknown>): string[] {
  return Array.from(new Set(order.filter(name => !mapping.has(name))));
}
