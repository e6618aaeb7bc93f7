/**
 * Placeholder conversion: scanning, assembly, parameter validation and
 * bound queries.
 * @module query
 */

export { splitQuery, countPlaceholders, isNamed, isPositional } from './scanner.js';
export { assembleServerQuery, assembleClientQuery } from './assembler.js';
export { classifyParams, countParams, describeType, validateAndReorderParams } from './params.js';
export {
  QueryConverter,
  cacheKey,
  getDefaultConverter,
  resetDefaultConverter,
} from './converter.js';
export type { BindVariant, QueryConverterOptions } from './converter.js';
export { PostgresQuery, PostgresClientQuery, expandTemplate } from './postgres-query.js';
export type { PostgresQueryOptions } from './postgres-query.js';
