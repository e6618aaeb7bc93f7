/**
 * Configuration for query conversion.
 * @module config
 */

import { z } from 'zod';
import { ConfigurationError } from '../errors/index.js';
import { normalizeEncoding } from '../encoding/index.js';

/**
 * Queries longer than this many bytes are not cached.
 */
export const MAX_CACHED_STATEMENT_LENGTH = 4096;

/**
 * Queries with more parameters than this are not cached.
 */
export const MAX_CACHED_STATEMENT_PARAMS = 50;

/**
 * Default number of parsed queries kept per binding variant.
 */
export const DEFAULT_CACHE_CAPACITY = 128;

/**
 * Default connection encoding.
 */
export const DEFAULT_ENCODING = 'utf8';

/**
 * Query converter configuration.
 */
export interface ConverterConfig {
  /** Entries kept by each parsed-query cache; 0 disables caching */
  cacheCapacity: number;
  /** Longest query, in bytes, eligible for caching */
  maxCachedStatementLength: number;
  /** Largest parameter count eligible for caching */
  maxCachedStatementParams: number;
  /** Encoding used when the transformer does not name one */
  encoding: string;
}

const converterConfigSchema = z.object({
  cacheCapacity: z.number().int().min(0).max(100000),
  maxCachedStatementLength: z.number().int().min(0),
  maxCachedStatementParams: z.number().int().min(0),
  encoding: z.string().min(1).refine(isSupportedEncoding, {
    message: 'unsupported encoding',
  }),
});

function isSupportedEncoding(name: string): boolean {
  try {
    normalizeEncoding(name);
    return true;
  } catch {
    return false;
  }
}

/**
 * Validates a converter configuration.
 *
 * @throws {ConfigurationError} If configuration is invalid
 */
export function validateConverterConfig(config: ConverterConfig): ConverterConfig {
  const result = converterConfigSchema.safeParse(config);
  if (!result.success) {
    const errors = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Configuration validation failed: ${errors.join('; ')}`);
  }
  return result.data;
}

/**
 * Creates a validated converter configuration.
 *
 * @param overrides - Partial configuration to override defaults
 */
export function createDefaultConverterConfig(overrides?: Partial<ConverterConfig>): ConverterConfig {
  return validateConverterConfig({
    cacheCapacity: DEFAULT_CACHE_CAPACITY,
    maxCachedStatementLength: MAX_CACHED_STATEMENT_LENGTH,
    maxCachedStatementParams: MAX_CACHED_STATEMENT_PARAMS,
    encoding: DEFAULT_ENCODING,
    ...overrides,
  });
}

/**
 * Reads converter configuration from environment variables.
 *
 * Recognized: `PGQUERY_CACHE_CAPACITY`, `PGQUERY_MAX_CACHED_LENGTH`,
 * `PGQUERY_MAX_CACHED_PARAMS`, `PGCLIENTENCODING`.
 */
export function loadConverterConfigFromEnv(env: NodeJS.ProcessEnv = process.env): ConverterConfig {
  const overrides: Partial<ConverterConfig> = {};

  const capacity = parseIntegerVar(env, 'PGQUERY_CACHE_CAPACITY');
  if (capacity !== undefined) overrides.cacheCapacity = capacity;

  const maxLength = parseIntegerVar(env, 'PGQUERY_MAX_CACHED_LENGTH');
  if (maxLength !== undefined) overrides.maxCachedStatementLength = maxLength;

  const maxParams = parseIntegerVar(env, 'PGQUERY_MAX_CACHED_PARAMS');
  if (maxParams !== undefined) overrides.maxCachedStatementParams = maxParams;

  if (env.PGCLIENTENCODING) {
    overrides.encoding = env.PGCLIENTENCODING;
  }

  return createDefaultConverterConfig(overrides);
}

function parseIntegerVar(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return undefined;
  }
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw new ConfigurationError(`${name} must be an integer, got '${raw}'`);
  }
  return value;
}
