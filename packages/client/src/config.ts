/**
 * @metabridge/client - Configuration
 *
 * Resolves the settings a client is built from. Precedence, lowest first:
 * defaults, `METABRIDGE_*` environment variables, explicit options.
 *
 * @packageDocumentation
 * @stability stable
 */

import { parseCatalogVersion, type CatalogVersion } from '@metabridge/catalog-types';
import { z } from 'zod';
import {
  ConfigKey,
  DEFAULT_FAILURE_RETRIES,
  DEFAULT_OUTPUT_BUFFER_SIZE,
  ENV_PREFIX,
} from './constants.js';
import { ConfigurationError } from './errors.js';

/**
 * Environment variables read by {@link resolveClientConfig}.
 *
 * @public
 * @stability stable
 */
export const EnvVar = {
  VERSION: `${ENV_PREFIX}VERSION`,
  RETRIES: `${ENV_PREFIX}RETRIES`,
  RETRY_DELAY: `${ENV_PREFIX}RETRY_DELAY`,
  USER: `${ENV_PREFIX}USER`,
} as const;

const ENV_CONFIG_KEYS: ReadonlyArray<readonly [string, string]> = [
  [EnvVar.RETRIES, ConfigKey.FAILURE_RETRIES],
  [EnvVar.RETRY_DELAY, ConfigKey.CONNECT_RETRY_DELAY],
  [EnvVar.USER, ConfigKey.USER_NAME],
];

const RetryLimitSchema = z.string().trim().regex(/^\d+$/).transform(Number);

const OutputBufferSizeSchema = z.number().int().positive();

export interface ClientConfigOptions {
  /** Catalog release, e.g. `'1.2'`, `'v1_2'` or `'1.2.1'` */
  version?: CatalogVersion | string;
  /** Catalog configuration entries */
  config?: Readonly<Record<string, string>>;
  outputBufferSize?: number;
  /** Environment to overlay; defaults to `process.env` */
  env?: Readonly<Record<string, string | undefined>>;
}

/**
 * Validated client settings.
 *
 * @public
 * @stability stable
 */
export interface ResolvedClientConfig {
  readonly version: CatalogVersion;
  readonly config: Readonly<Record<string, string>>;
  /** Retries after the first attempt of a call */
  readonly retryLimit: number;
  readonly outputBufferSize: number;
}

/**
 * Reads the retry limit from catalog configuration.
 *
 * @throws {ConfigurationError} When the value is not a non-negative integer
 */
export function readRetryLimit(config: Readonly<Record<string, string>>): number {
  const value = config[ConfigKey.FAILURE_RETRIES];
  if (value === undefined) {
    return DEFAULT_FAILURE_RETRIES;
  }
  const parsed = RetryLimitSchema.safeParse(value);
  if (!parsed.success) {
    throw new ConfigurationError(
      `${ConfigKey.FAILURE_RETRIES} must be a non-negative integer, got ${value}`,
      undefined,
      { key: ConfigKey.FAILURE_RETRIES, value }
    );
  }
  return parsed.data;
}

/**
 * Merges defaults, environment and explicit options into a frozen config.
 *
 * @throws {ConfigurationError} When the version is missing or unsupported, or a setting is invalid
 *
 * @example
 * ```typescript
 * const resolved = resolveClientConfig({
 *   version: '0.13.1',
 *   config: { 'metastore.failure.retries': '3' },
 * });
 * resolved.version;    // '0.13'
 * resolved.retryLimit; // 3
 * ```
 */
export function resolveClientConfig(options: ClientConfigOptions = {}): ResolvedClientConfig {
  const env = options.env ?? process.env;

  const versionText = options.version ?? env[EnvVar.VERSION];
  if (versionText === undefined || versionText.trim() === '') {
    throw new ConfigurationError(`Catalog version is required (option "version" or ${EnvVar.VERSION})`);
  }
  const version = parseCatalogVersion(versionText);
  if (version === undefined) {
    throw ConfigurationError.unsupportedVersion(versionText);
  }

  const config: Record<string, string> = {};
  for (const [variable, key] of ENV_CONFIG_KEYS) {
    const value = env[variable];
    if (value !== undefined && value !== '') {
      config[key] = value;
    }
  }
  Object.assign(config, options.config ?? {});

  const outputBufferSize = options.outputBufferSize ?? DEFAULT_OUTPUT_BUFFER_SIZE;
  if (!OutputBufferSizeSchema.safeParse(outputBufferSize).success) {
    throw new ConfigurationError(`outputBufferSize must be a positive integer, got ${outputBufferSize}`);
  }

  return Object.freeze({
    version,
    config: Object.freeze(config),
    retryLimit: readRetryLimit(config),
    outputBufferSize,
  });
}
