/**
 * Library configuration
 *
 * Configuration is read from `KINDLING_*` environment variables, merged
 * with explicit overrides and validated with zod.
 *
 * @example
 * ```typescript
 * configure(loadConfig(process.env, { transactions: { retries: 5 } }))
 * getConfig().transactions.retries // 5
 * ```
 *
 * @module config
 */

import { z } from 'zod'
import {
  DEFAULT_BATCH_SIZE,
  DEFAULT_CACHE_PREFIX,
  DEFAULT_ITEM_TIMEOUT_SECONDS,
  DEFAULT_LOCK_TIMEOUT_SECONDS,
  DEFAULT_MAX_RETRIES,
  DEFAULT_PAGE_SIZE,
} from '../constants'
import { ConfigurationError, ErrorCode } from '../errors'
import { setDefaultNamespace } from '../namespaces'
import { consoleLogger, noopLogger, setLogger, withLevel } from '../utils/logger'

// =============================================================================
// Schema
// =============================================================================

const positiveInt = z.coerce.number().int().positive()

export const configSchema = z.object({
  /** Default namespace for new keys and queries */
  namespace: z.string().default(''),
  cache: z
    .object({
      prefix: z.string().min(1).default(DEFAULT_CACHE_PREFIX),
      lockTimeoutSeconds: positiveInt.default(DEFAULT_LOCK_TIMEOUT_SECONDS),
      itemTimeoutSeconds: positiveInt.default(DEFAULT_ITEM_TIMEOUT_SECONDS),
    })
    .default({}),
  transactions: z
    .object({
      retries: z.coerce.number().int().min(0).default(DEFAULT_MAX_RETRIES),
    })
    .default({}),
  query: z
    .object({
      batchSize: positiveInt.default(DEFAULT_BATCH_SIZE),
      pageSize: positiveInt.default(DEFAULT_PAGE_SIZE),
    })
    .default({}),
  /** When set, `configure` installs a console logger at this level */
  logLevel: z.enum(['silent', 'error', 'warn', 'info', 'debug']).optional(),
})

export type KindlingConfig = z.infer<typeof configSchema>

/** Partial configuration, as accepted by `loadConfig` and `configure` */
export type KindlingConfigInput = z.input<typeof configSchema>

/** Environment variables read by `loadConfig` */
export const ENV_VARS = {
  namespace: 'KINDLING_NAMESPACE',
  cachePrefix: 'KINDLING_CACHE_PREFIX',
  lockTimeoutSeconds: 'KINDLING_CACHE_LOCK_TIMEOUT',
  itemTimeoutSeconds: 'KINDLING_CACHE_ITEM_TIMEOUT',
  retries: 'KINDLING_TRANSACTION_RETRIES',
  batchSize: 'KINDLING_QUERY_BATCH_SIZE',
  pageSize: 'KINDLING_QUERY_PAGE_SIZE',
  logLevel: 'KINDLING_LOG_LEVEL',
} as const

type Env = Record<string, string | undefined>

// =============================================================================
// Loading
// =============================================================================

/**
 * Build a configuration from environment variables and overrides.
 * Overrides win over the environment.
 *
 * @throws ConfigurationError listing every invalid setting
 */
export function loadConfig(env: Env = process.env, overrides: KindlingConfigInput = {}): KindlingConfig {
  const input = {
    namespace: overrides.namespace ?? env[ENV_VARS.namespace],
    cache: {
      prefix: env[ENV_VARS.cachePrefix],
      lockTimeoutSeconds: env[ENV_VARS.lockTimeoutSeconds],
      itemTimeoutSeconds: env[ENV_VARS.itemTimeoutSeconds],
      ...withoutUndefined(overrides.cache),
    },
    transactions: {
      retries: env[ENV_VARS.retries],
      ...withoutUndefined(overrides.transactions),
    },
    query: {
      batchSize: env[ENV_VARS.batchSize],
      pageSize: env[ENV_VARS.pageSize],
      ...withoutUndefined(overrides.query),
    },
    logLevel: overrides.logLevel ?? env[ENV_VARS.logLevel],
  }
  return parseConfig(input)
}

/**
 * Validate a configuration object
 *
 * @throws ConfigurationError listing every invalid setting
 */
export function parseConfig(input: unknown): KindlingConfig {
  const result = configSchema.safeParse(input)
  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
    throw new ConfigurationError(`Invalid configuration: ${issues.join('; ')}`, ErrorCode.INVALID_CONFIG, { issues })
  }
  return result.data
}

function withoutUndefined<T extends object>(value: T | undefined): Record<string, unknown> {
  if (value === undefined) return {}
  return Object.fromEntries(Object.entries(value).filter(([, v]) => v !== undefined))
}

// =============================================================================
// Active configuration
// =============================================================================

let activeConfig: KindlingConfig = parseConfig({})

/**
 * Apply a configuration: sets the default namespace and, when the config
 * names a log level, the global logger.
 *
 * @returns the validated configuration now in effect
 */
export function configure(config: KindlingConfigInput = {}): KindlingConfig {
  activeConfig = parseConfig(config)
  setDefaultNamespace(activeConfig.namespace)

  const { logLevel } = activeConfig
  if (logLevel !== undefined) {
    setLogger(logLevel === 'silent' ? noopLogger : withLevel(consoleLogger, logLevel))
  }
  return activeConfig
}

/**
 * The configuration in effect; defaults until `configure` is called
 */
export function getConfig(): KindlingConfig {
  return activeConfig
}

/**
 * Restore the default configuration
 */
export function resetConfig(): void {
  activeConfig = parseConfig({})
}
