/**
 * kindling Constants
 *
 * Centralized constants used throughout the codebase.
 * Eliminates magic numbers and provides single source of truth.
 */

// =============================================================================
// Schema
// =============================================================================

/**
 * Name of the reserved field that holds the flattened class hierarchy
 * of polymorphic entities (most specific model first).
 *
 * Part of the persisted schema: changing it orphans stored hierarchies.
 */
export const HIERARCHY_FIELD = '^k'

/**
 * Maximum length, in encoded bytes, of indexed string values
 */
export const MAX_INDEXED_LENGTH = 1500

/**
 * Encoding used to measure and transcode strings when none is configured
 */
export const DEFAULT_ENCODING = 'utf8'

// =============================================================================
// Queries
// =============================================================================

/**
 * Default number of entities fetched per round trip by a resultset
 */
export const DEFAULT_BATCH_SIZE = 300

/**
 * Default page size for paginated queries
 */
export const DEFAULT_PAGE_SIZE = 100

// =============================================================================
// Transactions
// =============================================================================

/**
 * Default number of times a transactional function is retried after a
 * commit conflict
 */
export const DEFAULT_MAX_RETRIES = 3

// =============================================================================
// Cache
// =============================================================================

/**
 * Default prefix for cache keys
 */
export const DEFAULT_CACHE_PREFIX = 'kindling'

/**
 * Lock placeholders expire after this many seconds so that a crashed
 * writer cannot wedge a cache entry
 */
export const DEFAULT_LOCK_TIMEOUT_SECONDS = 60

/**
 * Expiry of populated cache entries (one day)
 */
export const DEFAULT_ITEM_TIMEOUT_SECONDS = 86_400

/**
 * Number of random bytes in a lock placeholder's tag
 */
export const LOCK_TAG_BYTES = 16
