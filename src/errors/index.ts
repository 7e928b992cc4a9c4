/**
 * kindling Error Handling Module
 *
 * Provides a standardized error hierarchy for the entire codebase.
 * All errors extend from KindlingError which provides:
 * - Error codes for programmatic handling
 * - Serialization support for logging
 * - Cause chaining for debugging
 * - Type guards for error checking
 *
 * Error Hierarchy:
 * - KindlingError (base class)
 *   - ValidationError (value assigned to a property is invalid)
 *     - ImmutablePropertyError (assignment to a computed property)
 *   - SerializationError (serialized value cannot be decoded)
 *   - ConfigurationError (invalid property or library configuration)
 *   - MissingValueError (required value missing at store time)
 *   - LookupError (unknown kind, partial key, adapter mismatch)
 *   - RegistryError (conflicting model registration)
 *   - IntegrityError (internal consistency failure)
 *
 * Transaction errors live in the transaction module.
 *
 * @module errors
 */

// =============================================================================
// Error Codes
// =============================================================================

/**
 * Error codes for kindling operations.
 * These codes are stable and can be used for programmatic error handling.
 */
export enum ErrorCode {
  // General errors
  UNKNOWN = 'UNKNOWN',
  INTERNAL = 'INTERNAL',

  // Validation errors
  INVALID_TYPE = 'INVALID_TYPE',
  INVALID_VALUE = 'INVALID_VALUE',
  PARTIAL_KEY = 'PARTIAL_KEY',
  VALUE_TOO_LONG = 'VALUE_TOO_LONG',
  KIND_MISMATCH = 'KIND_MISMATCH',
  IMMUTABLE_PROPERTY = 'IMMUTABLE_PROPERTY',
  NOT_INDEXED = 'NOT_INDEXED',
  SERIALIZATION_FAILED = 'SERIALIZATION_FAILED',

  // Storage-time errors
  REQUIRED_VALUE = 'REQUIRED_VALUE',

  // Lookup errors
  MODEL_NOT_FOUND = 'MODEL_NOT_FOUND',
  ADAPTER_MISMATCH = 'ADAPTER_MISMATCH',
  NO_ADAPTER = 'NO_ADAPTER',

  // Registry errors
  DUPLICATE_KIND = 'DUPLICATE_KIND',

  // Configuration errors
  INVALID_OPTION = 'INVALID_OPTION',
  INVALID_CONFIG = 'INVALID_CONFIG',

  // Integrity errors
  INTEGRITY_ERROR = 'INTEGRITY_ERROR',

  // Transaction errors
  TRANSACTION_ERROR = 'TRANSACTION_ERROR',
  TRANSACTION_FAILED = 'TRANSACTION_FAILED',
  RETRIES_EXCEEDED = 'RETRIES_EXCEEDED',
}

// =============================================================================
// Serialized Error Format
// =============================================================================

/**
 * Serializable error format
 */
export interface SerializedError {
  /** Error class name */
  name: string
  /** Error code for programmatic handling */
  code: ErrorCode
  /** Human-readable error message */
  message: string
  /** Stack trace (included outside production) */
  stack?: string | undefined
  /** Additional context data */
  context?: Record<string, unknown> | undefined
  /** Serialized cause (if error chaining) */
  cause?: SerializedError | undefined
}

// =============================================================================
// Base Error Class
// =============================================================================

/**
 * Base error class for all kindling errors.
 *
 * @example
 * ```typescript
 * throw new KindlingError('Operation failed', ErrorCode.INTERNAL, {
 *   operation: 'put',
 *   kind: 'Person'
 * })
 * ```
 */
export class KindlingError extends Error {
  override readonly name: string = 'KindlingError'
  readonly code: ErrorCode
  readonly context: Record<string, unknown>
  override readonly cause?: Error | undefined

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN,
    context?: Record<string, unknown>,
    cause?: Error
  ) {
    super(message)
    this.code = code
    this.context = context ?? {}
    this.cause = cause
    Object.setPrototypeOf(this, new.target.prototype)
  }

  /**
   * Serialize error for logging or transport
   */
  toJSON(): SerializedError {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      stack: process.env.NODE_ENV !== 'production' ? this.stack : undefined,
      context: Object.keys(this.context).length > 0 ? this.context : undefined,
      cause: this.cause instanceof KindlingError ? this.cause.toJSON() : undefined,
    }
  }

  /**
   * Check if error matches a specific code
   */
  is(code: ErrorCode): boolean {
    return this.code === code
  }
}

// =============================================================================
// Validation Errors
// =============================================================================

/**
 * Error thrown when a value cannot be assigned to a property.
 *
 * Raised synchronously at the point of assignment or filter construction.
 * `INVALID_TYPE` marks a value of the wrong type; every other code marks a
 * value of the right type that is otherwise unacceptable.
 */
export class ValidationError extends KindlingError {
  override readonly name: string = 'ValidationError'

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.INVALID_VALUE,
    context?: {
      property?: string | undefined
      expectedType?: string | undefined
      actualType?: string | undefined
      kind?: string | undefined
    },
    cause?: Error
  ) {
    super(message, code, context, cause)
  }

  /** Property that failed validation */
  get property(): string | undefined {
    const property = this.context.property
    return typeof property === 'string' ? property : undefined
  }

  /** True when the value had the wrong type */
  get isTypeError(): boolean {
    return this.code === ErrorCode.INVALID_TYPE
  }
}

/**
 * Error thrown when assigning to a property whose value is derived.
 */
export class ImmutablePropertyError extends ValidationError {
  override readonly name = 'ImmutablePropertyError'

  constructor(property: string) {
    super(`Can't set attribute ${property}.`, ErrorCode.IMMUTABLE_PROPERTY, { property })
  }
}

/**
 * Error thrown when serialized data carries an unknown type tag.
 */
export class SerializationError extends KindlingError {
  override readonly name = 'SerializationError'

  constructor(message: string, context?: Record<string, unknown>, cause?: Error) {
    super(message, ErrorCode.SERIALIZATION_FAILED, context, cause)
  }
}

// =============================================================================
// Configuration Errors
// =============================================================================

/**
 * Error thrown for invalid property options or library configuration.
 */
export class ConfigurationError extends KindlingError {
  override readonly name = 'ConfigurationError'

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.INVALID_OPTION,
    context?: Record<string, unknown>,
    cause?: Error
  ) {
    super(message, code, context, cause)
  }
}

// =============================================================================
// Storage-time Errors
// =============================================================================

/**
 * Error thrown when a required property has no value at store time.
 *
 * Deferred to store time because optionality can depend on sibling state
 * assigned after construction.
 */
export class MissingValueError extends KindlingError {
  override readonly name = 'MissingValueError'

  constructor(property: string) {
    super(`Property ${property} requires a value.`, ErrorCode.REQUIRED_VALUE, { property })
  }

  get property(): string {
    return String(this.context.property)
  }
}

// =============================================================================
// Lookup Errors
// =============================================================================

/**
 * Error thrown when keys or entities cannot be resolved to a model or adapter.
 */
export class LookupError extends KindlingError {
  override readonly name = 'LookupError'

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.MODEL_NOT_FOUND,
    context?: Record<string, unknown>,
    cause?: Error
  ) {
    super(message, code, context, cause)
  }
}

/**
 * Error thrown when a model registration conflicts with an existing one.
 */
export class RegistryError extends KindlingError {
  override readonly name = 'RegistryError'

  constructor(kind: string) {
    super(`Multiple models for kind ${JSON.stringify(kind)}.`, ErrorCode.DUPLICATE_KIND, { kind })
  }
}

/**
 * Error thrown when stored data violates an invariant the library itself
 * maintains. Seeing one means a bug, not bad input.
 */
export class IntegrityError extends KindlingError {
  override readonly name = 'IntegrityError'

  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCode.INTEGRITY_ERROR, context)
  }
}

// =============================================================================
// Type Guards
// =============================================================================

export function isKindlingError(error: unknown): error is KindlingError {
  return error instanceof KindlingError
}

export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError
}

export function isLookupError(error: unknown): error is LookupError {
  return error instanceof LookupError
}

/**
 * Wrap an unknown thrown value in an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error))
}
