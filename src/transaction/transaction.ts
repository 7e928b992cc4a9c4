/**
 * Transactions
 *
 * A transaction moves through `created → begun → (committed | rolled_back)`
 * and is always `ended`, whatever the outcome. `begin`, `commit`, `rollback`
 * and `end` may be called on every exit path: calls that do not apply to the
 * current state are no-ops.
 *
 * Transactions come in two propagation modes:
 * - `Independent` always opens a new outer transaction
 * - `Nested` joins the innermost open transaction on the same adapter, or
 *   opens a new one when there is none
 *
 * @module transaction/transaction
 */

import { ErrorCode, KindlingError } from '../errors'
import { logger } from '../utils/logger'

// =============================================================================
// Core Types
// =============================================================================

export enum Propagation {
  /** Join the enclosing transaction, if any */
  Nested = 'nested',
  /** Always run in a transaction of its own */
  Independent = 'independent',
}

/**
 * Transaction status
 */
export type TransactionStatus =
  | 'created'      // Not begun yet
  | 'begun'        // Active
  | 'committed'    // Successfully committed
  | 'rolled_back'  // Rolled back
  | 'failed'       // Commit failed
  | 'ended'        // Cleaned up

let idCounter = 0

function generateId(): string {
  return `txn_${++idCounter}_${Date.now()}`
}

// =============================================================================
// Transaction
// =============================================================================

/**
 * Base class for adapter transactions
 */
export abstract class Transaction {
  readonly id: string = generateId()
  private _status: TransactionStatus = 'created'

  get status(): TransactionStatus {
    return this._status
  }

  /** True between a successful begin and commit/rollback */
  isActive(): boolean {
    return this._status === 'begun'
  }

  /**
   * The outermost transaction this one belongs to
   */
  get root(): Transaction {
    return this
  }

  protected abstract onBegin(): Promise<void>
  protected abstract onCommit(): Promise<void>
  protected abstract onRollback(): Promise<void>

  protected async onEnd(): Promise<void> {}

  async begin(): Promise<void> {
    if (this._status !== 'created') return

    await this.onBegin()
    this._status = 'begun'
    logger.debug(`Transaction ${this.id} begun`)
  }

  /**
   * @throws TransactionFailed when the underlying store rejects the commit
   * @throws TransactionError when the transaction is not active
   */
  async commit(): Promise<void> {
    if (this._status === 'committed') return
    if (this._status !== 'begun') {
      throw new TransactionError(`Cannot commit transaction in '${this._status}' status`, ErrorCode.TRANSACTION_ERROR, {
        transactionId: this.id,
      })
    }

    try {
      await this.onCommit()
    } catch (error) {
      this._status = 'failed'
      logger.debug(`Transaction ${this.id} failed to commit`)
      throw error
    }

    this._status = 'committed'
    logger.debug(`Transaction ${this.id} committed`)
  }

  async rollback(): Promise<void> {
    if (this._status !== 'begun') return

    await this.onRollback()
    this._status = 'rolled_back'
    logger.debug(`Transaction ${this.id} rolled back`)
  }

  async end(): Promise<void> {
    if (this._status === 'ended') return

    this._status = 'ended'
    await this.onEnd()
  }
}

/**
 * A transaction that joins an enclosing one. Its commit is a no-op: only
 * the outermost commit finalizes the work. Rolling it back rolls back the
 * enclosing transaction.
 */
export class NestedTransaction extends Transaction {
  constructor(readonly outer: Transaction) {
    super()
  }

  override get root(): Transaction {
    return this.outer.root
  }

  protected async onBegin(): Promise<void> {
    await this.outer.begin()
  }

  protected async onCommit(): Promise<void> {}

  protected async onRollback(): Promise<void> {
    await this.outer.rollback()
  }
}

// =============================================================================
// Transaction Errors
// =============================================================================

/**
 * Base class for transaction errors
 */
export class TransactionError extends KindlingError {
  override readonly name: string = 'TransactionError'

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.TRANSACTION_ERROR,
    context?: Record<string, unknown>,
    cause?: Error
  ) {
    super(message, code, context, cause)
  }
}

/**
 * Raised by adapters when a transaction cannot be applied, typically
 * because data it read or wrote changed concurrently. Signals a retry.
 */
export class TransactionFailed extends TransactionError {
  override readonly name = 'TransactionFailed'

  constructor(message: string, cause?: Error, context?: Record<string, unknown>) {
    super(message, ErrorCode.TRANSACTION_FAILED, context, cause)
  }
}

/**
 * Raised by `transactional` when it runs out of retries
 */
export class RetriesExceeded extends TransactionError {
  override readonly name = 'RetriesExceeded'

  constructor(cause: TransactionFailed | null) {
    super(cause ? cause.message : 'Transaction retries exceeded.', ErrorCode.RETRIES_EXCEEDED, {}, cause ?? undefined)
  }
}

export function isTransactionFailed(error: unknown): error is TransactionFailed {
  return error instanceof TransactionFailed
}
