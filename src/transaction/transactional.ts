/**
 * Transactional functions
 *
 * @module transaction/transactional
 */

import { getAdapter } from '../adapters/Adapter'
import type { Adapter } from '../adapters/Adapter'
import { getConfig } from '../config'
import { logger } from '../utils/logger'
import { Propagation, RetriesExceeded, isTransactionFailed } from './transaction'
import type { TransactionFailed } from './transaction'

export interface TransactionalOptions {
  /** Defaults to the global adapter at call time */
  readonly adapter?: Adapter | undefined
  /** Extra attempts after a failed commit; defaults to the configured value */
  readonly retries?: number | undefined
  readonly propagation?: Propagation | undefined
}

/**
 * Wrap `fn` so that every storage operation it makes, queries aside, runs
 * in a transaction. Commits that fail with `TransactionFailed` are retried
 * by calling `fn` again; any other error rolls the transaction back and
 * propagates.
 *
 * @example
 * ```typescript
 * const transfer = transactional(async (from: Key, to: Key, amount: number) => {
 *   const [a, b] = await getMulti([from, to])
 *   // ...
 * })
 * ```
 *
 * @throws RetriesExceeded when every attempt failed to commit
 */
export function transactional<A extends unknown[], R>(
  fn: (...args: A) => Promise<R>,
  options: TransactionalOptions = {}
): (...args: A) => Promise<R> {
  const propagation = options.propagation ?? Propagation.Nested

  return async (...args: A): Promise<R> => {
    const adapter = options.adapter ?? getAdapter()
    const retries = options.retries ?? getConfig().transactions.retries
    let cause: TransactionFailed | null = null

    for (let attempt = 0; attempt <= retries; attempt++) {
      const transaction = adapter.transaction(propagation)
      try {
        return await adapter.runInTransaction(transaction, async () => {
          await transaction.begin()
          const result = await fn(...args)
          await transaction.commit()
          return result
        })
      } catch (error) {
        if (isTransactionFailed(error)) {
          cause = error
          logger.warn(`Transaction ${transaction.id} failed (attempt ${attempt + 1} of ${retries + 1})`, error.message)
          continue
        }

        await transaction.rollback()
        throw error
      } finally {
        await transaction.end()
      }
    }

    throw new RetriesExceeded(cause)
  }
}
