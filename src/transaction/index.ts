/**
 * Transactions
 *
 * @example
 * ```typescript
 * const createPair = transactional(async () => {
 *   const a = await new Person({ name: 'a' }).put()
 *   const b = await new Person({ name: 'b', friend: a.key }).put()
 *   return [a, b]
 * })
 * ```
 *
 * @module transaction
 */

export {
  Propagation,
  Transaction,
  NestedTransaction,
  TransactionError,
  TransactionFailed,
  RetriesExceeded,
  isTransactionFailed,
  type TransactionStatus,
} from './transaction'

export { transactional, type TransactionalOptions } from './transactional'
