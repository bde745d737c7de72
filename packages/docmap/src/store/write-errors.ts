/**
 * @file Store Error Classification
 *
 * Sorts errors reported by the backing store into semantic categories, so
 * that index reconciliation can tell "already exists" from a real conflict
 * and writes can surface duplicate keys as {@link NotUniqueError}.
 *
 * @module docmap/store/write-errors
 */

import { NotUniqueError, OperationError } from '../errors.js'

// =============================================================================
// Types
// =============================================================================

export type StoreErrorType =
  | 'duplicate_key'
  | 'index_exists'
  | 'index_conflict'
  | 'namespace_not_found'
  | 'timeout'
  | 'network'
  | 'unknown'

export interface StoreErrorClassification {
  type: StoreErrorType
  isRetryable: boolean
  /** Error code, when the store reported one */
  errorCode?: number
  message: string
}

// =============================================================================
// Error Codes
// =============================================================================

const CODE_TYPES: ReadonlyMap<number, StoreErrorType> = new Map([
  [11000, 'duplicate_key'],
  [11001, 'duplicate_key'],
  [12582, 'duplicate_key'],
  [68, 'index_exists'],
  [85, 'index_conflict'],
  [86, 'index_conflict'],
  [26, 'namespace_not_found'],
  [50, 'timeout'],
])

/**
 * Pattern matchers, checked in order when the code is missing or unknown.
 */
const ERROR_PATTERNS: Array<{ pattern: RegExp; type: StoreErrorType }> = [
  // Duplicate key errors (highest priority)
  { pattern: /E11000|duplicate key/i, type: 'duplicate_key' },
  // Conflicts must come before "already exists"
  { pattern: /IndexOptionsConflict|IndexKeySpecsConflict|different options|different key/i, type: 'index_conflict' },
  { pattern: /IndexAlreadyExists|index already exists/i, type: 'index_exists' },
  { pattern: /NamespaceNotFound|ns not found|ns does not exist/i, type: 'namespace_not_found' },
  { pattern: /timeout|timed out|ETIMEDOUT/i, type: 'timeout' },
  { pattern: /network|connection|ECONNRESET|ECONNREFUSED|ENOTFOUND/i, type: 'network' },
]

const RETRYABLE: ReadonlySet<StoreErrorType> = new Set(['timeout', 'network'])

// =============================================================================
// Classification
// =============================================================================

function errorCodeOf(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'number') {
    return error.code
  }
  return undefined
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

/**
 * Classifies an error reported by the backing store.
 *
 * @example
 * ```typescript
 * classifyStoreError(Object.assign(new Error('E11000 duplicate key error'), { code: 11000 })).type
 * // 'duplicate_key'
 * classifyStoreError(new Error('Index with name: a_1 already exists with different options')).type
 * // 'index_conflict'
 * ```
 */
export function classifyStoreError(error: unknown): StoreErrorClassification {
  const message = messageOf(error)
  const errorCode = errorCodeOf(error)

  const byCode = errorCode === undefined ? undefined : CODE_TYPES.get(errorCode)
  const type = byCode ?? ERROR_PATTERNS.find(({ pattern }) => pattern.test(message))?.type ?? 'unknown'

  return {
    type,
    isRetryable: RETRYABLE.has(type),
    errorCode,
    message,
  }
}

export function isDuplicateKeyError(error: unknown): boolean {
  return classifyStoreError(error).type === 'duplicate_key'
}

/**
 * Extracts the index name from a duplicate key message such as
 * `E11000 duplicate key error collection: db.user index: email_1 dup key: ...`.
 */
export function duplicateKeyIndexName(message: string): string | undefined {
  return /index: (\S+) dup key/.exec(message)?.[1]
}

/**
 * Wraps a failed write: {@link NotUniqueError} for duplicate keys,
 * {@link OperationError} otherwise.
 */
export function toOperationError(error: unknown): OperationError {
  if (error instanceof OperationError) {
    return error
  }

  const { type, errorCode, message } = classifyStoreError(error)
  if (type === 'duplicate_key') {
    return new NotUniqueError(`Tried to save duplicate unique keys (${message})`, {
      code: errorCode,
      indexName: duplicateKeyIndexName(message),
      cause: error,
    })
  }

  return new OperationError(`Could not save document (${message})`, { code: errorCode, cause: error })
}
