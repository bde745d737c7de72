/**
 * @file Store Error Classification Tests
 */

import { describe, it, expect } from 'vitest'
import { NotUniqueError, OperationError } from '../../src/errors.js'
import {
  classifyStoreError,
  duplicateKeyIndexName,
  isDuplicateKeyError,
  toOperationError,
  type StoreErrorType,
} from '../../src/store/write-errors.js'

const storeError = (message: string, code?: number): Error =>
  code === undefined ? new Error(message) : Object.assign(new Error(message), { code })

const DUPLICATE_MESSAGE =
  'E11000 duplicate key error collection: test.user index: email_1 dup key: { email: "a@example.com" }'

const CODE_TYPES: Array<[number, StoreErrorType]> = [
  [11000, 'duplicate_key'],
  [11001, 'duplicate_key'],
  [12582, 'duplicate_key'],
  [68, 'index_exists'],
  [85, 'index_conflict'],
  [86, 'index_conflict'],
  [26, 'namespace_not_found'],
  [50, 'timeout'],
]

describe('classifyStoreError', () => {
  it.each(CODE_TYPES)('classifies code %i as %s', (code, type) => {
    expect(classifyStoreError(storeError('failed', code)).type).toBe(type)
  })

  it('prefers the code over the message', () => {
    expect(classifyStoreError(storeError('E11000 duplicate key', 85)).type).toBe('index_conflict')
  })

  it('falls back to the message', () => {
    expect(classifyStoreError(storeError(DUPLICATE_MESSAGE)).type).toBe('duplicate_key')
    expect(classifyStoreError(storeError('Index with name: a_1 already exists with different options')).type).toBe(
      'index_conflict'
    )
    expect(classifyStoreError(storeError('IndexAlreadyExists')).type).toBe('index_exists')
    expect(classifyStoreError(storeError('ns not found')).type).toBe('namespace_not_found')
  })

  it('marks network and timeout failures retryable', () => {
    const network = classifyStoreError(storeError('connect ECONNREFUSED 127.0.0.1:27017'))
    const timeout = classifyStoreError(storeError('operation timed out'))

    expect(network).toEqual({
      type: 'network',
      isRetryable: true,
      errorCode: undefined,
      message: 'connect ECONNREFUSED 127.0.0.1:27017',
    })
    expect(timeout.type).toBe('timeout')
    expect(timeout.isRetryable).toBe(true)
  })

  it('classifies anything else as unknown', () => {
    const result = classifyStoreError('boom')

    expect(result.type).toBe('unknown')
    expect(result.isRetryable).toBe(false)
    expect(result.message).toBe('boom')
  })
})

describe('isDuplicateKeyError', () => {
  it('detects duplicate keys', () => {
    expect(isDuplicateKeyError(storeError('failed', 11000))).toBe(true)
    expect(isDuplicateKeyError(storeError('failed', 85))).toBe(false)
  })
})

describe('duplicateKeyIndexName', () => {
  it('extracts the index name', () => {
    expect(duplicateKeyIndexName(DUPLICATE_MESSAGE)).toBe('email_1')
  })

  it('returns undefined without one', () => {
    expect(duplicateKeyIndexName('E11000 duplicate key error')).toBeUndefined()
  })
})

describe('toOperationError', () => {
  it('wraps duplicate keys in NotUniqueError', () => {
    const cause = storeError(DUPLICATE_MESSAGE, 11000)
    const error = toOperationError(cause)

    expect(error).toBeInstanceOf(NotUniqueError)
    expect(error).toBeInstanceOf(OperationError)
    expect(error.message).toBe(`Tried to save duplicate unique keys (${DUPLICATE_MESSAGE})`)
    expect(error.code).toBe(11000)
    expect(error.cause).toBe(cause)
    if (error instanceof NotUniqueError) {
      expect(error.indexName).toBe('email_1')
      expect(error.name).toBe('NotUniqueError')
    }
  })

  it('wraps other failures in OperationError', () => {
    const error = toOperationError(storeError('disk full', 14031))

    expect(error).not.toBeInstanceOf(NotUniqueError)
    expect(error.message).toBe('Could not save document (disk full)')
    expect(error.code).toBe(14031)
    expect(error.name).toBe('OperationError')
  })

  it('returns operation errors unchanged', () => {
    const original = new OperationError('RPC client is not connected')

    expect(toOperationError(original)).toBe(original)
  })
})
