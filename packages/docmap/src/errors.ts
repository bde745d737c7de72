/**
 * @file Error Classes
 *
 * Error taxonomy for schema definition, index reconciliation and writes.
 *
 * - {@link SchemaConfigurationError}: raised while a schema is defined, always
 *   fatal to its registration
 * - {@link ReconciliationError}: the store rejected an index creation
 * - {@link OperationError} / {@link NotUniqueError}: write failures, with
 *   duplicate-key violations kept distinguishable
 *
 * @example
 * ```typescript
 * try {
 *   await posts.insertOne({ slug: 'hello' })
 * } catch (error) {
 *   if (error instanceof NotUniqueError) {
 *     console.log('Slug taken:', error.indexName)
 *   } else if (error instanceof OperationError) {
 *     console.log('Write failed:', error.message)
 *   }
 * }
 * ```
 *
 * @module docmap/errors
 */

import type { CanonicalIndexSpec, RawIndexDeclaration } from './types/index.js'

// =============================================================================
// Configuration Errors
// =============================================================================

/**
 * Base error for invalid schema definitions.
 */
export class SchemaConfigurationError extends Error {
  /** Name of the schema being defined */
  readonly schema: string

  constructor(schema: string, message: string, options?: { cause?: unknown }) {
    super(`${schema}: ${message}`, options)
    this.name = 'SchemaConfigurationError'
    this.schema = schema

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }
}

/**
 * Raised for a malformed entry in `meta.indexes`.
 */
export class InvalidIndexDeclarationError extends SchemaConfigurationError {
  /** The declaration as authored */
  readonly declaration: RawIndexDeclaration

  constructor(
    schema: string,
    declaration: RawIndexDeclaration,
    reason: string,
    options?: { cause?: unknown }
  ) {
    super(schema, `invalid index declaration ${JSON.stringify(declaration)}: ${reason}`, options)
    this.name = 'InvalidIndexDeclarationError'
    this.declaration = declaration
  }
}

/**
 * Raised when a dotted field path does not resolve against a schema.
 */
export class FieldPathResolutionError extends SchemaConfigurationError {
  readonly path: string

  constructor(schema: string, path: string, reason: string) {
    super(schema, `cannot resolve field path '${path}': ${reason}`)
    this.name = 'FieldPathResolutionError'
    this.path = path
  }
}

// =============================================================================
// Reconciliation Errors
// =============================================================================

/**
 * Raised when the backing store rejects an index creation for any reason
 * other than the identical index already existing.
 */
export class ReconciliationError extends Error {
  readonly collection: string
  readonly indexName: string
  readonly spec: Readonly<CanonicalIndexSpec>

  constructor(
    collection: string,
    indexName: string,
    spec: Readonly<CanonicalIndexSpec>,
    cause: Error
  ) {
    super(
      `Failed to create index '${indexName}' on collection '${collection}': ${cause.message}`,
      { cause }
    )
    this.name = 'ReconciliationError'
    this.collection = collection
    this.indexName = indexName
    this.spec = spec

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ReconciliationError)
    }
  }
}

// =============================================================================
// Write Errors
// =============================================================================

/**
 * Generic write failure reported by the backing store.
 */
export class OperationError extends Error {
  /** Store error code, when the store reported one */
  readonly code?: number

  constructor(message: string, options?: { code?: number; cause?: unknown }) {
    super(message, { cause: options?.cause })
    this.name = 'OperationError'
    this.code = options?.code

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }
}

/**
 * A write collided with a unique index.
 */
export class NotUniqueError extends OperationError {
  /** Name of the violated index, parsed from the store message when present */
  readonly indexName?: string

  constructor(message: string, options?: { code?: number; indexName?: string; cause?: unknown }) {
    super(message, options)
    this.name = 'NotUniqueError'
    this.indexName = options?.indexName
  }
}
