/**
 * @file Schema Meta Validation
 *
 * Zod schemas for class-level `meta` options and for the record form of an
 * index declaration.
 *
 * @module docmap/schema/meta
 */

import { z } from 'zod'
import type { RawIndexDeclaration } from '../types/index.js'

// =============================================================================
// Index Declarations
// =============================================================================

const directionSchema = z.union([z.literal(1), z.literal(-1), z.literal('2d')])

export const rawIndexFieldSchema = z.union([
  z.string().min(1),
  z.tuple([z.string().min(1), directionSchema]),
])

/**
 * Record form of an index declaration. Unknown options are rejected.
 */
export const indexDeclarationRecordSchema = z
  .object({
    fields: z.array(rawIndexFieldSchema).min(1),
    unique: z.boolean().optional(),
    sparse: z.boolean().optional(),
    expireAfterSeconds: z.number().int().nonnegative().optional(),
    background: z.boolean().optional(),
    name: z.string().min(1).optional(),
    cls: z.boolean().optional(),
  })
  .strict()

// =============================================================================
// Document Meta
// =============================================================================

/**
 * Class-level options as authored. Everything is optional; inheritable
 * options fall back to the parent schema, then to the registry defaults.
 */
export interface SchemaMeta {
  /** Physical collection name; documents only */
  collection?: string
  indexes?: readonly RawIndexDeclaration[]
  /** Subclasses share the collection and carry a `_cls` discriminator */
  allowInheritance?: boolean
  /** Contributes fields and indexes but is never stored on its own */
  abstract?: boolean
  /** Reconcile indexes automatically on first collection access */
  autoCreateIndex?: boolean
  /** Create a standalone `_cls` index when no other index leads with it */
  indexCls?: boolean
  /** Accept paths to undeclared fields */
  dynamic?: boolean
}

export const schemaMetaSchema = z
  .object({
    collection: z.string().min(1).optional(),
    // declarations are validated one by one by the normalizer
    indexes: z.array(z.unknown()).optional(),
    allowInheritance: z.boolean().optional(),
    abstract: z.boolean().optional(),
    autoCreateIndex: z.boolean().optional(),
    indexCls: z.boolean().optional(),
    dynamic: z.boolean().optional(),
  })
  .strict()

/**
 * Inheritable options after resolution against the ancestor chain.
 */
export interface ResolvedMeta {
  indexes: readonly RawIndexDeclaration[]
  allowInheritance: boolean
  abstract: boolean
  autoCreateIndex: boolean
  indexCls: boolean
  dynamic: boolean
}

export const DEFAULT_META: Omit<ResolvedMeta, 'indexes' | 'abstract'> = {
  allowInheritance: true,
  autoCreateIndex: true,
  indexCls: true,
  dynamic: false,
}

/**
 * Formats zod issues into one line for error messages.
 */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ')
}
