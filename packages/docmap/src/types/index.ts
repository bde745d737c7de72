/**
 * @file Core Index Types
 *
 * Shared type definitions for raw index declarations, canonical index
 * specifications and the live index catalog reported by the backing store.
 *
 * @module docmap/types
 */

// =============================================================================
// Directions
// =============================================================================

/**
 * Ascending index direction.
 */
export const ASCENDING = 1 as const

/**
 * Descending index direction.
 */
export const DESCENDING = -1 as const

/**
 * Geospatial 2d index marker.
 */
export const GEO2D = '2d' as const

/**
 * Direction (or special index type) of one key in an index.
 */
export type IndexDirection = typeof ASCENDING | typeof DESCENDING | typeof GEO2D

/**
 * All direction tokens accepted in an explicit `[key, direction]` pair.
 */
export const INDEX_DIRECTIONS: readonly IndexDirection[] = [ASCENDING, DESCENDING, GEO2D]

/**
 * Type guard for direction tokens.
 */
export function isIndexDirection(value: unknown): value is IndexDirection {
  return INDEX_DIRECTIONS.some((direction) => direction === value)
}

/**
 * One (storage key, direction) pair of an index.
 */
export type IndexKey = readonly [key: string, direction: IndexDirection]

// =============================================================================
// Raw Declarations
// =============================================================================

/**
 * One entry of a raw index declaration: a field path with an optional
 * `-`, `+` or `*` prefix, or an explicit `[path, direction]` pair.
 */
export type RawIndexField = string | readonly [path: string, direction: IndexDirection]

/**
 * Options accepted by an index declaration record.
 */
export interface IndexOptions {
  /** Reject documents whose key combination already exists */
  unique?: boolean
  /** Skip documents that lack the indexed field */
  sparse?: boolean
  /** TTL in seconds, for indexes on date fields */
  expireAfterSeconds?: number
  /** Build the index in the background */
  background?: boolean
  /** Explicit index name, overriding the generated one */
  name?: string
}

/**
 * Declaration record form: `{ fields: [...], unique: true, ... }`.
 */
export interface IndexDeclarationRecord extends IndexOptions {
  fields: readonly RawIndexField[]
  /**
   * Set to `false` to keep the discriminator field out of this index on
   * polymorphic schemas.
   */
  cls?: boolean
}

/**
 * An index declaration as authored in `meta.indexes`.
 *
 * @example
 * ```typescript
 * const indexes: RawIndexDeclaration[] = [
 *   '-date',
 *   'tags',
 *   ['category', '-date'],
 *   ['rank', -1],
 *   { fields: ['created'], expireAfterSeconds: 3600 },
 * ]
 * ```
 */
export type RawIndexDeclaration =
  | string
  | readonly [path: string, direction: IndexDirection]
  | readonly RawIndexField[]
  | IndexDeclarationRecord

// =============================================================================
// Canonical Specs
// =============================================================================

/**
 * Normalized form of one index. Key sequence and options together decide
 * equality; `false` booleans and absent options are never stored.
 */
export interface CanonicalIndexSpec extends IndexOptions {
  fields: IndexKey[]
  cls?: false
}

/**
 * A compiled, cached spec list. Frozen; never mutate.
 */
export type CanonicalIndexSpecList = readonly Readonly<CanonicalIndexSpec>[]

// =============================================================================
// Live Catalog
// =============================================================================

/**
 * One key of a live index. Other index types (`text`, `hashed`, ...) may
 * show up here, so the direction is left open.
 */
export type CatalogKey = readonly [key: string, direction: number | string]

/**
 * Snapshot of one index physically present on a collection.
 */
export interface LiveCatalogEntry {
  name: string
  key: CatalogKey[]
  unique?: boolean
  sparse?: boolean
  expireAfterSeconds?: number
}
