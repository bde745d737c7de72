/**
 * @file Field Path Resolver
 *
 * Resolves dotted field references (`rank.title`, `tags.name`, `pk`) against
 * a schema graph and translates each logical field name into its storage
 * key, descending through embedded documents and lists of embedded
 * documents.
 *
 * Every step consumes one path segment, so self-referential embedding can
 * never make resolution loop.
 *
 * @module docmap/indexes/field-path
 */

import { FieldPathResolutionError } from '../errors.js'
import { innermostField, type BoundField } from '../schema/fields.js'
import type { SchemaDescriptor, SchemaRegistry } from '../schema/registry.js'

// =============================================================================
// Types
// =============================================================================

/**
 * Result of resolving a dotted path.
 */
export interface ResolvedFieldPath {
  /** The path as written */
  path: string
  /** Dotted storage path, e.g. `date.yr` for `date.year` */
  storageKey: string
  /** The last declared field the path went through */
  field?: BoundField
}

// =============================================================================
// Constants
// =============================================================================

/**
 * Regex pattern for control characters (ASCII 0-31, including null byte)
 */
const CONTROL_CHARS_REGEX = /[\x00-\x1F]/

/**
 * Discriminator field stored on documents of polymorphic schemas.
 */
export const DISCRIMINATOR_KEY = '_cls'

/**
 * Storage key of the primary key.
 */
export const PRIMARY_KEY = '_id'

/**
 * Alias that always resolves to the primary-key field.
 */
export const PRIMARY_KEY_ALIAS = 'pk'

const DISCRIMINATOR_FIELD: BoundField = {
  name: DISCRIMINATOR_KEY,
  storageKey: DISCRIMINATOR_KEY,
  descriptor: { kind: 'string' },
}

// =============================================================================
// Segment Validation
// =============================================================================

/**
 * Checks one path segment or storage key.
 *
 * @returns The reason the segment is invalid, or `undefined` when it is valid
 */
export function validatePathSegment(segment: string): string | undefined {
  if (segment === '') {
    return 'empty path segment'
  }

  if (segment.startsWith('$')) {
    return `path segment '${segment}' starts with '$' which would be read as an operator`
  }

  if (CONTROL_CHARS_REGEX.test(segment)) {
    return 'contains control characters'
  }

  return undefined
}

// =============================================================================
// Resolution
// =============================================================================

function lookupField(schema: SchemaDescriptor, segment: string, atRoot: boolean): BoundField | undefined {
  if (atRoot && schema.kind === 'document') {
    if (segment === PRIMARY_KEY_ALIAS) {
      return schema.primaryKey
    }
    if (segment === DISCRIMINATOR_KEY && schema.polymorphic) {
      return DISCRIMINATOR_FIELD
    }
  }
  return schema.fields.get(segment)
}

/**
 * Resolves a dotted field path to its storage key.
 *
 * - `embedded` fields and lists of them continue into the target schema
 * - `dict` and `geoPoint` fields and lists of scalars pass remaining
 *   segments through
 * - `reference` fields and other scalars end the path
 * - on `dynamic` schemas, unknown names and everything after them pass
 *   through unchanged
 *
 * @param registry - Registry that owns the schema graph
 * @param schema - Schema the path is relative to
 * @param path - Dotted field path
 * @throws FieldPathResolutionError if the path does not resolve
 *
 * @example
 * ```typescript
 * resolveFieldPath(registry, blogPost, 'date.year').storageKey // 'date.yr'
 * resolveFieldPath(registry, blogPost, 'tags.name').storageKey // 'tags.tag'
 * resolveFieldPath(registry, blogPost, 'pk').storageKey // '_id'
 * ```
 */
export function resolveFieldPath(
  registry: SchemaRegistry,
  schema: SchemaDescriptor,
  path: string
): ResolvedFieldPath {
  const segments = path.split('.')

  for (const segment of segments) {
    const reason = validatePathSegment(segment)
    if (reason !== undefined) {
      throw new FieldPathResolutionError(schema.name, path, reason)
    }
  }

  const keys: string[] = []
  let current: SchemaDescriptor | undefined = schema
  let passthrough = false
  let lastField: BoundField | undefined

  for (const [position, segment] of segments.entries()) {
    if (passthrough) {
      keys.push(segment)
      continue
    }

    if (current === undefined) {
      throw new FieldPathResolutionError(
        schema.name,
        path,
        `'${keys.join('.')}' has no sub-fields`
      )
    }

    const bound = lookupField(current, segment, position === 0)
    if (bound === undefined) {
      if (current.meta.dynamic) {
        keys.push(segment)
        passthrough = true
        continue
      }
      throw new FieldPathResolutionError(
        schema.name,
        path,
        `'${segment}' is not a field of ${current.name}`
      )
    }

    keys.push(bound.storageKey)
    lastField = bound

    const inner = innermostField(bound.descriptor)
    if (inner.kind === 'embedded') {
      current = registry.resolveRef(inner.target, current)
    } else if (inner.kind === 'reference') {
      if (position < segments.length - 1) {
        throw new FieldPathResolutionError(
          schema.name,
          path,
          `'${segment}' is a reference and cannot be traversed`
        )
      }
      current = undefined
    } else if (inner.kind === 'dict' || inner.kind === 'geoPoint' || bound.descriptor.kind === 'list') {
      passthrough = true
    } else {
      current = undefined
    }
  }

  return { path, storageKey: keys.join('.'), field: lastField }
}
