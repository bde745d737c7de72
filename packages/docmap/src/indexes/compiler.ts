/**
 * @file Index Spec Compiler
 *
 * Runs normalizer, inheritance merger and implicit-unique deriver for a
 * schema and produces its canonical spec list.
 *
 * @module docmap/indexes/compiler
 */

import type { SchemaDescriptor, SchemaRegistry } from '../schema/registry.js'
import type { CanonicalIndexSpec, CanonicalIndexSpecList } from '../types/index.js'
import { mergeInheritedSpecs } from './inheritance.js'
import { normalizeIndexDeclaration } from './normalizer.js'
import { freezeSpecList } from './spec.js'
import { deriveUniqueSpecs, foldUniqueSpecs } from './unique.js'

/**
 * Normalizes the declarations a schema makes itself, ignoring ancestors.
 */
export function normalizeOwnDeclarations(
  registry: SchemaRegistry,
  schema: SchemaDescriptor
): CanonicalIndexSpec[] {
  return schema.meta.indexes.map((raw) => normalizeIndexDeclaration(registry, schema, raw))
}

/**
 * Compiles the canonical spec list of a schema. Uncached; use
 * {@link SchemaRegistry.compileIndexSpecs} for the cached list.
 *
 * @example
 * ```typescript
 * // BlogPost: date (dbField 'addDate'), category, tags; polymorphic
 * // indexes: ['-date', 'tags', ['category', '-date']]
 * compileSchemaIndexes(registry, blogPost)
 * // [
 * //   { fields: [['_cls', 1], ['addDate', -1]] },
 * //   { fields: [['_cls', 1], ['tags', 1]] },
 * //   { fields: [['_cls', 1], ['category', 1], ['addDate', -1]] },
 * // ]
 * ```
 */
export function compileSchemaIndexes(
  registry: SchemaRegistry,
  schema: SchemaDescriptor
): CanonicalIndexSpecList {
  const chain = [...registry.ancestors(schema), schema].map((member) =>
    normalizeOwnDeclarations(registry, member)
  )

  const merged = mergeInheritedSpecs(chain, { polymorphic: schema.polymorphic })
  const uniques = deriveUniqueSpecs(registry, schema)

  return freezeSpecList(foldUniqueSpecs(merged, uniques))
}
