/**
 * @file Implicit-Unique Deriver
 *
 * Turns field-level `unique` and `uniqueWith` declarations into unique index
 * specs, at every level of embedding.
 *
 * @module docmap/indexes/unique
 */

import { embeddedTarget, uniqueWithPaths } from '../schema/fields.js'
import type { SchemaDescriptor, SchemaRegistry } from '../schema/registry.js'
import { ASCENDING, type CanonicalIndexSpec, type IndexKey } from '../types/index.js'
import { resolveFieldPath } from './field-path.js'
import { appendDistinct, createSpec, keysEqual } from './spec.js'

/**
 * Derives implicit unique specs for a schema.
 *
 * Fields are visited depth-first in declaration order, ancestors' fields
 * first. A `uniqueWith` field yields one compound spec, its own key followed
 * by each partner key in declared order, with partners resolved relative to
 * the schema that declares the field. Primary-key fields yield nothing.
 * Embedded schemas already on the current path are not entered again.
 *
 * @example
 * ```typescript
 * // title: field.string({ uniqueWith: 'sub.year' }),
 * // sub: field.embedded('SubDocument') where SubDocument.slug is unique
 * deriveUniqueSpecs(registry, blogPost)
 * // [
 * //   { fields: [['title', 1], ['sub.yr', 1]], unique: true },
 * //   { fields: [['sub.slug', 1]], unique: true },
 * // ]
 * ```
 */
export function deriveUniqueSpecs(registry: SchemaRegistry, schema: SchemaDescriptor): CanonicalIndexSpec[] {
  const specs: CanonicalIndexSpec[] = []
  const onPath = new Set<number>()

  const walk = (owner: SchemaDescriptor, prefix: string): void => {
    onPath.add(owner.id)

    for (const bound of owner.fields.values()) {
      const { descriptor } = bound
      const partners = uniqueWithPaths(descriptor)

      if ((descriptor.unique || partners.length > 0) && !descriptor.primaryKey) {
        const keys: IndexKey[] = [[prefix + bound.storageKey, ASCENDING]]
        for (const partner of partners) {
          keys.push([prefix + resolveFieldPath(registry, owner, partner).storageKey, ASCENDING])
        }
        appendDistinct(specs, [createSpec(keys, { unique: true, sparse: descriptor.sparse })])
      }

      const target = embeddedTarget(descriptor)
      if (target !== undefined) {
        const embedded = registry.resolveRef(target, owner)
        if (!onPath.has(embedded.id)) {
          walk(embedded, `${prefix}${bound.storageKey}.`)
        }
      }
    }

    onPath.delete(owner.id)
  }

  walk(schema, '')
  return specs
}

/**
 * Folds implicit unique specs into a merged list. A unique spec whose key
 * sequence is already indexed upgrades that index instead of adding a second
 * one with the same keys.
 */
export function foldUniqueSpecs(
  merged: readonly CanonicalIndexSpec[],
  uniques: readonly CanonicalIndexSpec[]
): CanonicalIndexSpec[] {
  const result = [...merged]

  for (const unique of uniques) {
    const position = result.findIndex((spec) => keysEqual(spec.fields, unique.fields))
    if (position === -1) {
      result.push(unique)
      continue
    }
    const existing = result[position]
    result[position] = createSpec(existing.fields, {
      ...existing,
      unique: true,
      sparse: existing.sparse || unique.sparse,
    })
  }

  return result
}
