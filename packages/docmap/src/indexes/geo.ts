/**
 * @file Geo-Index Collector
 *
 * Collects the geospatial indexes of a schema for spatial-query validation
 * and for reconciliation.
 *
 * @module docmap/indexes/geo
 */

import { innermostField } from '../schema/fields.js'
import type { SchemaDescriptor, SchemaRegistry } from '../schema/registry.js'
import { GEO2D, type CanonicalIndexSpec } from '../types/index.js'
import { createSpec, hasGeoKey, keysEqual } from './spec.js'

/**
 * Returns the geospatial specs of a schema: compiled specs with a `2d` key,
 * followed by one `2d` spec per `geoPoint` field.
 *
 * Embedded fields and lists of embedded documents are searched, each
 * embedded schema at most once. Reference fields are links, not containment,
 * and are never followed.
 *
 * @example
 * ```typescript
 * // Location: { location: field.geoPoint() }
 * // Parent: { location: field.reference('Location') }
 * collectGeoIndexes(registry, location) // [{ fields: [['location', '2d']] }]
 * collectGeoIndexes(registry, parent) // []
 * ```
 */
export function collectGeoIndexes(registry: SchemaRegistry, schema: SchemaDescriptor): CanonicalIndexSpec[] {
  const result = registry
    .compileIndexSpecs(schema)
    .filter(hasGeoKey)
    .map((spec) => createSpec(spec.fields, spec))

  const visited = new Set<number>()

  const walk = (owner: SchemaDescriptor, prefix: string): void => {
    if (visited.has(owner.id)) return
    visited.add(owner.id)

    for (const bound of owner.fields.values()) {
      const inner = innermostField(bound.descriptor)
      const path = prefix + bound.storageKey

      if (inner.kind === 'geoPoint') {
        const spec = createSpec([[path, GEO2D]])
        if (!result.some((existing) => keysEqual(existing.fields, spec.fields))) {
          result.push(spec)
        }
      } else if (inner.kind === 'embedded') {
        walk(registry.resolveRef(inner.target, owner), `${path}.`)
      }
    }
  }

  walk(schema, '')
  return result
}
