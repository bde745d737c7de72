/**
 * @file Inheritance Merger
 *
 * Merges the normalized index specs of a schema's ancestor chain (abstract
 * ancestors included) with its own, then applies the discriminator prefix
 * for polymorphic storage.
 *
 * @module docmap/indexes/inheritance
 */

import { ASCENDING, type CanonicalIndexSpec } from '../types/index.js'
import { DISCRIMINATOR_KEY } from './field-path.js'
import { appendDistinct, hasGeoKey } from './spec.js'

// =============================================================================
// Types
// =============================================================================

export interface MergeOptions {
  /** Whether the schema shares its collection with other schemas */
  polymorphic: boolean
}

// =============================================================================
// Discriminator Prefixing
// =============================================================================

/**
 * Puts `_cls` first in the key sequence.
 *
 * Left untouched: specs with a geospatial key (the special key has to come
 * first), specs declared with `cls: false`, and specs that already contain
 * `_cls`.
 */
export function withDiscriminator(spec: CanonicalIndexSpec): CanonicalIndexSpec {
  if (spec.cls === false || hasGeoKey(spec) || spec.fields.some(([key]) => key === DISCRIMINATOR_KEY)) {
    return spec
  }
  return { ...spec, fields: [[DISCRIMINATOR_KEY, ASCENDING], ...spec.fields] }
}

// =============================================================================
// Merge
// =============================================================================

/**
 * Merges per-schema spec lists given oldest ancestor first and the schema
 * itself last.
 *
 * Specs are de-duplicated by canonical equality in first-seen order, prefixed
 * once, then de-duplicated again since prefixing can make two specs equal.
 *
 * @example
 * ```typescript
 * mergeInheritedSpecs(
 *   [[{ fields: [['user_guid', 1]] }], [{ fields: [['name', 1]] }]],
 *   { polymorphic: true }
 * )
 * // [
 * //   { fields: [['_cls', 1], ['user_guid', 1]] },
 * //   { fields: [['_cls', 1], ['name', 1]] },
 * // ]
 * ```
 */
export function mergeInheritedSpecs(
  chain: readonly (readonly CanonicalIndexSpec[])[],
  options: MergeOptions
): CanonicalIndexSpec[] {
  const merged: CanonicalIndexSpec[] = []
  for (const specs of chain) {
    appendDistinct(merged, specs)
  }

  if (!options.polymorphic) {
    return merged
  }

  return appendDistinct([], merged.map(withDiscriminator))
}
