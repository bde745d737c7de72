/**
 * @file Canonical Spec Helpers
 *
 * Construction, equality and naming of canonical index specs.
 *
 * @module docmap/indexes/spec
 */

import { generateIndexName } from '../provisioning/naming-conventions.js'
import {
  GEO2D,
  type CanonicalIndexSpec,
  type CanonicalIndexSpecList,
  type CatalogKey,
  type IndexKey,
} from '../types/index.js'

/**
 * Options a spec may carry, in the loose form accepted by {@link createSpec}.
 */
export interface SpecOptions {
  unique?: boolean
  sparse?: boolean
  expireAfterSeconds?: number
  background?: boolean
  name?: string
  cls?: boolean
}

/**
 * Builds a spec with a fixed property order, dropping `false` booleans and
 * absent options so that equal specs serialize identically.
 */
export function createSpec(fields: readonly IndexKey[], options: SpecOptions = {}): CanonicalIndexSpec {
  const spec: CanonicalIndexSpec = { fields: fields.map(([key, direction]): IndexKey => [key, direction]) }
  if (options.unique) spec.unique = true
  if (options.sparse) spec.sparse = true
  if (options.expireAfterSeconds !== undefined) spec.expireAfterSeconds = options.expireAfterSeconds
  if (options.background) spec.background = true
  if (options.name !== undefined) spec.name = options.name
  if (options.cls === false) spec.cls = false
  return spec
}

/**
 * Compares two key sequences position by position.
 */
export function keysEqual(a: readonly CatalogKey[], b: readonly CatalogKey[]): boolean {
  return a.length === b.length && a.every(([key, direction], i) => key === b[i][0] && direction === b[i][1])
}

/**
 * Canonical equality: same key sequence and same options.
 */
export function specsEqual(a: Readonly<CanonicalIndexSpec>, b: Readonly<CanonicalIndexSpec>): boolean {
  return (
    keysEqual(a.fields, b.fields) &&
    a.unique === b.unique &&
    a.sparse === b.sparse &&
    a.expireAfterSeconds === b.expireAfterSeconds &&
    a.background === b.background &&
    a.name === b.name &&
    a.cls === b.cls
  )
}

/**
 * Appends specs that are not already present, keeping first-seen order.
 */
export function appendDistinct(target: CanonicalIndexSpec[], specs: Iterable<CanonicalIndexSpec>): CanonicalIndexSpec[] {
  for (const spec of specs) {
    if (!target.some((existing) => specsEqual(existing, spec))) {
      target.push(spec)
    }
  }
  return target
}

export function hasGeoKey(spec: Readonly<CanonicalIndexSpec>): boolean {
  return spec.fields.some(([, direction]) => direction === GEO2D)
}

/**
 * Name the index gets on the store.
 */
export function indexNameOf(spec: Readonly<CanonicalIndexSpec>): string {
  return spec.name ?? generateIndexName(spec.fields)
}

/**
 * Freezes a spec list, its specs and their key pairs.
 */
export function freezeSpecList(specs: CanonicalIndexSpec[]): CanonicalIndexSpecList {
  for (const spec of specs) {
    for (const key of spec.fields) {
      Object.freeze(key)
    }
    Object.freeze(spec.fields)
    Object.freeze(spec)
  }
  return Object.freeze(specs)
}
