/**
 * @file Field Descriptors
 *
 * Declarative field descriptors consumed by the schema registry. Only the
 * parts that matter for storage keys, embedding and uniqueness are modelled.
 *
 * @example
 * ```typescript
 * const fields = {
 *   title: field.string({ uniqueWith: 'date.year' }),
 *   date: field.embedded('DateParts'),
 *   tags: field.list(field.embedded('Tag')),
 *   author: field.reference('User'),
 * }
 * ```
 *
 * @module docmap/schema/fields
 */

import type { SchemaDescriptor } from './registry.js'

// =============================================================================
// Types
// =============================================================================

export type ScalarFieldKind =
  | 'string'
  | 'int'
  | 'float'
  | 'boolean'
  | 'datetime'
  | 'objectId'
  | 'dict'
  | 'geoPoint'

export type FieldKind = ScalarFieldKind | 'list' | 'embedded' | 'reference'

/**
 * A target schema: its registered name, its descriptor, or `'self'` for the
 * schema that owns the field.
 */
export type SchemaRef = string | SchemaDescriptor

export interface FieldOptions {
  /** Storage key; defaults to the field name */
  dbField?: string
  unique?: boolean
  /** Sibling path(s) that make the uniqueness constraint compound */
  uniqueWith?: string | readonly string[]
  sparse?: boolean
  primaryKey?: boolean
  required?: boolean
}

export interface ScalarField extends FieldOptions {
  kind: ScalarFieldKind
}

export interface ListField extends FieldOptions {
  kind: 'list'
  of: FieldDescriptor
}

export interface EmbeddedField extends FieldOptions {
  kind: 'embedded'
  target: SchemaRef
}

export interface ReferenceField extends FieldOptions {
  kind: 'reference'
  target: SchemaRef
}

export type FieldDescriptor = ScalarField | ListField | EmbeddedField | ReferenceField

/**
 * A field after registration, with its name and storage key fixed.
 */
export interface BoundField {
  name: string
  storageKey: string
  descriptor: FieldDescriptor
}

// =============================================================================
// Builders
// =============================================================================

function scalar(kind: ScalarFieldKind) {
  return (options: FieldOptions = {}): ScalarField => ({ ...options, kind })
}

export const field = {
  string: scalar('string'),
  int: scalar('int'),
  float: scalar('float'),
  boolean: scalar('boolean'),
  dateTime: scalar('datetime'),
  objectId: scalar('objectId'),
  dict: scalar('dict'),
  geoPoint: scalar('geoPoint'),
  list: (of: FieldDescriptor, options: FieldOptions = {}): ListField => ({
    ...options,
    kind: 'list',
    of,
  }),
  embedded: (target: SchemaRef, options: FieldOptions = {}): EmbeddedField => ({
    ...options,
    kind: 'embedded',
    target,
  }),
  reference: (target: SchemaRef, options: FieldOptions = {}): ReferenceField => ({
    ...options,
    kind: 'reference',
    target,
  }),
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Unwraps nested lists down to the element field.
 */
export function innermostField(descriptor: FieldDescriptor): FieldDescriptor {
  let current = descriptor
  while (current.kind === 'list') {
    current = current.of
  }
  return current
}

/**
 * Returns the embedded target of a field or list-of-embedded field.
 */
export function embeddedTarget(descriptor: FieldDescriptor): SchemaRef | undefined {
  const inner = innermostField(descriptor)
  return inner.kind === 'embedded' ? inner.target : undefined
}

/**
 * Normalizes `uniqueWith` to a list.
 */
export function uniqueWithPaths(descriptor: FieldDescriptor): readonly string[] {
  const { uniqueWith } = descriptor
  if (uniqueWith === undefined) return []
  return typeof uniqueWith === 'string' ? [uniqueWith] : uniqueWith
}
