/**
 * @file Index Declaration Normalizer
 *
 * Converts one authored index declaration into a canonical index spec.
 *
 * Accepted shapes:
 * - `'date'`, `'-date'`, `'+date'`, `'*location'` (ascending, descending,
 *   explicit ascending, geospatial 2d)
 * - `['date', -1]`: a two-element tuple whose second element is a direction
 *   token is one explicit (path, direction) pair
 * - `['category', '-date']`: compound, each entry a prefixed string or pair
 * - `{ fields: [...], unique, sparse, expireAfterSeconds, background, name, cls }`
 *
 * @module docmap/indexes/normalizer
 */

import { InvalidIndexDeclarationError } from '../errors.js'
import { formatIssues, indexDeclarationRecordSchema } from '../schema/meta.js'
import type { SchemaDescriptor, SchemaRegistry } from '../schema/registry.js'
import {
  ASCENDING,
  DESCENDING,
  GEO2D,
  isIndexDirection,
  type CanonicalIndexSpec,
  type IndexDirection,
  type IndexKey,
  type RawIndexDeclaration,
} from '../types/index.js'
import { resolveFieldPath } from './field-path.js'
import { createSpec, type SpecOptions } from './spec.js'

// =============================================================================
// Types
// =============================================================================

/**
 * One field of a declaration before path resolution.
 */
export interface DeclaredIndexField {
  path: string
  direction: IndexDirection
}

/**
 * A raw declaration classified by shape.
 */
export type ParsedIndexDeclaration =
  | { kind: 'field'; field: DeclaredIndexField }
  | { kind: 'directed'; field: DeclaredIndexField }
  | { kind: 'compound'; fields: DeclaredIndexField[] }
  | { kind: 'record'; fields: DeclaredIndexField[]; options: SpecOptions }

/**
 * Failure while parsing, before the schema name is known.
 */
class DeclarationShapeError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'DeclarationShapeError'
  }
}

// =============================================================================
// Parsing
// =============================================================================

const PREFIX_DIRECTIONS: Record<string, IndexDirection> = {
  '-': DESCENDING,
  '+': ASCENDING,
  '*': GEO2D,
}

function isPrefix(char: string | undefined): char is string {
  return char !== undefined && Object.hasOwn(PREFIX_DIRECTIONS, char)
}

/**
 * Parses `'-date'` style strings.
 */
function parsePrefixed(value: string): DeclaredIndexField {
  const first = value.charAt(0)
  if (!isPrefix(first)) {
    if (value === '') {
      throw new DeclarationShapeError('empty field path')
    }
    return { path: value, direction: ASCENDING }
  }

  const path = value.slice(1)
  if (path === '') {
    throw new DeclarationShapeError(`prefix '${first}' without a field path`)
  }
  if (isPrefix(path.charAt(0))) {
    throw new DeclarationShapeError(`prefixes '${first}' and '${path.charAt(0)}' are mutually exclusive`)
  }
  return { path, direction: PREFIX_DIRECTIONS[first] }
}

function isDirectedPair(value: readonly unknown[]): value is [string, IndexDirection] {
  return value.length === 2 && typeof value[0] === 'string' && isIndexDirection(value[1])
}

function parseEntry(entry: unknown): DeclaredIndexField {
  if (typeof entry === 'string') {
    return parsePrefixed(entry)
  }
  if (Array.isArray(entry) && isDirectedPair(entry)) {
    const [path, direction] = entry
    if (path === '') {
      throw new DeclarationShapeError('empty field path')
    }
    return { path, direction }
  }
  throw new DeclarationShapeError(
    `compound entries must be field paths or [path, direction] pairs, got ${JSON.stringify(entry)}`
  )
}

/**
 * Classifies a raw declaration into its tagged shape.
 *
 * @throws InvalidIndexDeclarationError for anything that is not a valid shape
 */
export function parseIndexDeclaration(schemaName: string, raw: RawIndexDeclaration): ParsedIndexDeclaration {
  try {
    return parseShape(raw)
  } catch (error) {
    if (error instanceof DeclarationShapeError) {
      throw new InvalidIndexDeclarationError(schemaName, raw, error.message)
    }
    throw error
  }
}

function parseShape(raw: unknown): ParsedIndexDeclaration {
  if (typeof raw === 'string') {
    return { kind: 'field', field: parsePrefixed(raw) }
  }

  if (Array.isArray(raw)) {
    if (raw.length === 0) {
      throw new DeclarationShapeError('compound index without fields')
    }
    if (isDirectedPair(raw)) {
      return { kind: 'directed', field: parseEntry(raw) }
    }
    return { kind: 'compound', fields: raw.map(parseEntry) }
  }

  if (typeof raw === 'object' && raw !== null) {
    if (!('fields' in raw)) {
      throw new DeclarationShapeError("index options record is missing 'fields'")
    }
    const result = indexDeclarationRecordSchema.safeParse(raw)
    if (!result.success) {
      throw new DeclarationShapeError(formatIssues(result.error))
    }
    const { fields, ...options } = result.data
    return { kind: 'record', fields: fields.map(parseEntry), options }
  }

  throw new DeclarationShapeError('expected a field path, a list of fields or an options record')
}

// =============================================================================
// Normalization
// =============================================================================

function declaredFields(parsed: ParsedIndexDeclaration): DeclaredIndexField[] {
  switch (parsed.kind) {
    case 'field':
    case 'directed':
      return [parsed.field]
    case 'compound':
    case 'record':
      return parsed.fields
  }
}

/**
 * Normalizes one declaration of `schema` into a canonical spec. Discriminator
 * prefixing is not applied here; see the inheritance merger.
 *
 * @throws InvalidIndexDeclarationError for malformed declarations
 * @throws FieldPathResolutionError for paths that do not resolve
 *
 * @example
 * ```typescript
 * normalizeIndexDeclaration(registry, blogPost, ['category', '-date'])
 * // { fields: [['category', 1], ['addDate', -1]] }
 * ```
 */
export function normalizeIndexDeclaration(
  registry: SchemaRegistry,
  schema: SchemaDescriptor,
  raw: RawIndexDeclaration
): CanonicalIndexSpec {
  const parsed = parseIndexDeclaration(schema.name, raw)
  const declared = declaredFields(parsed)

  if (declared.length > 1 && declared.some(({ direction }) => direction === GEO2D)) {
    throw new InvalidIndexDeclarationError(
      schema.name,
      raw,
      'a geospatial marker is only allowed on a single-field index'
    )
  }

  const keys: IndexKey[] = []
  for (const { path, direction } of declared) {
    const { storageKey } = resolveFieldPath(registry, schema, path)
    if (keys.some(([key]) => key === storageKey)) {
      throw new InvalidIndexDeclarationError(schema.name, raw, `'${storageKey}' appears more than once`)
    }
    keys.push([storageKey, direction])
  }

  return createSpec(keys, parsed.kind === 'record' ? parsed.options : {})
}
