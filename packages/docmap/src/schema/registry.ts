/**
 * @file Schema Registry
 *
 * Arena of schema descriptors. Each descriptor is built once when its schema
 * is defined, links to its parent by arena id, and is immutable afterwards;
 * the only state that changes later is the cached canonical index list.
 *
 * Defining a schema compiles its index specs immediately, so malformed
 * declarations and unresolvable paths fail at definition time and leave the
 * registry unchanged. For the same reason, embedded and referenced targets
 * must be defined before the schemas that use them; `'self'` is the only way
 * to form a cycle.
 *
 * @example
 * ```typescript
 * const registry = new SchemaRegistry()
 *
 * registry.defineEmbedded('Rank', { fields: { title: field.string() } })
 * const person = registry.defineDocument('Person', {
 *   fields: { name: field.string(), rank: field.embedded('Rank') },
 *   meta: { indexes: ['rank.title'], allowInheritance: false },
 * })
 *
 * registry.compileIndexSpecs(person) // [{ fields: [['rank.title', 1]] }]
 * ```
 *
 * @module docmap/schema/registry
 */

import { SchemaConfigurationError } from '../errors.js'
import { compileSchemaIndexes } from '../indexes/compiler.js'
import { PRIMARY_KEY, validatePathSegment } from '../indexes/field-path.js'
import { defaultCollectionName, validateCollectionName } from '../provisioning/naming-conventions.js'
import type { CanonicalIndexSpecList } from '../types/index.js'
import type { BoundField, FieldDescriptor, SchemaRef } from './fields.js'
import { DEFAULT_META, formatIssues, schemaMetaSchema, type ResolvedMeta, type SchemaMeta } from './meta.js'

// =============================================================================
// Types
// =============================================================================

export type SchemaKind = 'document' | 'embedded'

/**
 * One node of the schema graph.
 */
export interface SchemaDescriptor {
  /** Arena id; stable for the lifetime of the registry */
  readonly id: number
  readonly name: string
  readonly kind: SchemaKind
  readonly parentId?: number
  /** Own and inherited fields by name, ancestors' fields first */
  readonly fields: ReadonlyMap<string, BoundField>
  /** Resolved options; `indexes` holds only this schema's own declarations */
  readonly meta: ResolvedMeta
  /** Whether documents carry a `_cls` discriminator in a shared collection */
  readonly polymorphic: boolean
  /** Primary-key field of a document schema */
  readonly primaryKey?: BoundField
  /** Discriminator value, e.g. `BlogPost.ExtendedBlogPost` */
  readonly className: string
  /** Backing collection; absent for abstract and embedded schemas */
  readonly collection?: string
  /** `meta.collection` as declared, inherited by concrete subclasses */
  readonly declaredCollection?: string
}

export interface SchemaDefinition {
  /** Parent schema of the same kind */
  extends?: SchemaRef
  fields?: Record<string, FieldDescriptor>
  meta?: SchemaMeta
}

/**
 * The target used by embedded fields to embed their own schema.
 */
export const SELF = 'self'

const IMPLICIT_ID_FIELD = 'id'

// =============================================================================
// Registry
// =============================================================================

export class SchemaRegistry {
  #arena: SchemaDescriptor[] = []
  #byName = new Map<string, number>()
  #indexSpecs = new Map<number, CanonicalIndexSpecList>()

  /**
   * Defines a top-level document schema.
   *
   * @throws SchemaConfigurationError (or a subclass) when the definition is invalid
   */
  defineDocument(name: string, definition: SchemaDefinition = {}): SchemaDescriptor {
    return this.#define(name, 'document', definition)
  }

  /**
   * Defines an embedded document schema. Schemas it embeds must already be
   * defined, apart from `'self'`.
   *
   * @throws SchemaConfigurationError (or a subclass) when the definition is invalid
   */
  defineEmbedded(name: string, definition: SchemaDefinition = {}): SchemaDescriptor {
    return this.#define(name, 'embedded', definition)
  }

  has(name: string): boolean {
    return this.#byName.has(name)
  }

  /**
   * Looks up a registered schema by name or descriptor.
   */
  get(ref: SchemaRef): SchemaDescriptor {
    if (typeof ref !== 'string') {
      if (this.#arena[ref.id] !== ref) {
        throw new SchemaConfigurationError(ref.name, 'schema belongs to a different registry')
      }
      return ref
    }

    const id = this.#byName.get(ref)
    if (id === undefined) {
      throw new SchemaConfigurationError(ref, 'no schema with this name is defined')
    }
    return this.#arena[id]
  }

  /**
   * Resolves a field target, where `'self'` means the owning schema.
   */
  resolveRef(ref: SchemaRef, owner: SchemaDescriptor): SchemaDescriptor {
    return ref === SELF ? owner : this.get(ref)
  }

  parentOf(schema: SchemaDescriptor): SchemaDescriptor | undefined {
    return schema.parentId === undefined ? undefined : this.#arena[schema.parentId]
  }

  /**
   * Ancestors of a schema, oldest first, excluding the schema itself.
   */
  ancestors(schema: SchemaDescriptor): SchemaDescriptor[] {
    const chain: SchemaDescriptor[] = []
    for (let parent = this.parentOf(schema); parent !== undefined; parent = this.parentOf(parent)) {
      chain.unshift(parent)
    }
    return chain
  }

  /**
   * Canonical index specs of a schema, compiled once and cached.
   */
  compileIndexSpecs(ref: SchemaRef): CanonicalIndexSpecList {
    const schema = this.get(ref)
    const cached = this.#indexSpecs.get(schema.id)
    if (cached !== undefined) {
      return cached
    }

    const specs = compileSchemaIndexes(this, schema)
    this.#indexSpecs.set(schema.id, specs)
    return specs
  }

  // ---------------------------------------------------------------------------
  // Definition
  // ---------------------------------------------------------------------------

  #define(name: string, kind: SchemaKind, definition: SchemaDefinition): SchemaDescriptor {
    if (name === '' || name === SELF || name.includes('.')) {
      throw new SchemaConfigurationError(name, 'invalid schema name')
    }
    if (this.#byName.has(name)) {
      throw new SchemaConfigurationError(name, 'a schema with this name is already defined')
    }

    const metaResult = schemaMetaSchema.safeParse(definition.meta ?? {})
    if (!metaResult.success) {
      throw new SchemaConfigurationError(name, `invalid meta: ${formatIssues(metaResult.error)}`)
    }

    const parent = definition.extends === undefined ? undefined : this.get(definition.extends)
    const chain = parent === undefined ? [] : [...this.ancestors(parent), parent]
    const declared = definition.meta ?? {}
    const meta = resolveMeta(name, kind, declared, parent, chain)
    const { fields, primaryKey } = this.#bindFields(name, kind, definition.fields ?? {}, parent)

    const className = [...chain.filter((member) => !member.meta.abstract), { name }]
      .map((member) => member.name)
      .join('.')

    const descriptor: SchemaDescriptor = Object.freeze({
      id: this.#arena.length,
      name,
      kind,
      parentId: parent?.id,
      fields,
      meta,
      polymorphic: kind === 'document' && meta.allowInheritance,
      primaryKey,
      className,
      collection: resolveCollection(name, kind, meta, declared, chain),
      declaredCollection: declared.collection,
    })

    this.#arena.push(descriptor)
    this.#byName.set(name, descriptor.id)

    try {
      this.compileIndexSpecs(descriptor)
    } catch (error) {
      this.#arena.pop()
      this.#byName.delete(name)
      this.#indexSpecs.delete(descriptor.id)
      throw error
    }

    return descriptor
  }

  #bindFields(
    schemaName: string,
    kind: SchemaKind,
    own: Record<string, FieldDescriptor>,
    parent: SchemaDescriptor | undefined
  ): { fields: Map<string, BoundField>; primaryKey?: BoundField } {
    const fields = new Map<string, BoundField>(parent?.fields)
    let primaryKey = parent?.primaryKey

    for (const [fieldName, descriptor] of Object.entries(own)) {
      if (fieldName.includes('.') || validatePathSegment(fieldName) !== undefined) {
        throw new SchemaConfigurationError(schemaName, `invalid field name '${fieldName}'`)
      }

      let storageKey = descriptor.dbField ?? fieldName
      if (descriptor.primaryKey) {
        if (kind === 'embedded') {
          throw new SchemaConfigurationError(schemaName, `embedded field '${fieldName}' cannot be a primary key`)
        }
        if (primaryKey !== undefined) {
          throw new SchemaConfigurationError(schemaName, `primary key '${fieldName}' cannot replace an existing primary key`)
        }
        if (descriptor.dbField !== undefined && descriptor.dbField !== PRIMARY_KEY) {
          throw new SchemaConfigurationError(schemaName, `primary key '${fieldName}' must be stored as '${PRIMARY_KEY}'`)
        }
        storageKey = PRIMARY_KEY
      }

      const reason = storageKey.includes('.') ? 'contains a dot' : validatePathSegment(storageKey)
      if (reason !== undefined) {
        throw new SchemaConfigurationError(schemaName, `invalid storage key '${storageKey}' for field '${fieldName}': ${reason}`)
      }

      const bound: BoundField = { name: fieldName, storageKey, descriptor }
      fields.set(fieldName, bound)
      if (descriptor.primaryKey) {
        primaryKey = bound
      }
    }

    if (kind === 'document' && primaryKey === undefined) {
      if (fields.has(IMPLICIT_ID_FIELD)) {
        throw new SchemaConfigurationError(
          schemaName,
          `field '${IMPLICIT_ID_FIELD}' is reserved for the primary key unless declared with primaryKey`
        )
      }
      primaryKey = { name: IMPLICIT_ID_FIELD, storageKey: PRIMARY_KEY, descriptor: { kind: 'objectId' } }
      fields.set(IMPLICIT_ID_FIELD, primaryKey)
    }

    const seen = new Map<string, string>()
    for (const bound of fields.values()) {
      const other = seen.get(bound.storageKey)
      if (other !== undefined) {
        throw new SchemaConfigurationError(
          schemaName,
          `fields '${other}' and '${bound.name}' share the storage key '${bound.storageKey}'`
        )
      }
      seen.set(bound.storageKey, bound.name)
    }

    return { fields, primaryKey }
  }
}

// =============================================================================
// Helpers
// =============================================================================

function resolveMeta(
  name: string,
  kind: SchemaKind,
  declared: SchemaMeta,
  parent: SchemaDescriptor | undefined,
  chain: readonly SchemaDescriptor[]
): ResolvedMeta {
  if (parent !== undefined) {
    if (parent.kind !== kind) {
      throw new SchemaConfigurationError(name, `cannot extend ${parent.kind} schema ${parent.name}`)
    }
    if (!parent.meta.abstract && !parent.meta.allowInheritance) {
      throw new SchemaConfigurationError(
        name,
        `${parent.name} does not allow inheritance and may not be subclassed`
      )
    }
    // documents in a shared collection all carry the discriminator
    const concreteAncestor = chain.find((member) => !member.meta.abstract)
    if (kind === 'document' && declared.allowInheritance === false && concreteAncestor !== undefined) {
      throw new SchemaConfigurationError(
        name,
        `allowInheritance cannot be turned off below ${concreteAncestor.name}, which shares its collection`
      )
    }
  }

  if (kind === 'embedded' && declared.collection !== undefined) {
    throw new SchemaConfigurationError(name, 'embedded schemas have no collection')
  }

  const inherited = parent?.meta ?? DEFAULT_META
  return {
    indexes: declared.indexes ?? [],
    allowInheritance: declared.allowInheritance ?? inherited.allowInheritance,
    abstract: declared.abstract ?? false,
    autoCreateIndex: declared.autoCreateIndex ?? inherited.autoCreateIndex,
    indexCls: declared.indexCls ?? inherited.indexCls,
    dynamic: declared.dynamic ?? inherited.dynamic,
  }
}

function resolveCollection(
  name: string,
  kind: SchemaKind,
  meta: ResolvedMeta,
  declared: SchemaMeta,
  chain: readonly SchemaDescriptor[]
): string | undefined {
  if (kind === 'embedded' || meta.abstract) {
    return undefined
  }

  const concreteAncestor = [...chain].reverse().find((member) => !member.meta.abstract)
  if (concreteAncestor?.collection !== undefined) {
    if (declared.collection !== undefined && declared.collection !== concreteAncestor.collection) {
      throw new SchemaConfigurationError(
        name,
        `subclasses share the collection '${concreteAncestor.collection}' of ${concreteAncestor.name}`
      )
    }
    return concreteAncestor.collection
  }

  const collection =
    declared.collection ??
    [...chain].reverse().find((member) => member.declaredCollection !== undefined)?.declaredCollection ??
    defaultCollectionName(name)

  const { valid, errors } = validateCollectionName(collection)
  if (!valid) {
    throw new SchemaConfigurationError(name, `invalid collection name '${collection}': ${errors.join('; ')}`)
  }
  return collection
}
