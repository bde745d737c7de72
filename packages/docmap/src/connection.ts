/**
 * @file Connection
 *
 * Connection-scoped context: the schema registry, the backing store, the
 * automatic index creation switch, logging and hooks.
 *
 * Collections are handed out after automatic reconciliation, which runs once
 * per schema per connection. Concurrent first accesses share the same
 * attempt; a failed attempt is forgotten so the next access retries.
 *
 * @example
 * ```typescript
 * const connection = new Connection({
 *   registry,
 *   store: createRpcBackingStore({ rpcClient, database: 'blog' }),
 *   autoCreateIndex: true,
 * })
 *
 * const posts = await connection.collection('BlogPost')
 * await posts.insertOne({ title: 'Hello', slug: 'hello' })
 * ```
 *
 * @module docmap/connection
 */

import { z } from 'zod'
import { SchemaConfigurationError } from './errors.js'
import { DISCRIMINATOR_KEY } from './indexes/field-path.js'
import { collectGeoIndexes } from './indexes/geo.js'
import { resolveLogger, type OdmLogger } from './logger.js'
import {
  reconcileIndexes,
  type IndexSetupHooks,
  type ReconcileContext,
  type ReconcileResult,
} from './provisioning/index-setup.js'
import type { SchemaRef } from './schema/fields.js'
import type { SchemaDescriptor, SchemaRegistry } from './schema/registry.js'
import type { BackingStoreClient } from './store/backing-store.js'
import { toOperationError } from './store/write-errors.js'
import type { CanonicalIndexSpec, CanonicalIndexSpecList } from './types/index.js'

// =============================================================================
// Types
// =============================================================================

export interface ConnectionConfig {
  registry: SchemaRegistry
  store: BackingStoreClient
  /** Connection alias used in log output */
  alias?: string
  /**
   * Reconcile indexes automatically on first collection access.
   * @default true
   */
  autoCreateIndex?: boolean
  logger?: OdmLogger
  hooks?: IndexSetupHooks
}

/**
 * A collection bound to a schema.
 */
export interface DocumentCollection {
  readonly name: string
  readonly schema: SchemaDescriptor
  /**
   * Inserts a document in storage form. Polymorphic schemas get their `_cls`
   * discriminator stamped in.
   *
   * @throws NotUniqueError when a unique index rejects the document
   * @throws OperationError for any other store failure
   */
  insertOne(document: Record<string, unknown>): Promise<void>
}

const connectionOptionsSchema = z.object({
  alias: z.string().min(1).default('default'),
  autoCreateIndex: z.boolean().default(true),
})

// =============================================================================
// Connection
// =============================================================================

export class Connection {
  readonly alias: string
  readonly autoCreateIndex: boolean
  readonly registry: SchemaRegistry

  #store: BackingStoreClient
  #logger: Required<OdmLogger>
  #hooks?: IndexSetupHooks
  #reconciled = new Map<number, Promise<ReconcileResult>>()

  constructor(config: ConnectionConfig) {
    if (!config.registry) {
      throw new Error('registry is required')
    }
    if (!config.store) {
      throw new Error('store is required')
    }

    const options = connectionOptionsSchema.parse({
      alias: config.alias,
      autoCreateIndex: config.autoCreateIndex,
    })

    this.alias = options.alias
    this.autoCreateIndex = options.autoCreateIndex
    this.registry = config.registry
    this.#store = config.store
    this.#logger = resolveLogger(config.logger)
    this.#hooks = config.hooks
  }

  /**
   * Canonical index specs of a schema.
   */
  indexSpecs(ref: SchemaRef): CanonicalIndexSpecList {
    return this.registry.compileIndexSpecs(ref)
  }

  /**
   * Geospatial indexes of a schema.
   */
  geoIndexes(ref: SchemaRef): CanonicalIndexSpec[] {
    return collectGeoIndexes(this.registry, this.registry.get(ref))
  }

  /**
   * Creates every missing index of a schema, regardless of the automatic
   * creation switch.
   */
  async ensureIndexes(ref: SchemaRef): Promise<ReconcileResult> {
    return reconcileIndexes(this.registry.get(ref), this.#context(), { force: true })
  }

  /**
   * Returns the collection of a document schema, reconciling its indexes
   * first unless automatic creation is disabled.
   */
  async collection(ref: SchemaRef): Promise<DocumentCollection> {
    const schema = this.registry.get(ref)
    const name = schema.collection
    if (name === undefined) {
      throw new SchemaConfigurationError(schema.name, 'only concrete document schemas have a collection')
    }

    await this.#autoReconcile(schema)

    const store = this.#store
    return {
      name,
      schema,
      async insertOne(document) {
        const stored = schema.polymorphic && !(DISCRIMINATOR_KEY in document)
          ? { ...document, [DISCRIMINATOR_KEY]: schema.className }
          : document
        try {
          await store.insertOne(name, stored)
        } catch (error) {
          throw toOperationError(error)
        }
      },
    }
  }

  #context(): ReconcileContext {
    return {
      registry: this.registry,
      store: this.#store,
      autoCreateIndex: this.autoCreateIndex,
      logger: this.#logger,
      hooks: this.#hooks,
    }
  }

  #autoReconcile(schema: SchemaDescriptor): Promise<ReconcileResult> {
    const pending = this.#reconciled.get(schema.id)
    if (pending !== undefined) {
      return pending
    }

    this.#logger.debug('Reconciling indexes on first access', { alias: this.alias, schema: schema.name })
    const attempt = reconcileIndexes(schema, this.#context()).catch((error: unknown) => {
      this.#reconciled.delete(schema.id)
      throw error
    })
    this.#reconciled.set(schema.id, attempt)
    return attempt
  }
}
