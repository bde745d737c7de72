/**
 * @file Index Reconciler
 *
 * Makes the live index catalog of a schema's collection a superset of the
 * schema's canonical specs. Creates what is missing, in order; never drops.
 *
 * The check-then-create sequence is not atomic. Two callers reconciling the
 * same collection may both try to create an index; the store treats an
 * identical create as a no-op, and an "already exists" reply is counted as
 * satisfied here.
 *
 * @module docmap/provisioning/index-setup
 */

import { ReconciliationError, SchemaConfigurationError } from '../errors.js'
import { DISCRIMINATOR_KEY } from '../indexes/field-path.js'
import { collectGeoIndexes } from '../indexes/geo.js'
import { createSpec, indexNameOf, keysEqual } from '../indexes/spec.js'
import { resolveLogger, type OdmLogger } from '../logger.js'
import type { SchemaDescriptor, SchemaRegistry } from '../schema/registry.js'
import type { BackingStoreClient } from '../store/backing-store.js'
import { classifyStoreError } from '../store/write-errors.js'
import { ASCENDING, type CanonicalIndexSpec, type LiveCatalogEntry } from '../types/index.js'

// =============================================================================
// Types
// =============================================================================

export interface IndexSetupHooks {
  onBeforeCreate?: (info: IndexHookInfo) => void
  onAfterCreate?: (info: IndexHookInfo) => void
  onError?: (info: IndexErrorInfo) => void
  onComplete?: (summary: IndexCompleteSummary) => void
}

export interface IndexHookInfo {
  collection: string
  indexName: string
  index: Readonly<CanonicalIndexSpec>
}

export interface IndexErrorInfo extends IndexHookInfo {
  error: Error
}

export interface IndexCompleteSummary {
  success: boolean
  collection: string
  indexesCreated: number
  indexesSatisfied: number
}

/**
 * Connection-scoped collaborators and settings for reconciliation.
 */
export interface ReconcileContext {
  registry: SchemaRegistry
  store: BackingStoreClient
  /** Connection-level switch for automatic index creation */
  autoCreateIndex: boolean
  logger?: OdmLogger
  hooks?: IndexSetupHooks
}

export interface ReconcileOptions {
  /**
   * Reconcile even when automatic index creation is disabled. Explicit
   * `ensureIndexes` calls set this; automatic reconciliation does not.
   */
  force?: boolean
}

export interface ReconcileResult {
  collection: string
  /** True when automatic creation is disabled and nothing was checked */
  skipped: boolean
  /** Names of the indexes created by this call */
  created: string[]
  /** Names of the indexes that already existed */
  satisfied: string[]
}

// =============================================================================
// Planning
// =============================================================================

/**
 * Whether a live index already provides a spec: same key sequence and the
 * same uniqueness, sparseness and expiry.
 */
export function catalogSatisfies(entry: LiveCatalogEntry, spec: Readonly<CanonicalIndexSpec>): boolean {
  return (
    keysEqual(entry.key, spec.fields) &&
    (entry.unique ?? false) === (spec.unique ?? false) &&
    (entry.sparse ?? false) === (spec.sparse ?? false) &&
    entry.expireAfterSeconds === spec.expireAfterSeconds
  )
}

/**
 * All indexes reconciliation should guarantee for a schema: its canonical
 * specs, a standalone discriminator index when a polymorphic schema has no
 * index leading with `_cls`, and its geospatial indexes.
 */
export function planIndexes(registry: SchemaRegistry, schema: SchemaDescriptor): Readonly<CanonicalIndexSpec>[] {
  const planned: Readonly<CanonicalIndexSpec>[] = [...registry.compileIndexSpecs(schema)]

  if (
    schema.polymorphic &&
    schema.meta.indexCls &&
    !planned.some((spec) => spec.fields[0]?.[0] === DISCRIMINATOR_KEY)
  ) {
    planned.push(createSpec([[DISCRIMINATOR_KEY, ASCENDING]]))
  }

  for (const geo of collectGeoIndexes(registry, schema)) {
    if (!planned.some((spec) => keysEqual(spec.fields, geo.fields))) {
      planned.push(geo)
    }
  }

  return planned
}

// =============================================================================
// Reconciliation
// =============================================================================

/**
 * Reconciles the indexes of one schema against its collection.
 *
 * @throws SchemaConfigurationError for abstract and embedded schemas
 * @throws ReconciliationError when the store rejects a creation; remaining
 *   creations are not attempted
 *
 * @example
 * ```typescript
 * const result = await reconcileIndexes(person, { registry, store, autoCreateIndex: true })
 * result.created // ['_cls_1_user_guid_1', '_cls_1_name_1']
 * ```
 */
export async function reconcileIndexes(
  schema: SchemaDescriptor,
  context: ReconcileContext,
  options: ReconcileOptions = {}
): Promise<ReconcileResult> {
  const { registry, store, hooks } = context
  const logger = resolveLogger(context.logger)
  const collection = schema.collection

  if (collection === undefined) {
    throw new SchemaConfigurationError(
      schema.name,
      `${schema.meta.abstract ? 'abstract' : schema.kind} schemas have no collection to index`
    )
  }

  const enabled = context.autoCreateIndex && schema.meta.autoCreateIndex
  if (!enabled && !options.force) {
    logger.debug('Automatic index creation disabled, skipping', { collection, schema: schema.name })
    return { collection, skipped: true, created: [], satisfied: [] }
  }

  const planned = planIndexes(registry, schema)
  const catalog = await store.listIndexes(collection)
  logger.debug('Read index catalog', { collection, existing: catalog.map((entry) => entry.name) })

  const created: string[] = []
  const satisfied: string[] = []

  const complete = (success: boolean): void => {
    hooks?.onComplete?.({
      success,
      collection,
      indexesCreated: created.length,
      indexesSatisfied: satisfied.length,
    })
  }

  for (const index of planned) {
    const indexName = indexNameOf(index)

    if (catalog.some((entry) => catalogSatisfies(entry, index))) {
      satisfied.push(indexName)
      continue
    }

    hooks?.onBeforeCreate?.({ collection, indexName, index })

    try {
      const name = await store.createIndex(collection, index)
      created.push(name)
      logger.info('Created index', { collection, index: name })
      hooks?.onAfterCreate?.({ collection, indexName: name, index })
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error))

      if (classifyStoreError(err).type === 'index_exists') {
        satisfied.push(indexName)
        logger.debug('Index created concurrently, treating as satisfied', { collection, index: indexName })
        continue
      }

      hooks?.onError?.({ collection, indexName, index, error: err })
      logger.error('Failed to create index', { collection, index: indexName, error: err.message })
      complete(false)
      throw new ReconciliationError(collection, indexName, index, err)
    }
  }

  complete(true)
  return { collection, skipped: false, created, satisfied }
}
