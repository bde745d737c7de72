/**
 * @file Backing Store Client
 *
 * The store operations the mapper needs, and an implementation over a
 * JSON-RPC client speaking the `listIndexes` / `createIndex` / `insertOne`
 * methods.
 *
 * @example
 * ```typescript
 * const store = createRpcBackingStore({ rpcClient, database: 'blog' })
 * await store.createIndex('blog_post', { fields: [['slug', 1]], unique: true })
 * ```
 *
 * @module docmap/store/backing-store
 */

import { z } from 'zod'
import { OperationError } from '../errors.js'
import { indexNameOf } from '../indexes/spec.js'
import type { CanonicalIndexSpec, LiveCatalogEntry } from '../types/index.js'
import { classifyStoreError } from './write-errors.js'

// =============================================================================
// Types
// =============================================================================

/**
 * Operations consumed from the backing store.
 */
export interface BackingStoreClient {
  /** Indexes currently on the collection; empty when it does not exist */
  listIndexes(collection: string): Promise<LiveCatalogEntry[]>
  /**
   * Creates an index and resolves to its name. Creating an index identical
   * to an existing one must succeed without effect.
   */
  createIndex(collection: string, spec: Readonly<CanonicalIndexSpec>): Promise<string>
  insertOne(collection: string, document: Record<string, unknown>): Promise<void>
}

export interface RpcClient {
  rpc: (method: string, params: unknown) => Promise<unknown>
  isConnected?: () => boolean
}

export interface RpcBackingStoreConfig {
  rpcClient: RpcClient
  database: string
}

// =============================================================================
// Wire Schemas
// =============================================================================

const catalogEntrySchema = z
  .object({
    name: z.string(),
    key: z.record(z.union([z.number(), z.string()])),
    unique: z.boolean().optional(),
    sparse: z.boolean().optional(),
    expireAfterSeconds: z.number().optional(),
  })
  .passthrough()

const listIndexesResponseSchema = z.array(catalogEntrySchema)

const createIndexResponseSchema = z.union([
  z.string(),
  z.object({ name: z.string() }).passthrough(),
  z.undefined(),
  z.null(),
])

// =============================================================================
// RPC Implementation
// =============================================================================

/**
 * Creates a backing store over a JSON-RPC client.
 *
 * @throws Error when the client or database is missing
 */
export function createRpcBackingStore(config: RpcBackingStoreConfig): BackingStoreClient {
  if (!config.rpcClient) {
    throw new Error('rpcClient is required')
  }
  if (!config.database) {
    throw new Error('database is required')
  }

  const { rpcClient, database } = config

  const call = async (method: string, params: Record<string, unknown>): Promise<unknown> => {
    if (rpcClient.isConnected && !rpcClient.isConnected()) {
      throw new OperationError('RPC client is not connected')
    }
    return rpcClient.rpc(method, { database, ...params })
  }

  return {
    async listIndexes(collection) {
      let response: unknown
      try {
        response = await call('listIndexes', { collection })
      } catch (error) {
        if (classifyStoreError(error).type === 'namespace_not_found') {
          return []
        }
        throw error
      }

      const parsed = listIndexesResponseSchema.safeParse(response)
      if (!parsed.success) {
        throw new OperationError(`Malformed listIndexes response for collection '${collection}'`, {
          cause: parsed.error,
        })
      }

      return parsed.data.map((entry) => ({
        name: entry.name,
        // key order is the index order; stores return it insertion-ordered
        key: Object.entries(entry.key),
        ...(entry.unique !== undefined && { unique: entry.unique }),
        ...(entry.sparse !== undefined && { sparse: entry.sparse }),
        ...(entry.expireAfterSeconds !== undefined && { expireAfterSeconds: entry.expireAfterSeconds }),
      }))
    },

    async createIndex(collection, spec) {
      const name = indexNameOf(spec)
      const response = await call('createIndex', {
        collection,
        keys: Object.fromEntries(spec.fields),
        options: {
          name,
          ...(spec.unique && { unique: true }),
          ...(spec.sparse && { sparse: true }),
          ...(spec.background && { background: true }),
          ...(spec.expireAfterSeconds !== undefined && { expireAfterSeconds: spec.expireAfterSeconds }),
        },
      })

      const parsed = createIndexResponseSchema.safeParse(response)
      if (parsed.success && parsed.data !== undefined && parsed.data !== null) {
        return typeof parsed.data === 'string' ? parsed.data : parsed.data.name
      }
      return name
    },

    async insertOne(collection, document) {
      await call('insertOne', { collection, document })
    },
  }
}
