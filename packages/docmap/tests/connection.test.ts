/**
 * @file Connection Tests
 *
 * Automatic index reconciliation on first collection access, explicit
 * ensureIndexes, and the duplicate-key contract of bound collections.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest'
import { Connection } from '../src/connection.js'
import { NotUniqueError, OperationError, SchemaConfigurationError } from '../src/errors.js'
import { field } from '../src/schema/fields.js'
import { SchemaRegistry } from '../src/schema/registry.js'
import { MemoryBackingStore } from './helpers/memory-store.js'

let registry: SchemaRegistry
let store: MemoryBackingStore

beforeEach(() => {
  registry = new SchemaRegistry()
  store = new MemoryBackingStore()

  registry.defineDocument('BlogPost', {
    fields: { title: field.string(), slug: field.string({ unique: true }) },
    meta: { indexes: ['title'] },
  })
  registry.defineDocument('ExtendedBlogPost', {
    extends: 'BlogPost',
    fields: { summary: field.string() },
  })
  registry.defineDocument('User', {
    fields: { email: field.string({ unique: true }) },
    meta: { allowInheritance: false },
  })
  registry.defineDocument('UserBase', { meta: { abstract: true } })
})

describe('Connection', () => {
  describe('configuration', () => {
    it('applies defaults', () => {
      const connection = new Connection({ registry, store })

      expect(connection.alias).toBe('default')
      expect(connection.autoCreateIndex).toBe(true)
    })

    it('keeps explicit options', () => {
      const connection = new Connection({ registry, store, alias: 'reports', autoCreateIndex: false })

      expect(connection.alias).toBe('reports')
      expect(connection.autoCreateIndex).toBe(false)
    })

    it('rejects an empty alias', () => {
      expect(() => new Connection({ registry, store, alias: '' })).toThrow()
    })
  })

  describe('index specs', () => {
    it('exposes compiled and geospatial specs', () => {
      registry.defineDocument('Place', { fields: { location: field.geoPoint() } })
      const connection = new Connection({ registry, store })

      expect(connection.indexSpecs('User')).toEqual([{ fields: [['email', 1]], unique: true }])
      expect(connection.geoIndexes('Place')).toEqual([{ fields: [['location', '2d']] }])
    })
  })

  describe('collection', () => {
    it('reconciles indexes on first access', async () => {
      const connection = new Connection({ registry, store })

      const posts = await connection.collection('BlogPost')

      expect(posts.name).toBe('blog_post')
      expect(store.indexInformation('blog_post')).toEqual({
        _id_: [['_id', 1]],
        _cls_1_title_1: [
          ['_cls', 1],
          ['title', 1],
        ],
        slug_1: [['slug', 1]],
      })
    })

    it('reconciles once for concurrent first accesses', async () => {
      const listIndexes = vi.spyOn(store, 'listIndexes')
      const connection = new Connection({ registry, store })

      await Promise.all([connection.collection('User'), connection.collection('User')])
      await connection.collection('User')

      expect(listIndexes).toHaveBeenCalledTimes(1)
    })

    it('retries after a failed reconciliation', async () => {
      const listIndexes = vi.spyOn(store, 'listIndexes').mockRejectedValueOnce(new Error('connection reset'))
      const connection = new Connection({ registry, store })

      await expect(connection.collection('User')).rejects.toThrow('connection reset')
      await expect(connection.collection('User')).resolves.toMatchObject({ name: 'user' })
      expect(listIndexes).toHaveBeenCalledTimes(2)
    })

    it('skips reconciliation when automatic creation is disabled', async () => {
      const connection = new Connection({ registry, store, autoCreateIndex: false })

      await connection.collection('User')

      expect(store.indexInformation('user')).toEqual({})
    })

    it('rejects schemas without a collection', async () => {
      const connection = new Connection({ registry, store })

      await expect(connection.collection('UserBase')).rejects.toThrow(SchemaConfigurationError)
    })

    it('reports reconciliation progress through the logger', async () => {
      const logger = { debug: vi.fn() }
      const connection = new Connection({ registry, store, logger })

      await connection.collection('User')

      expect(logger.debug).toHaveBeenCalledWith('Reconciling indexes on first access', {
        alias: 'default',
        schema: 'User',
      })
    })
  })

  describe('ensureIndexes', () => {
    it('creates indexes even when automatic creation is disabled', async () => {
      const connection = new Connection({ registry, store, autoCreateIndex: false })

      const result = await connection.ensureIndexes('User')

      expect(result.created).toEqual(['email_1'])
    })

    it('runs the hooks', async () => {
      const onComplete = vi.fn()
      const connection = new Connection({ registry, store, hooks: { onComplete } })

      await connection.ensureIndexes('User')

      expect(onComplete).toHaveBeenCalledWith({
        success: true,
        collection: 'user',
        indexesCreated: 1,
        indexesSatisfied: 0,
      })
    })
  })

  describe('insertOne', () => {
    it('stamps the discriminator on polymorphic schemas', async () => {
      const connection = new Connection({ registry, store })

      await (await connection.collection('BlogPost')).insertOne({ title: 'Hello', slug: 'hello' })
      await (await connection.collection('ExtendedBlogPost')).insertOne({ title: 'More', slug: 'more' })

      expect(store.documents('blog_post')).toEqual([
        { title: 'Hello', slug: 'hello', _cls: 'BlogPost' },
        { title: 'More', slug: 'more', _cls: 'BlogPost.ExtendedBlogPost' },
      ])
    })

    it('leaves documents of other schemas alone', async () => {
      const connection = new Connection({ registry, store })

      await (await connection.collection('User')).insertOne({ email: 'a@example.com' })

      expect(store.documents('user')).toEqual([{ email: 'a@example.com' }])
    })

    it('raises NotUniqueError for duplicate unique keys', async () => {
      const connection = new Connection({ registry, store })
      const users = await connection.collection('User')
      await users.insertOne({ email: 'a@example.com' })

      let caught: unknown
      try {
        await users.insertOne({ email: 'a@example.com' })
      } catch (error) {
        caught = error
      }

      expect(caught).toBeInstanceOf(NotUniqueError)
      if (caught instanceof NotUniqueError) {
        expect(caught.indexName).toBe('email_1')
        expect(caught.code).toBe(11000)
      }
      expect(store.documents('user')).toHaveLength(1)
    })

    it('enforces uniqueness shared by subclasses', async () => {
      const connection = new Connection({ registry, store })
      await (await connection.collection('BlogPost')).insertOne({ title: 'Hello', slug: 'hello' })
      const extended = await connection.collection('ExtendedBlogPost')

      await expect(extended.insertOne({ title: 'Again', slug: 'hello' })).rejects.toThrow(NotUniqueError)
    })

    it('does not enforce uniqueness when the index was never created', async () => {
      const connection = new Connection({ registry, store, autoCreateIndex: false })
      const users = await connection.collection('User')

      await users.insertOne({ email: 'a@example.com' })
      await users.insertOne({ email: 'a@example.com' })

      expect(store.documents('user')).toHaveLength(2)
    })

    it('wraps other store failures in OperationError', async () => {
      vi.spyOn(store, 'insertOne').mockRejectedValueOnce(new Error('disk full'))
      const connection = new Connection({ registry, store })
      const users = await connection.collection('User')

      await expect(users.insertOne({ email: 'a@example.com' })).rejects.toThrow(
        new OperationError('Could not save document (disk full)')
      )
    })
  })
})
