/**
 * @file Implicit-Unique Deriver Tests
 */

import { describe, it, expect, beforeEach } from 'vitest'
import { FieldPathResolutionError } from '../../src/errors.js'
import { createSpec } from '../../src/indexes/spec.js'
import { deriveUniqueSpecs, foldUniqueSpecs } from '../../src/indexes/unique.js'
import { field } from '../../src/schema/fields.js'
import { SchemaRegistry } from '../../src/schema/registry.js'

let registry: SchemaRegistry

beforeEach(() => {
  registry = new SchemaRegistry()
})

describe('deriveUniqueSpecs', () => {
  it('derives a single-key spec from unique', () => {
    const user = registry.defineDocument('User', {
      fields: { email: field.string({ unique: true }), name: field.string() },
      meta: { allowInheritance: false },
    })

    expect(deriveUniqueSpecs(registry, user)).toStrictEqual([{ fields: [['email', 1]], unique: true }])
  })

  it('marks the spec sparse when the field is sparse', () => {
    const user = registry.defineDocument('User', {
      fields: { nickname: field.string({ unique: true, sparse: true }) },
    })

    expect(deriveUniqueSpecs(registry, user)).toStrictEqual([
      { fields: [['nickname', 1]], unique: true, sparse: true },
    ])
  })

  it('uses storage keys', () => {
    const user = registry.defineDocument('User', {
      fields: { email: field.string({ unique: true, dbField: 'mail' }) },
    })

    expect(deriveUniqueSpecs(registry, user)).toStrictEqual([{ fields: [['mail', 1]], unique: true }])
  })

  it('appends uniqueWith partners in declared order', () => {
    const person = registry.defineDocument('Person', {
      fields: {
        first: field.string({ uniqueWith: ['last', 'born'] }),
        last: field.string(),
        born: field.dateTime({ dbField: 'dob' }),
      },
    })

    expect(deriveUniqueSpecs(registry, person)).toStrictEqual([
      {
        fields: [
          ['first', 1],
          ['last', 1],
          ['dob', 1],
        ],
        unique: true,
      },
    ])
  })

  it('descends into embedded documents', () => {
    registry.defineEmbedded('SubDocument', {
      fields: { year: field.int({ dbField: 'yr' }), slug: field.string({ unique: true }) },
    })
    const post = registry.defineDocument('BlogPost', {
      fields: {
        title: field.string({ uniqueWith: 'sub.year' }),
        sub: field.embedded('SubDocument'),
      },
      meta: { allowInheritance: false },
    })

    expect(deriveUniqueSpecs(registry, post)).toStrictEqual([
      {
        fields: [
          ['title', 1],
          ['sub.yr', 1],
        ],
        unique: true,
      },
      { fields: [['sub.slug', 1]], unique: true },
    ])
  })

  it('resolves partners relative to the embedded schema', () => {
    registry.defineEmbedded('Edition', {
      fields: { isbn: field.string({ uniqueWith: 'format' }), format: field.string() },
    })
    const book = registry.defineDocument('Book', {
      fields: { edition: field.embedded('Edition', { dbField: 'ed' }) },
    })

    expect(deriveUniqueSpecs(registry, book)).toStrictEqual([
      {
        fields: [
          ['ed.isbn', 1],
          ['ed.format', 1],
        ],
        unique: true,
      },
    ])
  })

  it('descends into lists of embedded documents', () => {
    registry.defineEmbedded('Comment', {
      fields: { commentId: field.string({ unique: true, dbField: 'comment_id' }) },
    })
    const post = registry.defineDocument('BlogPost', {
      fields: { comments: field.list(field.embedded('Comment')) },
    })

    expect(deriveUniqueSpecs(registry, post)).toStrictEqual([
      { fields: [['comments.comment_id', 1]], unique: true },
    ])
  })

  it('visits an embedded schema once per field that embeds it', () => {
    registry.defineEmbedded('Label', { fields: { name: field.string({ unique: true }) } })
    const shipment = registry.defineDocument('Shipment', {
      fields: { from: field.embedded('Label'), to: field.embedded('Label') },
    })

    expect(deriveUniqueSpecs(registry, shipment)).toStrictEqual([
      { fields: [['from.name', 1]], unique: true },
      { fields: [['to.name', 1]], unique: true },
    ])
  })

  it('does not recurse into a schema already on the path', () => {
    registry.defineEmbedded('TreeNode', {
      fields: { slug: field.string({ unique: true }), child: field.embedded('self') },
    })
    const doc = registry.defineDocument('Tree', { fields: { root: field.embedded('TreeNode') } })

    expect(deriveUniqueSpecs(registry, doc)).toStrictEqual([{ fields: [['root.slug', 1]], unique: true }])
  })

  it('skips primary-key fields', () => {
    const account = registry.defineDocument('Account', {
      fields: { handle: field.string({ primaryKey: true, unique: true }) },
    })

    expect(deriveUniqueSpecs(registry, account)).toEqual([])
  })

  it('includes fields inherited from ancestors', () => {
    registry.defineDocument('Base', {
      fields: { code: field.string({ unique: true }) },
      meta: { abstract: true },
    })
    const child = registry.defineDocument('Child', {
      extends: 'Base',
      fields: { serial: field.string({ unique: true }) },
    })

    expect(deriveUniqueSpecs(registry, child)).toStrictEqual([
      { fields: [['code', 1]], unique: true },
      { fields: [['serial', 1]], unique: true },
    ])
  })

  it('fails when a partner does not resolve', () => {
    expect(() =>
      registry.defineDocument('Person', { fields: { first: field.string({ uniqueWith: 'surname' }) } })
    ).toThrow(FieldPathResolutionError)
  })
})

describe('foldUniqueSpecs', () => {
  it('upgrades a spec with the same keys', () => {
    const folded = foldUniqueSpecs(
      [createSpec([['email', 1]]), createSpec([['name', 1]])],
      [createSpec([['email', 1]], { unique: true, sparse: true })]
    )

    expect(folded).toStrictEqual([
      { fields: [['email', 1]], unique: true, sparse: true },
      { fields: [['name', 1]] },
    ])
  })

  it('keeps the options of the upgraded spec', () => {
    const folded = foldUniqueSpecs(
      [createSpec([['email', 1]], { name: 'email_lookup' })],
      [createSpec([['email', 1]], { unique: true })]
    )

    expect(folded).toStrictEqual([{ fields: [['email', 1]], unique: true, name: 'email_lookup' }])
  })

  it('appends specs with new keys', () => {
    const folded = foldUniqueSpecs(
      [
        createSpec([
          ['_cls', 1],
          ['email', 1],
        ]),
      ],
      [createSpec([['email', 1]], { unique: true })]
    )

    expect(folded).toStrictEqual([
      {
        fields: [
          ['_cls', 1],
          ['email', 1],
        ],
      },
      { fields: [['email', 1]], unique: true },
    ])
  })
})
