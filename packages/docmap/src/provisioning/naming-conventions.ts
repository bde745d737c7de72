/**
 * @file Collection and Index Naming
 *
 * Default collection names derived from schema names, collection name
 * validation, and the store's default index naming scheme.
 *
 * @see https://www.mongodb.com/docs/manual/reference/limits/#naming-restrictions
 */

import type { IndexKey } from '../types/index.js'

// =============================================================================
// TYPES
// =============================================================================

/**
 * Result of collection name validation.
 */
export interface CollectionNameValidationResult {
  valid: boolean
  errors: string[]
}

// =============================================================================
// CONSTANTS
// =============================================================================

const MAX_COLLECTION_NAME_LENGTH = 200

// =============================================================================
// COLLECTION NAMES
// =============================================================================

/**
 * Split a PascalCase or camelCase name into lowercase words, keeping
 * acronyms together.
 */
function splitIntoWords(name: string): string[] {
  return name
    .replace(/([A-Z]+)([A-Z][a-z])/g, '$1_$2')
    .replace(/([a-z\d])([A-Z])/g, '$1_$2')
    .toLowerCase()
    .split('_')
    .filter(Boolean)
}

/**
 * Derive the default collection name for a schema name.
 *
 * @example
 * ```typescript
 * defaultCollectionName('BlogPost') // 'blog_post'
 * defaultCollectionName('HTTPLog') // 'http_log'
 * ```
 */
export function defaultCollectionName(schemaName: string): string {
  return splitIntoWords(schemaName).join('_')
}

/**
 * Validate a collection name against the store's naming restrictions.
 */
export function validateCollectionName(name: string): CollectionNameValidationResult {
  const errors: string[] = []

  if (name.trim() === '') {
    errors.push('Collection name cannot be empty or whitespace only')
    return { valid: false, errors }
  }

  if (name.includes('\x00')) {
    errors.push('Collection name cannot contain null character')
  }

  if (name.startsWith('system.')) {
    errors.push("Collection name cannot start with 'system.' prefix")
  }

  if (name.includes('$')) {
    errors.push("Collection name cannot contain '$' character")
  }

  if (name.length > MAX_COLLECTION_NAME_LENGTH) {
    errors.push('Collection name exceeds maximum length')
  }

  return { valid: errors.length === 0, errors }
}

// =============================================================================
// INDEX NAMES
// =============================================================================

/**
 * Generate the default name the store gives an index with these keys.
 *
 * @example
 * ```typescript
 * generateIndexName([['_cls', 1], ['name', 1]]) // '_cls_1_name_1'
 * generateIndexName([['date.yr', -1]]) // 'date.yr_-1'
 * generateIndexName([['location', '2d']]) // 'location_2d'
 * ```
 */
export function generateIndexName(keys: readonly IndexKey[]): string {
  return keys.map(([key, direction]) => `${key}_${direction}`).join('_')
}
