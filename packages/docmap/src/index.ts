/**
 * docmap
 *
 * Index specification compiler and index reconciler for a document mapper.
 * Schemas declare their indexes in `meta.indexes` and through field-level
 * `unique` / `uniqueWith`; the compiler turns them into canonical specs and
 * the reconciler makes sure the backing collection has them.
 *
 * @packageDocumentation
 * @module docmap
 */

// ============================================================================
// Type Exports
// ============================================================================

export type {
  CanonicalIndexSpec,
  CanonicalIndexSpecList,
  CatalogKey,
  IndexDeclarationRecord,
  IndexDirection,
  IndexKey,
  IndexOptions,
  LiveCatalogEntry,
  RawIndexDeclaration,
  RawIndexField,
} from './types/index.js'

export { ASCENDING, DESCENDING, GEO2D, INDEX_DIRECTIONS, isIndexDirection } from './types/index.js'

// ============================================================================
// Schema
// ============================================================================

export { field } from './schema/fields.js'
export type {
  BoundField,
  EmbeddedField,
  FieldDescriptor,
  FieldKind,
  FieldOptions,
  ListField,
  ReferenceField,
  ScalarField,
  ScalarFieldKind,
  SchemaRef,
} from './schema/fields.js'

export { SchemaRegistry, SELF } from './schema/registry.js'
export type { SchemaDefinition, SchemaDescriptor, SchemaKind } from './schema/registry.js'
export type { ResolvedMeta, SchemaMeta } from './schema/meta.js'

// ============================================================================
// Index Compilation
// ============================================================================

export {
  DISCRIMINATOR_KEY,
  PRIMARY_KEY,
  PRIMARY_KEY_ALIAS,
  resolveFieldPath,
  validatePathSegment,
} from './indexes/field-path.js'
export type { ResolvedFieldPath } from './indexes/field-path.js'

export { normalizeIndexDeclaration, parseIndexDeclaration } from './indexes/normalizer.js'
export type { DeclaredIndexField, ParsedIndexDeclaration } from './indexes/normalizer.js'

export { mergeInheritedSpecs, withDiscriminator } from './indexes/inheritance.js'
export { deriveUniqueSpecs, foldUniqueSpecs } from './indexes/unique.js'
export { compileSchemaIndexes, normalizeOwnDeclarations } from './indexes/compiler.js'
export { createSpec, indexNameOf, keysEqual, specsEqual } from './indexes/spec.js'
export { collectGeoIndexes } from './indexes/geo.js'

// ============================================================================
// Reconciliation
// ============================================================================

export { catalogSatisfies, planIndexes, reconcileIndexes } from './provisioning/index-setup.js'
export type {
  IndexCompleteSummary,
  IndexErrorInfo,
  IndexHookInfo,
  IndexSetupHooks,
  ReconcileContext,
  ReconcileOptions,
  ReconcileResult,
} from './provisioning/index-setup.js'

export {
  defaultCollectionName,
  generateIndexName,
  validateCollectionName,
} from './provisioning/naming-conventions.js'

// ============================================================================
// Store and Connection
// ============================================================================

export { createRpcBackingStore } from './store/backing-store.js'
export type { BackingStoreClient, RpcBackingStoreConfig, RpcClient } from './store/backing-store.js'

export {
  classifyStoreError,
  duplicateKeyIndexName,
  isDuplicateKeyError,
  toOperationError,
} from './store/write-errors.js'
export type { StoreErrorClassification, StoreErrorType } from './store/write-errors.js'

export { Connection } from './connection.js'
export type { ConnectionConfig, DocumentCollection } from './connection.js'

export { createConsoleLogger, resolveLogger } from './logger.js'
export type { LogLevel, LogMethod, OdmLogger } from './logger.js'

// ============================================================================
// Errors
// ============================================================================

export {
  FieldPathResolutionError,
  InvalidIndexDeclarationError,
  NotUniqueError,
  OperationError,
  ReconciliationError,
  SchemaConfigurationError,
} from './errors.js'
