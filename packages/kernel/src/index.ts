/**
 * @respack/kernel
 *
 * Respack resolution kernel: pack contract, naming tables, collision
 * adjudication, name resolution and table hashing.
 *
 * This package is side-effect free. It contains no imports of node:fs,
 * node:child_process, node:net, fetch, or any other I/O API.
 * node:crypto is used for deterministic hashing (pure computation, not I/O).
 *
 * Pack discovery, configuration and diagnostic sinks live in
 * @respack/runtime-host. The registry lives in @respack/pack-loader.
 */

// Types
export type { PackInfo, RegisteredPack, ResourcePack } from './types/pack.js';
export { DEFAULT_PACK_PRIORITY, createRegisteredPack, qualifiedName } from './types/pack.js';

export type { ResourceContent, ResourceInfo } from './types/resource.js';

export type {
  PackFilterResult,
  ResolutionError,
  ResolveResult,
} from './types/resolution.js';
export { ResolutionErrorKind } from './types/resolution.js';

export type { ValidationError, ValidationResult } from './types/validation.js';

export type {
  AliasRejectedDiagnostic,
  ContentTypeUnavailableDiagnostic,
  Diagnostic,
  DiagnosticLevel,
  DiagnosticSink,
  PackRejectedDiagnostic,
  PackageSkippedDiagnostic,
  PrefixCollisionDiagnostic,
} from './types/diagnostic.js';

export type { PackSource, RawPackRegistration } from './types/source.js';
export { UNKNOWN_DIST_NAME } from './types/source.js';

export type { NamingTables, TableBuildResult } from './types/tables.js';
export { CollisionPolicy } from './types/tables.js';

// Errors
export {
  BinaryResourceError,
  ResolutionFailure,
  ResourceNotFoundError,
  isKindedError,
} from './errors.js';

// Implementations
export type { ClaimOutcome, NamingTableInput } from './tables/prefix-table.js';
export { PrefixTableBuilder, buildNamingTables, compareCodeUnits } from './tables/prefix-table.js';
export { knownPrefixes, resolveName, resolvePackFilter } from './resolution/resolver.js';
export {
  createResourceContent,
  defaultEncodingFor,
  resourceText,
} from './content/resource-content.js';
export type { NamingTablesHash } from './snapshot/table-hash.js';
export { canonicalize, hashNamingTables } from './snapshot/table-hash.js';
export { field, isRecord, isStringArray, stringField } from './util/guards.js';
