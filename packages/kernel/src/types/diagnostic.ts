/**
 * Respack Kernel — Diagnostic Types
 *
 * Diagnostics are produced as data. The kernel never writes them anywhere:
 * table construction returns them, and the registry forwards them to an
 * injected DiagnosticSink. Concrete sinks live in the runtime host.
 */

/** Severity of a diagnostic. `warn` is operator-facing; `debug` is opt-in. */
export type DiagnosticLevel = 'warn' | 'debug';

/**
 * Two packs claimed the same short prefix.
 */
export interface PrefixCollisionDiagnostic {
  readonly kind: 'prefix-collision';
  readonly level: 'warn';
  /** Lowercased prefix. */
  readonly prefix: string;
  /** Qualified name holding the prefix when the new claim arrived. */
  readonly holder: string;
  /** Qualified name of the new claimant. */
  readonly claimant: string;
  /** Where the claim came from, e.g. "pack name" or "alias". */
  readonly origin: string;
  readonly message: string;
}

/**
 * A discovery entry was skipped.
 */
export interface PackRejectedDiagnostic {
  readonly kind: 'pack-rejected';
  readonly level: 'debug';
  readonly dist_name: string;
  readonly pack_name: string;
  readonly reason: string;
  readonly message: string;
}

/**
 * An installed package could not be inspected for pack declarations.
 */
export interface PackageSkippedDiagnostic {
  readonly kind: 'package-skipped';
  readonly level: 'debug';
  /** Package directory, or the @scope directory that could not be listed. */
  readonly path: string;
  readonly message: string;
}

/**
 * A declared alias cannot serve as a short prefix.
 */
export interface AliasRejectedDiagnostic {
  readonly kind: 'alias-rejected';
  readonly level: 'debug';
  readonly qualified_name: string;
  readonly alias: string;
  readonly message: string;
}

/**
 * A listing could not determine one resource's content type.
 */
export interface ContentTypeUnavailableDiagnostic {
  readonly kind: 'content-type-unavailable';
  readonly level: 'debug';
  readonly qualified_name: string;
  readonly resource_name: string;
  readonly message: string;
}

export type Diagnostic =
  | PrefixCollisionDiagnostic
  | PackRejectedDiagnostic
  | PackageSkippedDiagnostic
  | AliasRejectedDiagnostic
  | ContentTypeUnavailableDiagnostic;

/**
 * Receives diagnostics. Implementations must not throw.
 */
export interface DiagnosticSink {
  emit(diagnostic: Diagnostic): void;
}
