/**
 * Respack Kernel — Naming Table Types
 *
 * The frozen state the resolution kernel reads: pack table, prefix table,
 * collision ledger, ambiguity set and default prefix. Built once per
 * discovery pass by PrefixTableBuilder and shared read-only afterwards.
 */

import type { Diagnostic } from './diagnostic.js';
import type { RegisteredPack } from './pack.js';

// ---------------------------------------------------------------------------
// Collision Policy
// ---------------------------------------------------------------------------

/**
 * How a second claim on a short prefix is adjudicated.
 *
 * The two policies are alternatives. A registry runs exactly one of them.
 */
export enum CollisionPolicy {
  /**
   * Any second claimant makes the prefix permanently ambiguous. The first
   * claimant stays in the prefix table but the prefix cannot be used
   * unqualified until an override resolves it.
   */
  Ambiguous = 'ambiguous',
  /**
   * The claimant with the strictly highest priority owns the prefix and
   * resolves directly. A tie at the top priority leaves the prefix
   * ambiguous, with the first-processed claimant as provisional holder.
   */
  Priority = 'priority',
}

// ---------------------------------------------------------------------------
// Naming Tables
// ---------------------------------------------------------------------------

/**
 * Immutable snapshot consumed by resolveName().
 *
 * Invariants:
 * - every key of `prefixes` is lowercase
 * - `packs` iterates in processing order (qualified name ascending)
 * - a prefix is in `collisions` iff two or more distinct qualified names
 *   claimed it through the pack-name/alias path
 * - `ambiguous` is the subset of prefixes that cannot resolve unqualified
 */
export interface NamingTables {
  readonly packs: ReadonlyMap<string, RegisteredPack>;
  /** Lowercased qualified name → qualified name. */
  readonly qualified: ReadonlyMap<string, string>;
  /** Lowercased prefix → owning qualified name. */
  readonly prefixes: ReadonlyMap<string, string>;
  /** Lowercased prefix → every contending qualified name, in claim order. */
  readonly collisions: ReadonlyMap<string, ReadonlyArray<string>>;
  readonly ambiguous: ReadonlySet<string>;
  readonly default_prefix: string | undefined;
  readonly policy: CollisionPolicy;
}

/**
 * Output of a table build: the tables plus the diagnostics produced while
 * building them, in emission order.
 */
export interface TableBuildResult {
  readonly tables: NamingTables;
  readonly diagnostics: ReadonlyArray<Diagnostic>;
}
