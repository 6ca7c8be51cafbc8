/**
 * Respack Kernel — Prefix Table Builder
 *
 * Builds the NamingTables a resolver reads from the packs a discovery pass
 * produced. Construction is deterministic: packs are processed in ascending
 * qualified-name order, so "first registered" never depends on the order a
 * host happened to enumerate them.
 *
 * Registration order per pack (fixed precedence):
 *   1. the qualified name, mapped to itself (never collides)
 *   2. the short pack name (collision procedure)
 *   3. each alias, in declaration order (collision procedure)
 * After all packs:
 *   4. user prefix-map overrides, which win unconditionally when their
 *      target pack exists
 *
 * The builder is pure: no I/O, no clock. Collision signals are returned
 * as diagnostics alongside the tables.
 */

import type { Diagnostic, PrefixCollisionDiagnostic } from '../types/diagnostic.js';
import type { RegisteredPack } from '../types/pack.js';
import { CollisionPolicy } from '../types/tables.js';
import type { NamingTables, TableBuildResult } from '../types/tables.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/**
 * Outcome of a single prefix claim.
 *
 * - claimed:   the prefix was free and now belongs to the claimant
 * - unchanged: the claimant already held or contended for the prefix
 * - collision: a distinct qualified name already held the prefix
 */
export type ClaimOutcome = 'claimed' | 'unchanged' | 'collision';

/**
 * Everything a table build needs.
 */
export interface NamingTableInput {
  /** Packs that survived the blocklist, in any order. */
  readonly packs: ReadonlyArray<RegisteredPack>;
  /** alias → qualified name, applied after all packs. */
  readonly prefixMap?: Readonly<Record<string, string>> | undefined;
  readonly defaultPrefix?: string | undefined;
  readonly policy?: CollisionPolicy | undefined;
}

interface Contender {
  readonly qualified_name: string;
  readonly priority: number;
}

// ---------------------------------------------------------------------------
// Ordering
// ---------------------------------------------------------------------------

/**
 * Plain code-unit comparison. Locale-aware collation is deliberately not
 * used: processing order must be identical on every host.
 */
export function compareCodeUnits(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

// ---------------------------------------------------------------------------
// PrefixTableBuilder
// ---------------------------------------------------------------------------

/**
 * Mutable accumulator for one table build. Use buildNamingTables() unless
 * the individual steps need to be driven separately (tests do).
 */
export class PrefixTableBuilder {
  private readonly packs: Map<string, RegisteredPack> = new Map();
  private readonly qualified: Map<string, string> = new Map();
  private readonly prefixes: Map<string, string> = new Map();
  private readonly collisions: Map<string, string[]> = new Map();
  private readonly contenders: Map<string, Contender[]> = new Map();
  private readonly ambiguous: Set<string> = new Set();
  private readonly diagnostics: Diagnostic[] = [];

  constructor(private readonly policy: CollisionPolicy = CollisionPolicy.Ambiguous) {}

  /**
   * Store a pack and register its qualified name, short name and aliases.
   *
   * A second pack with an already-stored qualified name is skipped and
   * reported; the first one processed is kept.
   *
   * @returns false if the pack was skipped
   */
  addPack(pack: RegisteredPack): boolean {
    if (this.packs.has(pack.qualified_name)) {
      this.diagnostics.push({
        kind: 'pack-rejected',
        level: 'debug',
        dist_name: pack.dist_name,
        pack_name: pack.pack_name,
        reason: 'duplicate qualified name',
        message: `Skipping duplicate registration of '${pack.qualified_name}'; the first one processed is kept.`,
      });
      return false;
    }

    this.packs.set(pack.qualified_name, pack);
    const qualifiedKey = pack.qualified_name.toLowerCase();
    this.qualified.set(qualifiedKey, pack.qualified_name);
    this.prefixes.set(qualifiedKey, pack.qualified_name);

    this.claim(pack.pack_name, pack.qualified_name, 'pack name');
    for (const alias of pack.aliases) {
      if (alias.trim() === '' || alias.includes('/')) {
        this.diagnostics.push({
          kind: 'alias-rejected',
          level: 'debug',
          qualified_name: pack.qualified_name,
          alias,
          message:
            `Ignoring alias '${alias}' declared by '${pack.qualified_name}': ` +
            `aliases must be non-empty and must not contain '/'.`,
        });
        continue;
      }
      this.claim(alias, pack.qualified_name, 'alias');
    }
    return true;
  }

  /**
   * Register a short prefix for a stored pack via the collision procedure.
   *
   * - unclaimed prefix: claim it, no signal
   * - held or already contended by the same qualified name: no-op, no signal
   * - held by a different qualified name: record both in the collision
   *   ledger, emit a prefix-collision diagnostic, then let the policy decide
   *   the holder and whether the prefix is ambiguous
   *
   * @param prefix - Candidate prefix; lowercased here
   * @param claimant - Qualified name of the claiming pack
   * @param origin - Human-readable origin of the claim, for the diagnostic
   */
  claim(prefix: string, claimant: string, origin: string): ClaimOutcome {
    const key = prefix.toLowerCase();
    const priority = this.packs.get(claimant)?.priority ?? 0;
    const holder = this.prefixes.get(key);

    if (holder === undefined) {
      this.prefixes.set(key, claimant);
      this.contenders.set(key, [{ qualified_name: claimant, priority }]);
      return 'claimed';
    }

    const ledger = this.collisions.get(key) ?? [holder];
    if (holder === claimant || ledger.includes(claimant)) {
      return 'unchanged';
    }

    ledger.push(claimant);
    this.collisions.set(key, ledger);
    const contenders = this.contenders.get(key) ?? [];
    contenders.push({ qualified_name: claimant, priority });
    this.contenders.set(key, contenders);

    const outcome = this.adjudicate(key, contenders);
    this.diagnostics.push(collisionDiagnostic(key, holder, claimant, origin, outcome));
    return 'collision';
  }

  /**
   * Apply user overrides. An override whose target is not a stored pack is
   * ignored without a signal; it is not validated against packs that might
   * load later. An alias that could never be read back as a short prefix is
   * skipped with an `alias-rejected` diagnostic.
   */
  applyOverrides(prefixMap: Readonly<Record<string, string>>): void {
    for (const [alias, target] of Object.entries(prefixMap)) {
      const resolvedTarget = this.qualified.get(target.toLowerCase());
      if (resolvedTarget === undefined) continue;
      if (alias.trim() === '' || alias.includes('/')) {
        this.diagnostics.push({
          kind: 'alias-rejected',
          level: 'debug',
          qualified_name: resolvedTarget,
          alias,
          message:
            `Ignoring prefix-map alias '${alias}' for '${resolvedTarget}': ` +
            `aliases must be non-empty and must not contain '/'.`,
        });
        continue;
      }
      const key = alias.toLowerCase();
      this.prefixes.set(key, resolvedTarget);
      this.ambiguous.delete(key);
    }
  }

  /**
   * Freeze the accumulated state into NamingTables.
   */
  build(defaultPrefix?: string): TableBuildResult {
    const collisions = new Map<string, ReadonlyArray<string>>();
    for (const [prefix, names] of this.collisions) {
      collisions.set(prefix, Object.freeze([...names]));
    }

    const tables: NamingTables = Object.freeze({
      packs: new Map(this.packs),
      qualified: new Map(this.qualified),
      prefixes: new Map(this.prefixes),
      collisions,
      ambiguous: new Set(this.ambiguous),
      default_prefix: defaultPrefix !== undefined && defaultPrefix !== '' ? defaultPrefix : undefined,
      policy: this.policy,
    });
    return { tables, diagnostics: [...this.diagnostics] };
  }

  /**
   * Decide the holder of a contended prefix under the active policy.
   */
  private adjudicate(key: string, contenders: ReadonlyArray<Contender>): CollisionOutcome {
    switch (this.policy) {
      case CollisionPolicy.Ambiguous: {
        this.ambiguous.add(key);
        return { ambiguous: true, holder: this.prefixes.get(key) ?? '', top_priority: undefined };
      }
      case CollisionPolicy.Priority: {
        const top = Math.max(...contenders.map((c) => c.priority));
        const winners = contenders.filter((c) => c.priority === top);
        const first = winners[0];
        if (first !== undefined) {
          this.prefixes.set(key, first.qualified_name);
        }
        if (winners.length > 1) {
          this.ambiguous.add(key);
        } else {
          this.ambiguous.delete(key);
        }
        return {
          ambiguous: winners.length > 1,
          holder: first?.qualified_name ?? '',
          top_priority: top,
        };
      }
      default: {
        const exhaustive: never = this.policy;
        throw new Error(`Unknown collision policy: ${String(exhaustive)}`);
      }
    }
  }
}

// ---------------------------------------------------------------------------
// Entry Point
// ---------------------------------------------------------------------------

/**
 * Build NamingTables from a set of registered packs.
 *
 * Packs are sorted by qualified name (code-unit order) before processing;
 * the caller does not need to pre-sort. Overrides are applied last.
 */
export function buildNamingTables(input: NamingTableInput): TableBuildResult {
  const builder = new PrefixTableBuilder(input.policy ?? CollisionPolicy.Ambiguous);
  const ordered = [...input.packs].sort((a, b) =>
    compareCodeUnits(a.qualified_name, b.qualified_name),
  );
  for (const pack of ordered) {
    builder.addPack(pack);
  }
  if (input.prefixMap !== undefined) {
    builder.applyOverrides(input.prefixMap);
  }
  return builder.build(input.defaultPrefix);
}

// ---------------------------------------------------------------------------
// Internal: collision diagnostics
// ---------------------------------------------------------------------------

interface CollisionOutcome {
  readonly ambiguous: boolean;
  readonly holder: string;
  readonly top_priority: number | undefined;
}

function collisionDiagnostic(
  prefix: string,
  holder: string,
  claimant: string,
  origin: string,
  outcome: CollisionOutcome,
): PrefixCollisionDiagnostic {
  let verdict: string;
  if (outcome.top_priority === undefined) {
    verdict = `Prefix '${prefix}' is now ambiguous.`;
  } else if (outcome.ambiguous) {
    verdict = `Both claims have priority ${outcome.top_priority}; prefix '${prefix}' is now ambiguous.`;
  } else {
    const action = outcome.holder === claimant ? 'takes' : 'keeps';
    verdict = `'${outcome.holder}' ${action} the prefix with priority ${outcome.top_priority}.`;
  }
  return {
    kind: 'prefix-collision',
    level: 'warn',
    prefix,
    holder,
    claimant,
    origin,
    message:
      `Prefix collision: '${prefix}' (${origin} of '${claimant}') is already claimed by '${holder}'. ` +
      `${verdict} Use a qualified name such as '${claimant}:<resource>', ` +
      `or map the prefix explicitly with RESOURCE_PREFIX_MAP="${prefix}=${claimant}".`,
  };
}
