/**
 * Respack Kernel — Naming Table Hash
 *
 * Fingerprints a NamingTables snapshot. Two discovery passes over the same
 * installed packs and the same configuration produce the same hash, so a
 * host can tell whether a rediscovery changed anything resolvable.
 */

import { createHash } from 'node:crypto';
import type { NamingTables } from '../types/tables.js';
import { compareCodeUnits } from '../tables/prefix-table.js';

/**
 * Opaque brand symbol for NamingTablesHash.
 */
declare const __namingTablesHashBrand: unique symbol;

/**
 * SHA-256 hex digest of a NamingTables snapshot's canonical form.
 */
export type NamingTablesHash = string & {
  readonly [__namingTablesHashBrand]: 'NamingTablesHash';
};

// ---------------------------------------------------------------------------
// Internal: Canonical JSON for deterministic hashing
// ---------------------------------------------------------------------------

/**
 * JSON with object keys sorted at every level. Identical structures give
 * identical strings regardless of property insertion order.
 */
export function canonicalize(value: unknown): string {
  if (value === null || value === undefined) {
    return 'null';
  }
  if (typeof value === 'boolean' || typeof value === 'number' || typeof value === 'string') {
    return JSON.stringify(value);
  }
  if (Array.isArray(value)) {
    return '[' + value.map((item: unknown) => canonicalize(item)).join(',') + ']';
  }
  if (typeof value === 'object') {
    const pairs = Object.entries(value)
      .sort(([a], [b]) => compareCodeUnits(a, b))
      .map(([k, v]) => `${JSON.stringify(k)}:${canonicalize(v)}`);
    return '{' + pairs.join(',') + '}';
  }
  return 'null';
}

// ---------------------------------------------------------------------------
// Hash
// ---------------------------------------------------------------------------

/**
 * Project the tables onto plain data. Pack objects themselves are not part
 * of the fingerprint; only the naming they contribute is.
 */
export function tablesToPlain(tables: NamingTables): Record<string, unknown> {
  const sortedEntries = <V>(map: ReadonlyMap<string, V>): Array<[string, V]> =>
    [...map.entries()].sort(([a], [b]) => compareCodeUnits(a, b));

  return {
    packs: [...tables.packs.values()].map((p) => ({
      qualified_name: p.qualified_name,
      dist_name: p.dist_name,
      pack_name: p.pack_name,
      aliases: [...p.aliases],
      priority: p.priority,
    })),
    prefixes: Object.fromEntries(sortedEntries(tables.prefixes)),
    collisions: Object.fromEntries(
      sortedEntries(tables.collisions).map(([k, v]) => [k, [...v]]),
    ),
    ambiguous: [...tables.ambiguous].sort(compareCodeUnits),
    default_prefix: tables.default_prefix ?? null,
    policy: tables.policy,
  };
}

/**
 * SHA-256 over the canonical JSON of the tables.
 */
export function hashNamingTables(tables: NamingTables): NamingTablesHash {
  const hex = createHash('sha256').update(canonicalize(tablesToPlain(tables))).digest('hex');
  // Type assertion is the authorized path to produce a NamingTablesHash.
  return hex as NamingTablesHash;
}
