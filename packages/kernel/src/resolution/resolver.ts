/**
 * Respack Kernel — Name Resolver
 *
 * Maps a resource name string to a (qualified pack name, resource name)
 * pair using a NamingTables snapshot. Pure: reads the tables, never
 * mutates them, performs no I/O.
 *
 * Name grammar:
 *   name      := [prefix ":"] resource
 *   prefix    := qualified | short
 *   qualified := dist "/" pack
 *
 * The split happens at the LAST colon, so prefixes may themselves contain
 * colons while resource names may not. Prefix matching is case-insensitive;
 * the resource part is passed through unchanged.
 */

import { ResolutionErrorKind } from '../types/resolution.js';
import type { PackFilterResult, ResolutionError, ResolveResult } from '../types/resolution.js';
import type { NamingTables } from '../types/tables.js';
import { compareCodeUnits } from '../tables/prefix-table.js';

// ---------------------------------------------------------------------------
// resolveName
// ---------------------------------------------------------------------------

/**
 * Resolve a name string against the tables.
 *
 * Resolution order:
 *   1. no colon: rewrite once as `<default>:<name>` or fail NoDefaultPrefix
 *   2. prefix contains '/': qualified lookup or UnknownQualifiedPack
 *   3. prefix is ambiguous: AmbiguousPrefix listing qualified alternatives
 *   4. prefix is mapped: resolve to its owner
 *   5. otherwise: UnknownPrefix listing the known prefixes
 */
export function resolveName(tables: NamingTables, name: string): ResolveResult {
  const colon = name.lastIndexOf(':');
  if (colon === -1) {
    if (tables.default_prefix === undefined) {
      const known = knownPrefixes(tables);
      return failure(
        ResolutionErrorKind.NoDefaultPrefix,
        name,
        `Resource name '${name}' has no prefix and no default prefix is configured. ` +
          `Use '<prefix>:${name}' or set RESOURCE_DEFAULT_PREFIX. ` +
          `Known prefixes: ${listOrNone(known)}`,
        known,
      );
    }
    return resolvePrefixed(tables, name, tables.default_prefix, name);
  }
  return resolvePrefixed(tables, name, name.slice(0, colon), name.slice(colon + 1));
}

function resolvePrefixed(
  tables: NamingTables,
  original: string,
  prefix: string,
  resource: string,
): ResolveResult {
  const key = prefix.toLowerCase();

  if (key.includes('/')) {
    const qualified = tables.qualified.get(key);
    if (qualified !== undefined) {
      return { ok: true, qualified_name: qualified, resource_name: resource };
    }
    const known = [...tables.packs.keys()];
    return failure(
      ResolutionErrorKind.UnknownQualifiedPack,
      original,
      `Unknown qualified resource pack '${prefix}'. Known packs: ${listOrNone(known)}`,
      known,
    );
  }

  if (tables.ambiguous.has(key)) {
    const contenders = tables.collisions.get(key) ?? [];
    const alternatives = contenders.map((q) => `${q}:${resource}`);
    return failure(
      ResolutionErrorKind.AmbiguousPrefix,
      original,
      `Prefix '${prefix}' is ambiguous: claimed by ${contenders.join(', ')}. ` +
        `Use a qualified name (${alternatives.join(', ')}) ` +
        `or map the prefix with RESOURCE_PREFIX_MAP.`,
      alternatives,
    );
  }

  const owner = tables.prefixes.get(key);
  if (owner !== undefined) {
    return { ok: true, qualified_name: owner, resource_name: resource };
  }

  const known = knownPrefixes(tables);
  return failure(
    ResolutionErrorKind.UnknownPrefix,
    original,
    `Unknown resource pack prefix '${prefix}'. Known prefixes: ${listOrNone(known)}`,
    known,
  );
}

// ---------------------------------------------------------------------------
// resolvePackFilter
// ---------------------------------------------------------------------------

/**
 * Resolve a listing filter to a single pack. Accepts an exact qualified
 * name or a short prefix that resolves unambiguously. Anything else
 * matches nothing.
 */
export function resolvePackFilter(tables: NamingTables, filter: string): PackFilterResult {
  const key = filter.toLowerCase();
  const qualified = tables.qualified.get(key);
  if (qualified !== undefined) {
    return { matched: true, qualified_name: qualified };
  }
  if (tables.ambiguous.has(key)) {
    return { matched: false };
  }
  const owner = tables.prefixes.get(key);
  return owner === undefined ? { matched: false } : { matched: true, qualified_name: owner };
}

// ---------------------------------------------------------------------------
// Internal
// ---------------------------------------------------------------------------

/** Every prefix-table key, sorted. Qualified self-mappings included. */
export function knownPrefixes(tables: NamingTables): string[] {
  return [...tables.prefixes.keys()].sort(compareCodeUnits);
}

function listOrNone(values: ReadonlyArray<string>): string {
  return values.length > 0 ? values.join(', ') : '(none)';
}

function failure(
  kind: ResolutionErrorKind,
  name: string,
  message: string,
  alternatives: ReadonlyArray<string>,
): ResolveResult {
  const error: ResolutionError = { kind, name, message, alternatives };
  return { ok: false, error };
}
