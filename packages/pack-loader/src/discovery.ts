/**
 * Respack Pack Loader — Discovery Pass
 *
 * One pass over a PackSource: enumerate, drop blocklisted entries, load
 * the rest. Rejections are reported to the sink at debug level and
 * otherwise dropped; they are "pack not available", not errors.
 *
 * A failure of enumerate() itself is not per-entry and propagates.
 */

import { qualifiedName, UNKNOWN_DIST_NAME } from '@respack/kernel';
import type { DiagnosticSink, PackSource, RegisteredPack } from '@respack/kernel';
import type { PackLoader } from './loader.js';

/**
 * True when the pack is excluded by short or qualified name. Matching is
 * case-insensitive, like prefix lookup.
 */
export function isBlocked(
  blocklist: ReadonlySet<string>,
  packName: string,
  qualified: string,
): boolean {
  for (const entry of blocklist) {
    const key = entry.toLowerCase();
    if (key === packName.toLowerCase() || key === qualified.toLowerCase()) {
      return true;
    }
  }
  return false;
}

export async function discoverPacks(
  source: PackSource,
  loader: PackLoader,
  blocklist: ReadonlySet<string>,
  sink: DiagnosticSink,
): Promise<RegisteredPack[]> {
  const registrations = await source.enumerate();
  const packs: RegisteredPack[] = [];

  for (const registration of registrations) {
    const distName = registration.dist_name ?? UNKNOWN_DIST_NAME;
    const qualified = qualifiedName(distName, registration.pack_name);
    if (isBlocked(blocklist, registration.pack_name, qualified)) {
      continue;
    }

    const result = await loader.load(registration);
    if (result.ok) {
      packs.push(result.pack);
      continue;
    }
    sink.emit({
      kind: 'pack-rejected',
      level: 'debug',
      dist_name: distName,
      pack_name: registration.pack_name,
      reason: result.reason,
      message:
        `Skipping pack '${qualified}': ${result.reason}` +
        (result.details !== undefined ? ` (${result.details})` : ''),
    });
  }
  return packs;
}
