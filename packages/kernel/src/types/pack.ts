/**
 * Respack Kernel — Pack Types
 *
 * Defines the pack capability contract, pack metadata, and the registered
 * pack record.
 *
 * Packs are external to the kernel boundary. The kernel never constructs a
 * pack and never performs pack I/O; it only binds a pack instance to its
 * resolved identity and hands the instance back to the registry for the
 * final content fetch.
 */

import type { ResourceContent } from './resource.js';

// ---------------------------------------------------------------------------
// Pack Capability Contract
// ---------------------------------------------------------------------------

/**
 * Priority assigned to packs that do not declare one.
 * Only consulted under CollisionPolicy.Priority.
 */
export const DEFAULT_PACK_PRIORITY = 100;

/**
 * Descriptive metadata a pack may publish about itself.
 */
export interface PackInfo {
  /** Short human-readable description. */
  readonly description: string;
  /** Upstream project URL, if any. */
  readonly source_url?: string | undefined;
  /** SPDX identifier of the upstream content license. */
  readonly license_spdx?: string | undefined;
}

/**
 * The capability contract every pack implementation must satisfy.
 *
 * Required:
 * - getResource(): fetch one resource by name. Rejects with
 *   ResourceNotFoundError when the pack has no such resource.
 * - listResources(): every resource name. Must be restartable: each call
 *   returns the full, finite list.
 *
 * Optional capabilities are probed once at registration time and are
 * never required for resolution.
 */
export interface ResourcePack {
  getResource(name: string): Promise<ResourceContent>;
  listResources(): Promise<ReadonlyArray<string>> | ReadonlyArray<string>;
  /** Higher wins under CollisionPolicy.Priority. */
  getPriority?(): number;
  /** Additional short prefixes beyond the pack name. */
  getPrefixes?(): ReadonlyArray<string>;
  getPackInfo?(): PackInfo;
  /** Cheap content-type lookup used by listings; avoids loading the payload. */
  getContentType?(name: string): string | undefined;
  /** On-disk location of a resource, for packs that have one. */
  getResourcePath?(name: string): string | undefined;
}

// ---------------------------------------------------------------------------
// Registered Pack
// ---------------------------------------------------------------------------

/**
 * A pack bound to its resolved identity.
 *
 * Created once during discovery and frozen. `qualified_name` is globally
 * unique: distribution names are unique on the host, and pack names are
 * unique within a distribution.
 */
export interface RegisteredPack {
  /** Name of the installable unit that provided the pack. */
  readonly dist_name: string;
  /** Name the distribution gave this pack. */
  readonly pack_name: string;
  /** `dist_name/pack_name`. */
  readonly qualified_name: string;
  readonly pack: ResourcePack;
  /** Alias prefixes in declaration order. */
  readonly aliases: ReadonlyArray<string>;
  readonly priority: number;
}

/**
 * Build the qualified name for a distribution/pack pair.
 */
export function qualifiedName(distName: string, packName: string): string {
  return `${distName}/${packName}`;
}

/**
 * Construct a frozen RegisteredPack.
 */
export function createRegisteredPack(
  distName: string,
  packName: string,
  pack: ResourcePack,
  aliases: ReadonlyArray<string>,
  priority: number = DEFAULT_PACK_PRIORITY,
): RegisteredPack {
  return Object.freeze({
    dist_name: distName,
    pack_name: packName,
    qualified_name: qualifiedName(distName, packName),
    pack,
    aliases: Object.freeze([...aliases]),
    priority,
  });
}
