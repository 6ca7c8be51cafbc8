/**
 * Shared by `get` and `info`: fetch a resource and find out where it came from.
 */

import type { RegisteredPack, ResourceContent } from '@respack/kernel';
import type { ResourceRegistry } from '@respack/pack-loader';

export interface ResourceLookup {
  readonly resource: ResourceContent;
  /** Qualified name of the owning pack, or 'unknown'. */
  readonly pack: string;
  readonly registered: RegisteredPack | undefined;
  readonly path: string | undefined;
}

/**
 * @throws {ResolutionFailure} when the name does not resolve
 * @throws {ResourceNotFoundError} when the pack has no such resource
 */
export async function lookupResource(registry: ResourceRegistry, name: string): Promise<ResourceLookup> {
  const resource = await registry.getResource(name);
  const resolved = await registry.resolveName(name);
  if (!resolved.ok) {
    return { resource, pack: 'unknown', registered: undefined, path: undefined };
  }
  const registered = await registry.getRegisteredPack(resolved.qualified_name);
  return {
    resource,
    pack: resolved.qualified_name,
    registered,
    path: registered?.pack.getResourcePath?.(resolved.resource_name),
  };
}
