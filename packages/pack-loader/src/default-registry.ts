/**
 * Respack Pack Loader — Default Registry
 *
 * A process-wide convenience registry held in an explicit, resettable
 * cell. Library code should take a ResourceRegistry as a parameter; this
 * accessor exists for scripts.
 *
 * The first call creates the registry. Later calls return the same one,
 * whatever options they pass, until resetDefaultRegistry().
 */

import { ResourceRegistry } from './registry.js';
import type { ResourceRegistryOptions } from './registry.js';

let defaultRegistry: ResourceRegistry | undefined;

export function getDefaultRegistry(options?: ResourceRegistryOptions): ResourceRegistry {
  if (defaultRegistry === undefined) {
    defaultRegistry = new ResourceRegistry(options);
  }
  return defaultRegistry;
}

/**
 * Discard the default registry. The next getDefaultRegistry() builds a
 * fresh one, re-reading configuration.
 */
export function resetDefaultRegistry(): void {
  defaultRegistry = undefined;
}
