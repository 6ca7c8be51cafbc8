/**
 * @respack/pack-loader
 *
 * Pack loading and the resource registry: factory normalization,
 * capability validation, discovery passes and the ResourceRegistry
 * orchestrator.
 */

export type { NormalizedFactoryResult } from './normalize.js';
export { normalizeFactoryResult } from './normalize.js';

export { PackValidator, isResourcePack } from './validator.js';

export type { PackLoadResult } from './loader.js';
export { PackLoader } from './loader.js';

export { discoverPacks, isBlocked } from './discovery.js';

export type { ResourceRegistryOptions } from './registry.js';
export { ResourceRegistry } from './registry.js';

export { getDefaultRegistry, resetDefaultRegistry } from './default-registry.js';
