/**
 * @respack/runtime-host
 *
 * Respack runtime host: everything that touches the host environment.
 * Depends on @respack/kernel (interfaces); implements configuration
 * resolution, pack sources and diagnostic sinks using Node.js built-ins.
 *
 * No kernel code imports from this package.
 */

// Configuration
export type { Environment, RegistryConfig, RegistryConfigOptions } from './config.js';
export {
  ENV_BLOCKLIST,
  ENV_COLLISION_POLICY,
  ENV_DEBUG,
  ENV_DEFAULT_PREFIX,
  ENV_PACK_PATH,
  ENV_PREFIX_MAP,
  RegistryConfigError,
  parseCollisionPolicy,
  parseList,
  parsePathList,
  parsePrefixMap,
  resolveRegistryConfig,
} from './config.js';

// Pack sources
export type { MemoryPackEntry } from './sources/memory.js';
export { CompositePackSource, MemoryPackSource } from './sources/memory.js';
export type { NodeModulesPackSourceOptions } from './sources/node-modules.js';
export { MANIFEST_FIELD, NodeModulesPackSource, loadFactory } from './sources/node-modules.js';

// Diagnostic sinks
export type { LineWriter } from './logging/console-sink.js';
export { ConsoleDiagnosticSink, formatDiagnostic } from './logging/console-sink.js';
export { MemoryDiagnosticSink } from './logging/memory-sink.js';

export { isNodeError } from './fs-errors.js';
