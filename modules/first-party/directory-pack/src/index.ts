/**
 * @respack/directory-pack
 *
 * First-party filesystem-backed resource pack. Exports the pack classes
 * and a helper that turns pack options into a factory for a package's
 * `respack.packs` entry.
 */

import { DirectoryResourcePack, SvgIconPack } from './directory-pack.js';
import type { DirectoryResourcePackOptions } from './directory-pack.js';

export type { DirectoryResourcePackOptions } from './directory-pack.js';
export {
  DEFAULT_MANIFEST_NAME,
  DEFAULT_RESOURCE_DIR,
  DirectoryResourcePack,
  FALLBACK_CONTENT_TYPE,
  SvgIconPack,
} from './directory-pack.js';
export type { PackManifest } from './manifest.js';
export { EMPTY_MANIFEST, parsePackManifest } from './manifest.js';

/**
 * Build a pack factory for a module's default export:
 *
 *   export default directoryPackFactory({ root: new URL('..', import.meta.url).pathname });
 */
export function directoryPackFactory(
  options: DirectoryResourcePackOptions,
  kind: 'directory' | 'svg' = 'directory',
): () => DirectoryResourcePack {
  return () => (kind === 'svg' ? new SvgIconPack(options) : new DirectoryResourcePack(options));
}
