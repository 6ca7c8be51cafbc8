/**
 * Respack Directory Pack — Directory-backed Resource Pack
 *
 * A reusable ResourcePack serving files from a directory. Pack authors
 * ship a directory of resources plus an optional pack_manifest.json and
 * export a factory that constructs this class.
 *
 * Layout (defaults):
 *
 *   <root>/
 *     pack_manifest.json
 *     resources/
 *       home.svg
 *       outlined/home.svg
 *
 * Resource names are '/'-separated paths relative to the resource
 * directory. The manifest is read once, on first use; a missing or
 * unparsable manifest counts as empty. Constructor options take
 * precedence over manifest values.
 *
 * PATH SCOPE: names that resolve outside the resource directory are
 * treated as missing. The pack never reads outside it.
 */

import { readFileSync } from 'node:fs';
import type { Dirent } from 'node:fs';
import { readFile, readdir } from 'node:fs/promises';
import { isAbsolute, join, relative, resolve, sep } from 'node:path';
import {
  DEFAULT_PACK_PRIORITY,
  ResourceNotFoundError,
  compareCodeUnits,
  createResourceContent,
  defaultEncodingFor,
} from '@respack/kernel';
import type { PackInfo, ResourceContent, ResourcePack } from '@respack/kernel';
import { isNodeError } from '@respack/runtime-host';
import { EMPTY_MANIFEST, parsePackManifest } from './manifest.js';
import type { PackManifest } from './manifest.js';

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export const DEFAULT_RESOURCE_DIR = 'resources';
export const DEFAULT_MANIFEST_NAME = 'pack_manifest.json';
export const FALLBACK_CONTENT_TYPE = 'application/octet-stream';

/** Maximum number of similar names offered on a miss. */
const MAX_SUGGESTIONS = 5;

export interface DirectoryResourcePackOptions {
  /** Pack root; holds the manifest and the resource directory. */
  readonly root: string;
  /** Resource directory, relative to root. Default: 'resources'. */
  readonly resourceDir?: string | undefined;
  /** Manifest file name, relative to root. Default: 'pack_manifest.json'. */
  readonly manifestName?: string | undefined;
  /** Content type of every resource. Default: manifest contents.format. */
  readonly defaultContentType?: string | undefined;
  /** Alias prefixes. Default: manifest pack.prefixes. */
  readonly prefixes?: ReadonlyArray<string> | undefined;
  /** Pack metadata. Default: built from the manifest. */
  readonly packInfo?: PackInfo | undefined;
  /** Collision priority. Default: manifest pack.priority, else 100. */
  readonly priority?: number | undefined;
}

// ---------------------------------------------------------------------------
// DirectoryResourcePack
// ---------------------------------------------------------------------------

export class DirectoryResourcePack implements ResourcePack {
  protected readonly root: string;
  protected readonly resourceRoot: string;
  private readonly manifestPath: string;
  private manifest: PackManifest | undefined;
  private resourceList: Promise<ReadonlyArray<string>> | undefined;

  constructor(private readonly options: DirectoryResourcePackOptions) {
    this.root = resolve(options.root);
    this.resourceRoot = resolve(this.root, options.resourceDir ?? DEFAULT_RESOURCE_DIR);
    this.manifestPath = join(this.root, options.manifestName ?? DEFAULT_MANIFEST_NAME);
  }

  // -------------------------------------------------------------------------
  // Manifest-backed metadata
  // -------------------------------------------------------------------------

  /**
   * The parsed manifest. Read on first call and cached.
   */
  getManifest(): PackManifest {
    if (this.manifest === undefined) {
      this.manifest = readManifest(this.manifestPath);
    }
    return this.manifest;
  }

  get contentType(): string {
    return (
      this.options.defaultContentType ??
      this.getManifest().contents.format ??
      FALLBACK_CONTENT_TYPE
    );
  }

  getPrefixes(): ReadonlyArray<string> {
    return this.options.prefixes ?? this.getManifest().pack.prefixes ?? [];
  }

  getPackInfo(): PackInfo {
    if (this.options.packInfo !== undefined) {
      return this.options.packInfo;
    }
    const pack = this.getManifest().pack;
    return {
      description: pack.description ?? 'Resource pack',
      source_url: pack.source_url,
      license_spdx: pack.upstream_license,
    };
  }

  getPriority(): number {
    return this.options.priority ?? this.getManifest().pack.priority ?? DEFAULT_PACK_PRIORITY;
  }

  getContentType(_name: string): string {
    return this.contentType;
  }

  // -------------------------------------------------------------------------
  // Resources
  // -------------------------------------------------------------------------

  /**
   * Absolute path of a resource, or undefined when the name escapes the
   * resource directory. Does not check that the file exists.
   */
  getResourcePath(name: string): string | undefined {
    const normalized = this.normalizeName(name);
    if (normalized === '' || normalized.includes('\0')) return undefined;
    const target = resolve(this.resourceRoot, normalized);
    const rel = relative(this.resourceRoot, target);
    if (rel === '' || rel.startsWith('..') || isAbsolute(rel)) return undefined;
    return target;
  }

  async getResource(name: string): Promise<ResourceContent> {
    const path = this.getResourcePath(name);
    if (path === undefined) {
      throw await this.notFound(name);
    }

    let bytes: Uint8Array;
    try {
      const buffer = await readFile(path);
      bytes = new Uint8Array(buffer.buffer, buffer.byteOffset, buffer.byteLength);
    } catch (err: unknown) {
      if (isNodeError(err, 'ENOENT', 'EISDIR', 'ENOTDIR')) {
        throw await this.notFound(name);
      }
      throw err;
    }

    const contentType = this.contentType;
    return createResourceContent(bytes, contentType, {
      encoding: defaultEncodingFor(contentType),
      metadata: { pack_version: this.getManifest().pack.version ?? null },
    });
  }

  /**
   * Every file under the resource directory, sorted. Listed once and
   * cached; a missing resource directory lists as empty. A failed listing
   * is not cached.
   */
  listResources(): Promise<ReadonlyArray<string>> {
    if (this.resourceList === undefined) {
      this.resourceList = walk(this.resourceRoot).then(
        (files) =>
          files
            .map((file) => relative(this.resourceRoot, file).split(sep).join('/'))
            .sort(compareCodeUnits),
        (err: unknown) => {
          this.resourceList = undefined;
          throw err;
        },
      );
    }
    return this.resourceList;
  }

  /**
   * Map a caller-supplied name to the file name looked up on disk.
   * Identity by default; subclasses add extensions or rewrite paths.
   */
  protected normalizeName(name: string): string {
    return name;
  }

  private async notFound(name: string): Promise<ResourceNotFoundError> {
    const needle = name.toLowerCase();
    const suggestions = (await this.listResources())
      .filter((candidate) => {
        const lower = candidate.toLowerCase();
        return lower.includes(needle) || needle.includes(lower);
      })
      .slice(0, MAX_SUGGESTIONS);
    return new ResourceNotFoundError(name, suggestions);
  }
}

// ---------------------------------------------------------------------------
// SvgIconPack
// ---------------------------------------------------------------------------

/**
 * A directory pack of SVG icons addressed without their extension:
 * `home` and `home.svg` name the same file.
 */
export class SvgIconPack extends DirectoryResourcePack {
  constructor(options: DirectoryResourcePackOptions) {
    super({ defaultContentType: 'image/svg+xml', ...options });
  }

  protected override normalizeName(name: string): string {
    return name.toLowerCase().endsWith('.svg') ? name : `${name}.svg`;
  }
}

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

/**
 * Read and parse the manifest. ENOENT and SyntaxError mean "no manifest";
 * other I/O errors are rethrown.
 */
function readManifest(path: string): PackManifest {
  try {
    return parsePackManifest(JSON.parse(readFileSync(path, 'utf-8')));
  } catch (err: unknown) {
    if (err instanceof SyntaxError || isNodeError(err, 'ENOENT', 'ENOTDIR')) {
      return EMPTY_MANIFEST;
    }
    throw err;
  }
}

async function walk(dir: string): Promise<string[]> {
  let entries: Dirent[];
  try {
    entries = await readdir(dir, { withFileTypes: true });
  } catch (err: unknown) {
    if (isNodeError(err, 'ENOENT', 'ENOTDIR')) {
      return [];
    }
    throw err;
  }
  const files: string[] = [];
  for (const entry of entries) {
    const full = join(dir, entry.name);
    if (entry.isDirectory()) {
      files.push(...(await walk(full)));
    } else if (entry.isFile()) {
      files.push(full);
    }
  }
  return files;
}
