/**
 * Respack Runtime Host — node_modules Pack Source
 *
 * Discovers packs declared by installed npm packages. A package declares
 * its packs in package.json:
 *
 *   {
 *     "name": "acme-icons",
 *     "respack": { "packs": { "lucide": "./dist/lucide.js" } }
 *   }
 *
 * The package name becomes the distribution name; each key is a pack
 * name; each value is a module path relative to the package root whose
 * default export (or named `createPack` export) is the pack factory.
 *
 * Search roots: `<cwd>/node_modules`, then each extra search path. Each
 * root is scanned one level deep, plus one level inside `@scope/`
 * directories. Modules are imported only when the loader calls load().
 *
 * A package whose package.json cannot be read, or an @scope directory that
 * cannot be listed, is skipped with a `package-skipped` debug diagnostic.
 * Only a failure to list a search root itself propagates.
 */

import { readFile, readdir } from 'node:fs/promises';
import { isAbsolute, join, relative, resolve } from 'node:path';
import { pathToFileURL } from 'node:url';
import { field, isRecord, stringField } from '@respack/kernel';
import type { DiagnosticSink, PackSource, RawPackRegistration } from '@respack/kernel';
import { isNodeError } from '../fs-errors.js';

/** The package.json field that holds pack declarations. */
export const MANIFEST_FIELD = 'respack';

export interface NodeModulesPackSourceOptions {
  /** Directory whose node_modules is scanned first. Default: process.cwd(). */
  readonly cwd?: string | undefined;
  /** Extra roots, each scanned like a node_modules directory. */
  readonly searchPaths?: ReadonlyArray<string> | undefined;
  /** Receives `package-skipped` diagnostics. Default: none. */
  readonly sink?: DiagnosticSink | undefined;
}

export class NodeModulesPackSource implements PackSource {
  private readonly roots: ReadonlyArray<string>;
  private readonly sink: DiagnosticSink | undefined;

  constructor(options: NodeModulesPackSourceOptions = {}) {
    const cwd = options.cwd ?? process.cwd();
    this.sink = options.sink;
    this.roots = [
      join(cwd, 'node_modules'),
      ...(options.searchPaths ?? []).map((p) => resolve(cwd, p)),
    ];
  }

  /** The directories scanned, in order. */
  get searchRoots(): ReadonlyArray<string> {
    return this.roots;
  }

  async enumerate(): Promise<ReadonlyArray<RawPackRegistration>> {
    const registrations: RawPackRegistration[] = [];
    for (const root of this.roots) {
      for (const packageDir of await this.listPackageDirs(root)) {
        registrations.push(...(await this.readRegistrations(packageDir)));
      }
    }
    return registrations;
  }

  // -------------------------------------------------------------------------
  // Directory scanning
  // -------------------------------------------------------------------------

  /**
   * Package directories directly under `root`, including `@scope/*`.
   * A missing root yields nothing; an unreadable root throws.
   */
  private async listPackageDirs(root: string): Promise<string[]> {
    const dirs: string[] = [];
    for (const name of await readdirOrEmpty(root)) {
      if (name.startsWith('.')) continue;
      if (!name.startsWith('@')) {
        dirs.push(join(root, name));
        continue;
      }
      const scopeDir = join(root, name);
      let scoped: string[];
      try {
        scoped = await readdirOrEmpty(scopeDir);
      } catch (err: unknown) {
        this.skip(scopeDir, `cannot list scope directory: ${errorText(err)}`);
        continue;
      }
      for (const entry of scoped) {
        if (!entry.startsWith('.')) dirs.push(join(scopeDir, entry));
      }
    }
    return dirs;
  }

  // -------------------------------------------------------------------------
  // package.json
  // -------------------------------------------------------------------------

  /**
   * Parse package.json. A missing file means "not a package" silently;
   * any other read or parse failure skips the package with a diagnostic.
   */
  private async readPackageJson(packageDir: string): Promise<unknown> {
    let text: string;
    try {
      text = await readFile(join(packageDir, 'package.json'), 'utf-8');
    } catch (err: unknown) {
      if (!isNodeError(err, 'ENOENT', 'ENOTDIR')) {
        this.skip(packageDir, `cannot read package.json: ${errorText(err)}`);
      }
      return undefined;
    }
    try {
      return JSON.parse(text);
    } catch (err: unknown) {
      this.skip(packageDir, `cannot parse package.json: ${errorText(err)}`);
      return undefined;
    }
  }

  private async readRegistrations(packageDir: string): Promise<RawPackRegistration[]> {
    const manifest = await this.readPackageJson(packageDir);
    const packs = field(field(manifest, MANIFEST_FIELD), 'packs');
    if (!isRecord(packs)) return [];

    const distName = stringField(manifest, 'name');
    const registrations: RawPackRegistration[] = [];
    for (const [packName, modulePath] of Object.entries(packs)) {
      registrations.push({
        dist_name: distName,
        pack_name: packName,
        load: () => loadFactory(packageDir, modulePath),
      });
    }
    return registrations;
  }

  private skip(path: string, reason: string): void {
    this.sink?.emit({
      kind: 'package-skipped',
      level: 'debug',
      path,
      message: `Skipping '${path}': ${reason}`,
    });
  }
}

async function readdirOrEmpty(dir: string): Promise<string[]> {
  try {
    return (await readdir(dir)).sort();
  } catch (err: unknown) {
    if (isNodeError(err, 'ENOENT', 'ENOTDIR')) {
      return [];
    }
    throw err;
  }
}

function errorText(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// ---------------------------------------------------------------------------
// Internal: factory loading
// ---------------------------------------------------------------------------

/**
 * Import a declared module and pick its factory export.
 *
 * Preference: a callable default export, then a callable `createPack`
 * export (top level, or on the default export of a CommonJS module),
 * then the default export as-is for the loader to reject.
 */
export async function loadFactory(packageDir: string, modulePath: unknown): Promise<unknown> {
  if (typeof modulePath !== 'string' || modulePath === '') {
    throw new Error(`Pack module path must be a non-empty string, got ${JSON.stringify(modulePath)}`);
  }
  const target = resolve(packageDir, modulePath);
  const rel = relative(packageDir, target);
  if (rel.startsWith('..') || isAbsolute(rel)) {
    throw new Error(`Pack module path '${modulePath}' points outside its package`);
  }

  const mod: unknown = await import(pathToFileURL(target).href);
  const defaultExport = field(mod, 'default');
  if (typeof defaultExport === 'function') return defaultExport;

  const named = field(mod, 'createPack') ?? field(defaultExport, 'createPack');
  if (typeof named === 'function') return named;

  return defaultExport;
}
