/**
 * Respack Pack Loader — Resource Registry
 *
 * The ResourceRegistry orchestrates discovery, table construction and
 * resolution, and delegates the final content fetch to the resolved pack.
 *
 * Registry invariants:
 * - configuration is read once, at construction
 * - discovery runs at most once per registry; concurrent first callers
 *   share the same pass. If enumeration itself fails the error propagates
 *   and a later call starts a fresh pass.
 * - after discovery the naming tables are frozen and shared read-only
 * - resource bytes are never cached
 */

import {
  ResolutionFailure,
  buildNamingTables,
  hashNamingTables,
  resolveName,
  resolvePackFilter,
} from '@respack/kernel';
import type {
  DiagnosticSink,
  NamingTables,
  NamingTablesHash,
  PackSource,
  RegisteredPack,
  ResolveResult,
  ResourceContent,
  ResourceInfo,
} from '@respack/kernel';
import {
  ConsoleDiagnosticSink,
  NodeModulesPackSource,
  resolveRegistryConfig,
} from '@respack/runtime-host';
import type { Environment, RegistryConfig, RegistryConfigOptions } from '@respack/runtime-host';
import { discoverPacks } from './discovery.js';
import { PackLoader } from './loader.js';

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface ResourceRegistryOptions extends RegistryConfigOptions {
  /** Where packs come from. Default: NodeModulesPackSource over cwd and pack paths. */
  readonly source?: PackSource | undefined;
  /** Where diagnostics go. Default: ConsoleDiagnosticSink. */
  readonly sink?: DiagnosticSink | undefined;
  /** Environment read for configuration. Default: process.env. */
  readonly env?: Environment | undefined;
  /** Base directory for the default source. Default: process.cwd(). */
  readonly cwd?: string | undefined;
}

// ---------------------------------------------------------------------------
// Resource Registry
// ---------------------------------------------------------------------------

export class ResourceRegistry {
  readonly config: RegistryConfig;
  private readonly source: PackSource;
  private readonly sink: DiagnosticSink;
  private readonly loader: PackLoader = new PackLoader();
  private discovery: Promise<NamingTables> | undefined;

  constructor(options: ResourceRegistryOptions = {}) {
    this.config = resolveRegistryConfig(options, options.env ?? process.env);
    this.sink = options.sink ?? new ConsoleDiagnosticSink(this.config.debug);
    this.source =
      options.source ??
      new NodeModulesPackSource({
        cwd: options.cwd,
        searchPaths: this.config.pack_paths,
        sink: this.sink,
      });
  }

  // -------------------------------------------------------------------------
  // Discovery
  // -------------------------------------------------------------------------

  /**
   * Run discovery if it has not run yet. Idempotent.
   */
  async discover(): Promise<void> {
    await this.tables();
  }

  /**
   * The frozen naming tables, discovering first if needed.
   */
  getNamingTables(): Promise<NamingTables> {
    return this.tables();
  }

  private tables(): Promise<NamingTables> {
    if (this.discovery === undefined) {
      this.discovery = this.runDiscovery().catch((err: unknown) => {
        this.discovery = undefined;
        throw err;
      });
    }
    return this.discovery;
  }

  private async runDiscovery(): Promise<NamingTables> {
    const packs = await discoverPacks(this.source, this.loader, this.config.blocklist, this.sink);
    const { tables, diagnostics } = buildNamingTables({
      packs,
      prefixMap: this.config.prefix_map,
      defaultPrefix: this.config.default_prefix,
      policy: this.config.collision_policy,
    });
    for (const diagnostic of diagnostics) {
      this.sink.emit(diagnostic);
    }
    return tables;
  }

  // -------------------------------------------------------------------------
  // Resolution
  // -------------------------------------------------------------------------

  /**
   * Resolve a name without fetching anything.
   */
  async resolveName(name: string): Promise<ResolveResult> {
    return resolveName(await this.tables(), name);
  }

  /**
   * Resolve a name and fetch the resource from its pack.
   *
   * @throws {ResolutionFailure} when the name does not resolve to a pack
   * @throws {ResourceNotFoundError} from the pack, unchanged
   */
  async getResource(name: string): Promise<ResourceContent> {
    const tables = await this.tables();
    const result = resolveName(tables, name);
    if (!result.ok) {
      throw new ResolutionFailure(result.error);
    }
    return this.packFor(tables, result.qualified_name).pack.getResource(result.resource_name);
  }

  /**
   * The registered record for a qualified name, matched case-insensitively.
   */
  async getRegisteredPack(qualified: string): Promise<RegisteredPack | undefined> {
    const tables = await this.tables();
    const canonical = tables.qualified.get(qualified.toLowerCase());
    return canonical === undefined ? undefined : tables.packs.get(canonical);
  }

  // -------------------------------------------------------------------------
  // Listing
  // -------------------------------------------------------------------------

  /**
   * List resources, optionally restricted to one pack.
   *
   * The filter is a qualified name or an unambiguous short prefix; any
   * other filter yields an empty list. Content types are best effort: a
   * failure for one resource is reported at debug level and leaves its
   * hint empty.
   */
  async listResources(packFilter?: string): Promise<ReadonlyArray<ResourceInfo>> {
    const tables = await this.tables();

    let packs: ReadonlyArray<RegisteredPack>;
    if (packFilter === undefined) {
      packs = [...tables.packs.values()];
    } else {
      const match = resolvePackFilter(tables, packFilter);
      packs = match.matched ? [this.packFor(tables, match.qualified_name)] : [];
    }

    const infos: ResourceInfo[] = [];
    for (const registered of packs) {
      for (const name of await registered.pack.listResources()) {
        infos.push({
          name,
          pack: registered.qualified_name,
          content_type: await this.contentTypeOf(registered, name),
        });
      }
    }
    return infos;
  }

  /**
   * Qualified names in discovery order.
   */
  async listPacks(): Promise<ReadonlyArray<string>> {
    return [...(await this.tables()).packs.keys()];
  }

  /**
   * Snapshot of the prefix table: lowercased prefix → qualified name.
   */
  async getPrefixMap(): Promise<Readonly<Record<string, string>>> {
    return Object.fromEntries((await this.tables()).prefixes);
  }

  /**
   * Snapshot of the collision ledger: prefix → every contending qualified name.
   */
  async getPrefixCollisions(): Promise<Readonly<Record<string, ReadonlyArray<string>>>> {
    const collisions = (await this.tables()).collisions;
    return Object.fromEntries([...collisions].map(([prefix, names]) => [prefix, [...names]]));
  }

  /**
   * Fingerprint of the naming tables.
   */
  async getTableHash(): Promise<NamingTablesHash> {
    return hashNamingTables(await this.tables());
  }

  // -------------------------------------------------------------------------
  // Internal
  // -------------------------------------------------------------------------

  private packFor(tables: NamingTables, qualified: string): RegisteredPack {
    const registered = tables.packs.get(qualified);
    if (registered === undefined) {
      throw new Error(`Naming tables reference unknown pack '${qualified}'`);
    }
    return registered;
  }

  private async contentTypeOf(registered: RegisteredPack, name: string): Promise<string | undefined> {
    try {
      if (registered.pack.getContentType !== undefined) {
        return registered.pack.getContentType(name);
      }
      return (await registered.pack.getResource(name)).content_type;
    } catch (err: unknown) {
      this.sink.emit({
        kind: 'content-type-unavailable',
        level: 'debug',
        qualified_name: registered.qualified_name,
        resource_name: name,
        message:
          `Could not determine content type of '${registered.qualified_name}:${name}': ` +
          (err instanceof Error ? err.message : String(err)),
      });
      return undefined;
    }
  }
}
