/**
 * Respack Runtime Host — Registry Configuration
 *
 * Resolves the registry's configuration from explicit options and the
 * environment. Read once, at registry construction; later environment
 * changes do not affect an existing registry.
 *
 * Precedence per setting:
 *
 *   blocklist        explicit ∪ RESOURCE_DISCOVERY_BLOCKLIST
 *   prefix map       explicit entries win over RESOURCE_PREFIX_MAP entries
 *   default prefix   explicit, else RESOURCE_DEFAULT_PREFIX
 *   collision policy explicit, else RESOURCE_COLLISION_POLICY, else ambiguous
 *   pack paths       explicit, then RESPACK_PACK_PATH entries
 *   debug            explicit, else RESPACK_DEBUG set and non-empty
 *
 * Malformed list and map entries are dropped. An unrecognized collision
 * policy is an error: there is no safe guess between the two.
 */

import { delimiter } from 'node:path';
import { CollisionPolicy } from '@respack/kernel';

// ---------------------------------------------------------------------------
// Environment variable names
// ---------------------------------------------------------------------------

export const ENV_BLOCKLIST = 'RESOURCE_DISCOVERY_BLOCKLIST';
export const ENV_PREFIX_MAP = 'RESOURCE_PREFIX_MAP';
export const ENV_DEFAULT_PREFIX = 'RESOURCE_DEFAULT_PREFIX';
export const ENV_COLLISION_POLICY = 'RESOURCE_COLLISION_POLICY';
export const ENV_PACK_PATH = 'RESPACK_PACK_PATH';
export const ENV_DEBUG = 'RESPACK_DEBUG';

/** A read-only view of environment variables. */
export type Environment = Readonly<Record<string, string | undefined>>;

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/**
 * Explicit configuration, typically from constructor arguments or CLI flags.
 */
export interface RegistryConfigOptions {
  readonly blocklist?: Iterable<string> | undefined;
  /** alias → qualified name (`dist/pack`). */
  readonly prefixMap?: Readonly<Record<string, string>> | undefined;
  readonly defaultPrefix?: string | undefined;
  readonly collisionPolicy?: CollisionPolicy | undefined;
  readonly packPaths?: ReadonlyArray<string> | undefined;
  readonly debug?: boolean | undefined;
}

/**
 * Fully resolved configuration.
 */
export interface RegistryConfig {
  /** Short or qualified pack names excluded from discovery. */
  readonly blocklist: ReadonlySet<string>;
  readonly prefix_map: Readonly<Record<string, string>>;
  readonly default_prefix: string | undefined;
  readonly collision_policy: CollisionPolicy;
  readonly pack_paths: ReadonlyArray<string>;
  readonly debug: boolean;
}

/**
 * Raised for configuration values that cannot be interpreted.
 */
export class RegistryConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RegistryConfigError';
  }
}

// ---------------------------------------------------------------------------
// Parsers
// ---------------------------------------------------------------------------

/**
 * Split a comma-separated list, trimming entries and dropping blanks.
 */
export function parseList(raw: string | undefined): string[] {
  if (raw === undefined) return [];
  return raw
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry !== '');
}

/**
 * Parse `alias=dist/pack,alias2=dist2/pack2`.
 *
 * Entries without '=' or with an empty side are dropped. Splits at the
 * first '=' so targets may contain it. A later duplicate alias wins.
 */
export function parsePrefixMap(raw: string | undefined): Record<string, string> {
  const result: Record<string, string> = {};
  for (const entry of parseList(raw)) {
    const eq = entry.indexOf('=');
    if (eq === -1) continue;
    const alias = entry.slice(0, eq).trim();
    const target = entry.slice(eq + 1).trim();
    if (alias === '' || target === '') continue;
    result[alias] = target;
  }
  return result;
}

/**
 * Parse a collision policy name, case-insensitively.
 *
 * @returns undefined for an absent or blank value
 * @throws {RegistryConfigError} for any other unrecognized value
 */
export function parseCollisionPolicy(raw: string | undefined): CollisionPolicy | undefined {
  if (raw === undefined || raw.trim() === '') return undefined;
  const value = raw.trim().toLowerCase();
  for (const policy of Object.values(CollisionPolicy)) {
    if (policy === value) return policy;
  }
  throw new RegistryConfigError(
    `Unknown collision policy '${raw}'. Expected one of: ${Object.values(CollisionPolicy).join(', ')}`,
  );
}

/**
 * Split a path list on the platform delimiter (':' on POSIX, ';' on Windows).
 */
export function parsePathList(raw: string | undefined): string[] {
  if (raw === undefined) return [];
  return raw
    .split(delimiter)
    .map((entry) => entry.trim())
    .filter((entry) => entry !== '');
}

function nonEmpty(value: string | undefined): string | undefined {
  return value !== undefined && value.trim() !== '' ? value.trim() : undefined;
}

// ---------------------------------------------------------------------------
// Resolution
// ---------------------------------------------------------------------------

/**
 * Merge explicit options with the environment.
 *
 * @param options - Explicit configuration; wins wherever the table above says so
 * @param env - Environment to read; defaults to process.env
 */
export function resolveRegistryConfig(
  options: RegistryConfigOptions = {},
  env: Environment = process.env,
): RegistryConfig {
  const blocklist = new Set<string>(options.blocklist ?? []);
  for (const name of parseList(env[ENV_BLOCKLIST])) {
    blocklist.add(name);
  }

  const prefixMap: Record<string, string> = {
    ...parsePrefixMap(env[ENV_PREFIX_MAP]),
    ...(options.prefixMap ?? {}),
  };

  return Object.freeze({
    blocklist,
    prefix_map: Object.freeze(prefixMap),
    default_prefix: nonEmpty(options.defaultPrefix) ?? nonEmpty(env[ENV_DEFAULT_PREFIX]),
    collision_policy:
      options.collisionPolicy ??
      parseCollisionPolicy(env[ENV_COLLISION_POLICY]) ??
      CollisionPolicy.Ambiguous,
    pack_paths: Object.freeze([...(options.packPaths ?? []), ...parsePathList(env[ENV_PACK_PATH])]),
    debug: options.debug ?? nonEmpty(env[ENV_DEBUG]) !== undefined,
  });
}
