/**
 * Respack Runtime Host — Registry Configuration Tests
 *
 *   CFG-1: blocklist is the union of explicit and environment entries
 *   CFG-2: explicit prefix-map entries win over environment entries
 *   CFG-3: explicit default prefix and policy win over the environment
 *   CFG-4: malformed entries are dropped; unknown policies are errors
 *   CFG-5: pack paths and debug flag
 *
 * Isolation: every test passes its own environment object; process.env is
 * never read or modified.
 */

import { describe, it, expect } from 'vitest';
import { delimiter } from 'node:path';
import { CollisionPolicy } from '@respack/kernel';
import {
  RegistryConfigError,
  parseCollisionPolicy,
  parseList,
  parsePrefixMap,
  resolveRegistryConfig,
} from '../src/index.js';

describe('CFG-1: blocklist', () => {
  it('merges explicit and RESOURCE_DISCOVERY_BLOCKLIST entries', () => {
    const config = resolveRegistryConfig(
      { blocklist: ['lucide'] },
      { RESOURCE_DISCOVERY_BLOCKLIST: ' feather , acme-icons/mdi ,' },
    );
    expect([...config.blocklist].sort()).toEqual(['acme-icons/mdi', 'feather', 'lucide']);
  });

  it('is empty when neither source sets it', () => {
    expect(resolveRegistryConfig({}, {}).blocklist.size).toBe(0);
  });
});

describe('CFG-2: prefix map', () => {
  it('reads RESOURCE_PREFIX_MAP', () => {
    const config = resolveRegistryConfig({}, { RESOURCE_PREFIX_MAP: 'icons=acme-icons/lucide' });
    expect(config.prefix_map).toEqual({ icons: 'acme-icons/lucide' });
  });

  it('lets explicit entries override environment entries for the same alias', () => {
    const config = resolveRegistryConfig(
      { prefixMap: { icons: 'cool-icons/lucide' } },
      { RESOURCE_PREFIX_MAP: 'icons=acme-icons/lucide,fe=acme-icons/feather' },
    );
    expect(config.prefix_map).toEqual({ icons: 'cool-icons/lucide', fe: 'acme-icons/feather' });
  });
});

describe('CFG-3: default prefix and collision policy', () => {
  it('prefers the explicit default prefix', () => {
    const config = resolveRegistryConfig({ defaultPrefix: 'luc' }, { RESOURCE_DEFAULT_PREFIX: 'fe' });
    expect(config.default_prefix).toBe('luc');
  });

  it('falls back to RESOURCE_DEFAULT_PREFIX, ignoring blanks', () => {
    expect(resolveRegistryConfig({ defaultPrefix: '' }, { RESOURCE_DEFAULT_PREFIX: 'fe' }).default_prefix).toBe('fe');
    expect(resolveRegistryConfig({}, { RESOURCE_DEFAULT_PREFIX: '  ' }).default_prefix).toBeUndefined();
  });

  it('defaults to the ambiguous policy', () => {
    expect(resolveRegistryConfig({}, {}).collision_policy).toBe(CollisionPolicy.Ambiguous);
  });

  it('reads RESOURCE_COLLISION_POLICY case-insensitively', () => {
    const config = resolveRegistryConfig({}, { RESOURCE_COLLISION_POLICY: 'Priority' });
    expect(config.collision_policy).toBe(CollisionPolicy.Priority);
  });

  it('prefers the explicit policy', () => {
    const config = resolveRegistryConfig(
      { collisionPolicy: CollisionPolicy.Ambiguous },
      { RESOURCE_COLLISION_POLICY: 'priority' },
    );
    expect(config.collision_policy).toBe(CollisionPolicy.Ambiguous);
  });
});

describe('CFG-4: malformed values', () => {
  it('drops list blanks', () => {
    expect(parseList(',a,, b ,')).toEqual(['a', 'b']);
    expect(parseList(undefined)).toEqual([]);
  });

  it('drops prefix-map entries without = or with an empty side', () => {
    expect(parsePrefixMap('broken,=x/y,z=,ok=a/b, sp = c/d ')).toEqual({ ok: 'a/b', sp: 'c/d' });
  });

  it('rejects an unknown policy', () => {
    expect(() => parseCollisionPolicy('loudest')).toThrow(RegistryConfigError);
    expect(() => resolveRegistryConfig({}, { RESOURCE_COLLISION_POLICY: 'loudest' })).toThrow(
      "Unknown collision policy 'loudest'. Expected one of: ambiguous, priority",
    );
  });
});

describe('CFG-5: pack paths and debug', () => {
  it('appends RESPACK_PACK_PATH entries after explicit paths', () => {
    const config = resolveRegistryConfig(
      { packPaths: ['/opt/packs'] },
      { RESPACK_PACK_PATH: ['/srv/a', '', '/srv/b'].join(delimiter) },
    );
    expect(config.pack_paths).toEqual(['/opt/packs', '/srv/a', '/srv/b']);
  });

  it('enables debug when RESPACK_DEBUG is non-empty', () => {
    expect(resolveRegistryConfig({}, { RESPACK_DEBUG: '1' }).debug).toBe(true);
    expect(resolveRegistryConfig({}, { RESPACK_DEBUG: '' }).debug).toBe(false);
    expect(resolveRegistryConfig({ debug: false }, { RESPACK_DEBUG: '1' }).debug).toBe(false);
  });
});
