/**
 * Respack Directory Pack — Tests
 *
 *   DP-1: listing is recursive, sorted, '/'-separated and cached
 *   DP-2: content type, encoding and metadata come from the manifest
 *   DP-3: a missing or unparsable manifest counts as empty
 *   DP-4: constructor options take precedence over the manifest
 *   DP-5: misses raise ResourceNotFoundError with similar names
 *   DP-6: names escaping the resource directory are missing
 *   DP-7: SvgIconPack accepts names with or without the extension
 *   DP-8: a directory pack registers and resolves through the registry
 *
 * Isolation: each test writes its own temp directory.
 */

import { describe, it, expect } from 'vitest';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import { ResourceNotFoundError, resourceText } from '@respack/kernel';
import { MemoryDiagnosticSink, MemoryPackSource } from '@respack/runtime-host';
import { ResourceRegistry } from '@respack/pack-loader';
import { DirectoryResourcePack, SvgIconPack, directoryPackFactory } from '../src/index.js';

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

const SVG = '<svg xmlns="http://www.w3.org/2000/svg"/>';

function makePack(
  files: Record<string, string>,
  manifest?: unknown,
): string {
  const root = mkdtempSync(join(tmpdir(), 'respack-dir-'));
  for (const [name, content] of Object.entries(files)) {
    const path = join(root, 'resources', name);
    mkdirSync(dirname(path), { recursive: true });
    writeFileSync(path, content, 'utf-8');
  }
  if (manifest !== undefined) {
    writeFileSync(
      join(root, 'pack_manifest.json'),
      typeof manifest === 'string' ? manifest : JSON.stringify(manifest),
      'utf-8',
    );
  }
  return root;
}

const ICON_MANIFEST = {
  pack: {
    version: '1.2.0',
    description: 'Test icons',
    prefixes: ['luc'],
    source_url: 'https://example.invalid/icons',
    upstream_license: 'ISC',
    priority: 150,
  },
  contents: { format: 'image/svg+xml' },
};

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('DirectoryResourcePack', () => {
  it('DP-1: lists nested files sorted with forward slashes', async () => {
    const root = makePack({
      'star.svg': SVG,
      'outlined/home.svg': SVG,
      'home.svg': SVG,
    });
    const pack = new DirectoryResourcePack({ root });

    expect(await pack.listResources()).toEqual(['home.svg', 'outlined/home.svg', 'star.svg']);
  });

  it('DP-1: caches the listing after the first call', async () => {
    const root = makePack({ 'a.txt': 'a' });
    const pack = new DirectoryResourcePack({ root });

    expect(await pack.listResources()).toEqual(['a.txt']);
    writeFileSync(join(root, 'resources', 'b.txt'), 'b', 'utf-8');
    expect(await pack.listResources()).toEqual(['a.txt']);
  });

  it('DP-1: a missing resource directory lists as empty', async () => {
    const root = makePack({});
    expect(await new DirectoryResourcePack({ root }).listResources()).toEqual([]);
  });

  it('DP-2: serves bytes with the manifest content type and version', async () => {
    const root = makePack({ 'home.svg': SVG }, ICON_MANIFEST);
    const pack = new DirectoryResourcePack({ root });

    const content = await pack.getResource('home.svg');
    expect(content.content_type).toBe('image/svg+xml');
    expect(content.encoding).toBe('utf-8');
    expect(resourceText(content)).toBe(SVG);
    expect(content.metadata).toEqual({ pack_version: '1.2.0' });

    expect(pack.getPrefixes()).toEqual(['luc']);
    expect(pack.getPriority()).toBe(150);
    expect(pack.getContentType('home.svg')).toBe('image/svg+xml');
    expect(pack.getPackInfo()).toEqual({
      description: 'Test icons',
      source_url: 'https://example.invalid/icons',
      license_spdx: 'ISC',
    });
  });

  it('DP-3: without a manifest, resources are binary with defaults', async () => {
    const root = makePack({ 'blob.bin': 'xyz' });
    const pack = new DirectoryResourcePack({ root });

    const content = await pack.getResource('blob.bin');
    expect(content.content_type).toBe('application/octet-stream');
    expect(content.encoding).toBeUndefined();
    expect(content.metadata).toEqual({ pack_version: null });
    expect(pack.getPrefixes()).toEqual([]);
    expect(pack.getPriority()).toBe(100);
    expect(pack.getPackInfo()).toEqual({
      description: 'Resource pack',
      source_url: undefined,
      license_spdx: undefined,
    });
  });

  it('DP-3: an unparsable manifest counts as empty', () => {
    const root = makePack({ 'a.txt': 'a' }, '{ not json');
    const pack = new DirectoryResourcePack({ root });

    expect(pack.getManifest()).toEqual({ pack: {}, contents: {} });
    expect(pack.getContentType('a.txt')).toBe('application/octet-stream');
  });

  it('DP-3: mistyped manifest fields are ignored', () => {
    const root = makePack({}, { pack: { version: 3, prefixes: 'luc', priority: 'high' } });
    const pack = new DirectoryResourcePack({ root });

    expect(pack.getPrefixes()).toEqual([]);
    expect(pack.getPriority()).toBe(100);
    expect(pack.getManifest().pack.version).toBeUndefined();
  });

  it('DP-3: a fractional manifest priority is ignored', () => {
    const root = makePack({}, { pack: { priority: 1.5 } });
    const pack = new DirectoryResourcePack({ root });

    expect(pack.getPriority()).toBe(100);
    expect(pack.getManifest().pack.priority).toBeUndefined();
  });

  it('DP-3: the manifest is read once', () => {
    const root = makePack({}, ICON_MANIFEST);
    const pack = new DirectoryResourcePack({ root });

    expect(pack.getPrefixes()).toEqual(['luc']);
    rmSync(join(root, 'pack_manifest.json'));
    expect(pack.getPrefixes()).toEqual(['luc']);
  });

  it('DP-4: options override manifest values', async () => {
    const root = makePack({ 'notes/readme.md': '# hi' }, ICON_MANIFEST);
    const pack = new DirectoryResourcePack({
      root,
      defaultContentType: 'text/markdown',
      prefixes: ['docs'],
      priority: 5,
      packInfo: { description: 'Docs' },
    });

    const content = await pack.getResource('notes/readme.md');
    expect(content.content_type).toBe('text/markdown');
    expect(content.encoding).toBe('utf-8');
    expect(pack.getPrefixes()).toEqual(['docs']);
    expect(pack.getPriority()).toBe(5);
    expect(pack.getPackInfo()).toEqual({ description: 'Docs' });
  });

  it('DP-4: custom resource directory and manifest name', async () => {
    const root = mkdtempSync(join(tmpdir(), 'respack-dir-'));
    mkdirSync(join(root, 'icons'));
    writeFileSync(join(root, 'icons', 'x.svg'), SVG, 'utf-8');
    writeFileSync(join(root, 'meta.json'), JSON.stringify(ICON_MANIFEST), 'utf-8');

    const pack = new DirectoryResourcePack({ root, resourceDir: 'icons', manifestName: 'meta.json' });
    expect(await pack.listResources()).toEqual(['x.svg']);
    expect(pack.getPrefixes()).toEqual(['luc']);
    expect(pack.getResourcePath('x.svg')).toBe(join(root, 'icons', 'x.svg'));
  });

  it('DP-5: a miss suggests names that contain the request', async () => {
    const root = makePack({ 'home.svg': SVG, 'outlined/home.svg': SVG, 'star.svg': SVG });
    const pack = new DirectoryResourcePack({ root });

    const err = await pack.getResource('HOME').catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ResourceNotFoundError);
    if (err instanceof ResourceNotFoundError) {
      expect(err.resourceName).toBe('HOME');
      expect(err.suggestions).toEqual(['home.svg', 'outlined/home.svg']);
    }
  });

  it('DP-5: at most five suggestions are offered', async () => {
    const files: Record<string, string> = {};
    for (let i = 1; i <= 7; i++) files[`a${i}.txt`] = 'x';
    const pack = new DirectoryResourcePack({ root: makePack(files) });

    const err = await pack.getResource('a').catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ResourceNotFoundError);
    if (err instanceof ResourceNotFoundError) {
      expect(err.suggestions).toEqual(['a1.txt', 'a2.txt', 'a3.txt', 'a4.txt', 'a5.txt']);
    }
  });

  it('DP-5: a directory name is a miss', async () => {
    const root = makePack({ 'outlined/home.svg': SVG });
    const pack = new DirectoryResourcePack({ root });

    await expect(pack.getResource('outlined')).rejects.toBeInstanceOf(ResourceNotFoundError);
  });

  it('DP-6: names resolving outside the resource directory are missing', async () => {
    const root = makePack({ 'home.svg': SVG }, ICON_MANIFEST);
    const pack = new DirectoryResourcePack({ root });

    expect(pack.getResourcePath('../pack_manifest.json')).toBeUndefined();
    expect(pack.getResourcePath('/etc/hostname')).toBeUndefined();
    expect(pack.getResourcePath('')).toBeUndefined();
    await expect(pack.getResource('../pack_manifest.json')).rejects.toBeInstanceOf(
      ResourceNotFoundError,
    );
  });
});

describe('SvgIconPack', () => {
  it('DP-7: appends the .svg extension when missing', async () => {
    const root = makePack({ 'home.svg': SVG });
    const pack = new SvgIconPack({ root });

    expect(resourceText(await pack.getResource('home'))).toBe(SVG);
    expect(resourceText(await pack.getResource('home.svg'))).toBe(SVG);
    expect(pack.getContentType('home')).toBe('image/svg+xml');
    expect(pack.getResourcePath('home')).toBe(join(root, 'resources', 'home.svg'));
  });
});

describe('directoryPackFactory', () => {
  it('DP-8: registers under its manifest alias and resolves through a registry', async () => {
    const root = makePack({ 'home.svg': SVG }, ICON_MANIFEST);
    const sink = new MemoryDiagnosticSink();
    const registry = new ResourceRegistry({
      source: new MemoryPackSource([
        { dist_name: 'acme-icons', pack_name: 'lucide', factory: directoryPackFactory({ root }, 'svg') },
      ]),
      sink,
      env: {},
    });

    expect(resourceText(await registry.getResource('luc:home'))).toBe(SVG);
    expect(resourceText(await registry.getResource('acme-icons/lucide:home.svg'))).toBe(SVG);
    expect(await registry.listResources('lucide')).toEqual([
      { name: 'home.svg', pack: 'acme-icons/lucide', content_type: 'image/svg+xml' },
    ]);
    expect((await registry.getRegisteredPack('acme-icons/lucide'))?.priority).toBe(150);
    expect(sink.diagnostics).toEqual([]);
  });
});
