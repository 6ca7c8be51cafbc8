/**
 * Shared CLI test fixtures: captured output and an in-memory registry.
 */

import { ResourceNotFoundError, createResourceContent } from '@respack/kernel';
import type { PackInfo, ResourceContent, ResourcePack } from '@respack/kernel';
import { ResourceRegistry } from '@respack/pack-loader';
import { MemoryDiagnosticSink, MemoryPackSource } from '@respack/runtime-host';
import type { RegistryConfigOptions } from '@respack/runtime-host';
import type { CliIO, CommandContext } from '../../src/index.js';
import { createTheme } from '../../src/index.js';

export class CaptureIO implements CliIO {
  readonly stdout: string[] = [];
  readonly stderr: string[] = [];
  readonly raw: Array<Uint8Array | string> = [];
  readonly color = false;

  out(line: string): void {
    this.stdout.push(line);
  }

  err(line: string): void {
    this.stderr.push(line);
  }

  write(data: Uint8Array | string): void {
    this.raw.push(data);
  }
}

interface TextPackOptions {
  readonly prefixes?: ReadonlyArray<string>;
  readonly info?: PackInfo;
  readonly priority?: number;
}

/** Pack serving short text payloads as SVG, with every optional capability. */
export class TextPack implements ResourcePack {
  constructor(
    private readonly files: Readonly<Record<string, string>>,
    private readonly options: TextPackOptions = {},
  ) {}

  getResource(name: string): Promise<ResourceContent> {
    const text = this.files[name];
    if (text === undefined) {
      return Promise.reject(new ResourceNotFoundError(name));
    }
    return Promise.resolve(
      createResourceContent(text, 'image/svg+xml', { metadata: { pack_version: '1.0.0' } }),
    );
  }

  listResources(): ReadonlyArray<string> {
    return Object.keys(this.files);
  }

  getContentType(): string {
    return 'image/svg+xml';
  }

  getPrefixes(): ReadonlyArray<string> {
    return this.options.prefixes ?? [];
  }

  getPackInfo(): PackInfo {
    return this.options.info ?? { description: '' };
  }

  getPriority(): number {
    return this.options.priority ?? 100;
  }

  getResourcePath(name: string): string | undefined {
    return this.files[name] !== undefined ? `/packs/${name}` : undefined;
  }
}

/**
 * Three packs: two contending for 'lucide', one reachable as 'solid'.
 *
 *   acme-icons/lucide   alias luc, priority 100: home, arrow-left, arrow-right
 *   cool-icons/lucide   priority 200:            home
 *   fa-pack/solid                                star
 */
export function makeRegistry(options: RegistryConfigOptions = {}): ResourceRegistry {
  const source = new MemoryPackSource([
    {
      dist_name: 'acme-icons',
      pack_name: 'lucide',
      factory: () =>
        new TextPack(
          { home: 'HOME-ICON', 'arrow-right': 'AR', 'arrow-left': 'AL' },
          {
            prefixes: ['luc'],
            info: {
              description: 'Lucide icons',
              source_url: 'https://example.invalid/lucide',
              license_spdx: 'ISC',
            },
          },
        ),
    },
    {
      dist_name: 'cool-icons',
      pack_name: 'lucide',
      factory: () => new TextPack({ home: 'COOL-HOME' }, { info: { description: 'Cool icons' }, priority: 200 }),
    },
    {
      dist_name: 'fa-pack',
      pack_name: 'solid',
      factory: () => new TextPack({ star: 'STAR' }),
    },
  ]);
  return new ResourceRegistry({ ...options, source, sink: new MemoryDiagnosticSink(), env: {} });
}

export function makeContext(json = false, options: RegistryConfigOptions = {}): CommandContext & { io: CaptureIO } {
  return {
    registry: makeRegistry(options),
    io: new CaptureIO(),
    theme: createTheme(false),
    json,
  };
}
