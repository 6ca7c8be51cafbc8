/**
 * Respack Directory Pack — Pack Manifest
 *
 * Shape of the optional `pack_manifest.json` shipped next to a pack's
 * resources:
 *
 *   {
 *     "pack": {
 *       "version": "1.2.0",
 *       "description": "Lucide icons",
 *       "prefixes": ["luc"],
 *       "source_url": "https://example.invalid/lucide",
 *       "upstream_license": "ISC",
 *       "priority": 100
 *     },
 *     "contents": { "format": "image/svg+xml" }
 *   }
 *
 * Every field is optional. Fields of the wrong type are ignored.
 */

import { field, isStringArray, stringField } from '@respack/kernel';

export interface PackManifest {
  readonly pack: {
    readonly version?: string | undefined;
    readonly description?: string | undefined;
    readonly prefixes?: ReadonlyArray<string> | undefined;
    readonly source_url?: string | undefined;
    readonly upstream_license?: string | undefined;
    readonly priority?: number | undefined;
  };
  readonly contents: {
    readonly format?: string | undefined;
  };
}

export const EMPTY_MANIFEST: PackManifest = Object.freeze({ pack: {}, contents: {} });

/**
 * Narrow parsed JSON to a PackManifest, dropping mistyped fields.
 */
export function parsePackManifest(raw: unknown): PackManifest {
  const pack = field(raw, 'pack');
  const prefixes = field(pack, 'prefixes');
  const priority = field(pack, 'priority');
  return {
    pack: {
      version: stringField(pack, 'version'),
      description: stringField(pack, 'description'),
      prefixes: isStringArray(prefixes) ? prefixes : undefined,
      source_url: stringField(pack, 'source_url'),
      upstream_license: stringField(pack, 'upstream_license'),
      priority: typeof priority === 'number' && Number.isInteger(priority) ? priority : undefined,
    },
    contents: {
      format: stringField(field(raw, 'contents'), 'format'),
    },
  };
}
