/**
 * Respack Pack Loader — Pack Loader
 *
 * Turns one raw registration into a RegisteredPack, or a typed rejection.
 *
 * Loading is a multi-step process:
 * 1. Check the pack name can form a qualified name
 * 2. Load the factory (module import; may reject)
 * 3. Invoke the factory, awaiting it if it returns a promise
 * 4. Normalize the factory result (normalizeFactoryResult)
 * 5. Validate the pack against the capability contract (PackValidator)
 * 6. Read and validate the declared priority
 * 7. Bind the pack to its identity (createRegisteredPack)
 *
 * No step throws to the caller: every failure becomes a rejection so one
 * broken registration never prevents loading the rest.
 */

import {
  DEFAULT_PACK_PRIORITY,
  UNKNOWN_DIST_NAME,
  createRegisteredPack,
} from '@respack/kernel';
import type { RawPackRegistration, RegisteredPack } from '@respack/kernel';
import { normalizeFactoryResult } from './normalize.js';
import { PackValidator } from './validator.js';

// ---------------------------------------------------------------------------
// Load Result
// ---------------------------------------------------------------------------

/**
 * The result of a pack load attempt.
 */
export type PackLoadResult =
  | { readonly ok: true; readonly pack: RegisteredPack }
  | { readonly ok: false; readonly reason: string; readonly details?: string | undefined };

// ---------------------------------------------------------------------------
// Pack Loader
// ---------------------------------------------------------------------------

export class PackLoader {
  private readonly validator: PackValidator;

  constructor() {
    this.validator = new PackValidator();
  }

  async load(registration: RawPackRegistration): Promise<PackLoadResult> {
    const distName = registration.dist_name ?? UNKNOWN_DIST_NAME;
    const packName = registration.pack_name;

    // Step 1: identity
    if (packName.trim() === '' || packName.includes('/')) {
      return {
        ok: false,
        reason: 'Invalid pack name',
        details: `Pack names must be non-empty and must not contain '/': '${packName}'`,
      };
    }

    // Step 2: factory
    let factory: unknown;
    try {
      factory = await registration.load();
    } catch (err: unknown) {
      return { ok: false, reason: 'Pack module failed to load', details: errorText(err) };
    }
    if (typeof factory !== 'function') {
      return {
        ok: false,
        reason: 'Pack factory is not callable',
        details: `Expected a function, got ${typeof factory}`,
      };
    }

    // Steps 3-6: invocation, normalization, validation. Pack-supplied code
    // runs here (factory, getPrefixes, getPriority) and may throw.
    try {
      const produced: unknown = await factory();
      const normalized = normalizeFactoryResult(produced);
      if (normalized.kind === 'rejected') {
        return { ok: false, reason: 'Unrecognized factory result', details: normalized.reason };
      }

      const validation = this.validator.validatePack(normalized.pack);
      if (!validation.ok) {
        return {
          ok: false,
          reason: 'Pack does not satisfy the capability contract',
          details: validation.errors.map((e) => e.message).join('; '),
        };
      }
      const pack = validation.value;

      let priority = DEFAULT_PACK_PRIORITY;
      if (pack.getPriority !== undefined) {
        const declared = this.validator.validatePriority(pack.getPriority());
        if (!declared.ok) {
          return {
            ok: false,
            reason: 'Invalid pack priority',
            details: declared.errors.map((e) => e.message).join('; '),
          };
        }
        priority = declared.value;
      }

      // Step 7: identity binding
      return {
        ok: true,
        pack: createRegisteredPack(distName, packName, pack, normalized.aliases, priority),
      };
    } catch (err: unknown) {
      return { ok: false, reason: 'Pack factory threw', details: errorText(err) };
    }
  }
}

function errorText(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
