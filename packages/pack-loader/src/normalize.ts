/**
 * Respack Pack Loader — Factory Result Normalization
 *
 * Pack factories may return any of three shapes:
 *
 *   pack                              a pack object directly; aliases come
 *                                     from its getPrefixes(), if offered
 *   [pack, { prefixes: [...] }]       a pack plus a metadata record
 *   [descriptor, pack, [...aliases]]  three or more elements; the first
 *                                     element is ignored
 *
 * normalizeFactoryResult() folds these into one tagged variant so nothing
 * downstream ever looks at the raw shape. Whether the pack object actually
 * satisfies the capability contract is PackValidator's job, not this one.
 */

import { isRecord } from '@respack/kernel';

// ---------------------------------------------------------------------------
// Result
// ---------------------------------------------------------------------------

/**
 * The single shape produced by normalization.
 */
export type NormalizedFactoryResult =
  | {
      readonly kind: 'accepted';
      /** Candidate pack; not yet validated. */
      readonly pack: unknown;
      readonly aliases: ReadonlyArray<string>;
    }
  | { readonly kind: 'rejected'; readonly reason: string };

// ---------------------------------------------------------------------------
// Normalization
// ---------------------------------------------------------------------------

/**
 * Fold a factory's return value into a NormalizedFactoryResult.
 *
 * Non-string alias entries are dropped. A non-array alias slot means no
 * aliases. Calls the pack's getPrefixes() in the direct form, which may
 * throw; callers treat that like any other factory failure.
 */
export function normalizeFactoryResult(result: unknown): NormalizedFactoryResult {
  if (Array.isArray(result)) {
    if (result.length === 2) {
      const metadata: unknown = result[1];
      const prefixes = isRecord(metadata) ? metadata['prefixes'] : undefined;
      return { kind: 'accepted', pack: result[0], aliases: stringsOf(prefixes) };
    }
    if (result.length >= 3) {
      return { kind: 'accepted', pack: result[1], aliases: stringsOf(result[2]) };
    }
    return {
      kind: 'rejected',
      reason: `factory returned an array of length ${result.length}; expected 2, or 3 or more`,
    };
  }

  if (isRecord(result) && typeof result['getResource'] === 'function') {
    const getPrefixes = result['getPrefixes'];
    const aliases: unknown =
      typeof getPrefixes === 'function' ? getPrefixes.call(result) : undefined;
    return { kind: 'accepted', pack: result, aliases: stringsOf(aliases) };
  }

  return { kind: 'rejected', reason: `factory returned ${describe(result)}, not a pack` };
}

function stringsOf(value: unknown): string[] {
  if (!Array.isArray(value)) return [];
  return value.filter((item): item is string => typeof item === 'string');
}

/** Short description of a value for rejection messages. */
export function describe(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'an array';
  return typeof value === 'object' ? 'an object' : typeof value;
}
