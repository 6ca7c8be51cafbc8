/**
 * Respack Kernel — Resolution Types
 *
 * The closed error taxonomy and the result unions returned by the
 * resolution kernel. Expected failures are values, not exceptions: callers
 * switch on `kind` rather than matching message text.
 */

// ---------------------------------------------------------------------------
// Error Taxonomy
// ---------------------------------------------------------------------------

/**
 * Every way a lookup can fail. This set is closed.
 *
 * All kinds are local and recoverable by the caller. None is retried:
 * resolution is deterministic, so only a configuration or discovery change
 * can alter the outcome.
 */
export enum ResolutionErrorKind {
  /** The pack resolved, but has no resource with that name. */
  NotFound = 'NotFound',
  /** A `dist/pack` prefix names no registered pack. */
  UnknownQualifiedPack = 'UnknownQualifiedPack',
  /** A short prefix matches neither a live mapping nor a recorded collision. */
  UnknownPrefix = 'UnknownPrefix',
  /** A short prefix is claimed by two or more packs and no override resolves it. */
  AmbiguousPrefix = 'AmbiguousPrefix',
  /** A bare name was given and no default prefix is configured. */
  NoDefaultPrefix = 'NoDefaultPrefix',
}

/**
 * A resolution failure as data.
 *
 * `alternatives` carries the values the message enumerates (known prefixes,
 * known qualified names, or ready-to-use `dist/pack:resource` forms) so
 * presentation layers can render them without parsing the message.
 */
export interface ResolutionError {
  readonly kind: ResolutionErrorKind;
  readonly message: string;
  /** The name string as the caller supplied it. */
  readonly name: string;
  readonly alternatives: ReadonlyArray<string>;
}

// ---------------------------------------------------------------------------
// Results
// ---------------------------------------------------------------------------

/**
 * Result of resolving a name string to a (pack, resource) pair.
 */
export type ResolveResult =
  | {
      readonly ok: true;
      readonly qualified_name: string;
      readonly resource_name: string;
    }
  | { readonly ok: false; readonly error: ResolutionError };

/**
 * Result of resolving a pack filter (a prefix with no resource part).
 * An unresolvable filter is not an error: it matches nothing.
 */
export type PackFilterResult =
  | { readonly matched: true; readonly qualified_name: string }
  | { readonly matched: false };
