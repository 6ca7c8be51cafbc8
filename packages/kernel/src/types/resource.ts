/**
 * Respack Kernel — Resource Types
 *
 * Value objects produced by packs. The kernel never caches them: every
 * fetch yields a fresh ResourceContent.
 */

/**
 * Content returned by a pack for one resource.
 */
export interface ResourceContent {
  /** Raw bytes (SVG as UTF-8, PNG as-is, ...). */
  readonly data: Uint8Array;
  /** MIME type, e.g. 'image/svg+xml'. */
  readonly content_type: string;
  /** Text encoding for text-based resources; absent for binary content. */
  readonly encoding?: string | undefined;
  /** Open descriptive metadata (dimensions, tags, pack version, ...). */
  readonly metadata?: Readonly<Record<string, unknown>> | undefined;
}

/**
 * Lightweight descriptor of a resource, used for listing without loading
 * payloads.
 */
export interface ResourceInfo {
  readonly name: string;
  /** Qualified name of the owning pack. */
  readonly pack: string;
  readonly content_type?: string | undefined;
  readonly tags?: ReadonlyArray<string> | undefined;
}
