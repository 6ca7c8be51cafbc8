/**
 * Respack Kernel — Error Classes
 *
 * Kernel operations return ResolutionError values. These classes exist for
 * the boundaries that must throw: the registry's content fetch, packs
 * reporting a missing resource, and text decoding of binary content.
 */

import { ResolutionErrorKind } from './types/resolution.js';
import type { ResolutionError } from './types/resolution.js';

/**
 * Thrown by the registry when a name cannot be resolved to a pack.
 *
 * The message is the kernel's message, unaltered.
 */
export class ResolutionFailure extends Error {
  readonly kind: ResolutionErrorKind;
  readonly alternatives: ReadonlyArray<string>;
  readonly resourceName: string;

  constructor(error: ResolutionError) {
    super(error.message);
    this.name = 'ResolutionFailure';
    this.kind = error.kind;
    this.alternatives = error.alternatives;
    this.resourceName = error.name;
  }
}

/**
 * Thrown by packs when a resolved pack has no resource with the requested
 * name. The registry propagates it unchanged.
 */
export class ResourceNotFoundError extends Error {
  readonly kind = ResolutionErrorKind.NotFound;

  /**
   * @param resourceName - The name as passed to the pack
   * @param suggestions - Similar names the pack does contain
   */
  constructor(
    readonly resourceName: string,
    readonly suggestions: ReadonlyArray<string> = [],
  ) {
    super(
      `Resource '${resourceName}' not found in pack.` +
        (suggestions.length > 0 ? ` Similar names: ${suggestions.join(', ')}` : ''),
    );
    this.name = 'ResourceNotFoundError';
  }
}

/**
 * Thrown when text is requested from content that carries no encoding.
 */
export class BinaryResourceError extends Error {
  constructor(contentType: string) {
    super(`Cannot decode binary resource as text (content_type: ${contentType}, encoding is absent)`);
    this.name = 'BinaryResourceError';
  }
}

/**
 * Narrow an unknown thrown value to a failure carrying a ResolutionErrorKind.
 */
export function isKindedError(
  err: unknown,
): err is ResolutionFailure | ResourceNotFoundError {
  return err instanceof ResolutionFailure || err instanceof ResourceNotFoundError;
}
