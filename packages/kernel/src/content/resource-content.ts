/**
 * Respack Kernel — Resource Content helpers
 */

import { BinaryResourceError } from '../errors.js';
import type { ResourceContent } from '../types/resource.js';

/**
 * Content types decoded as text even though they are not text/*.
 */
const TEXTUAL_CONTENT_TYPES: ReadonlySet<string> = new Set([
  'image/svg+xml',
  'application/json',
  'application/xml',
]);

/**
 * Default encoding for a content type: 'utf-8' for textual types,
 * undefined (binary) otherwise.
 */
export function defaultEncodingFor(contentType: string): string | undefined {
  const base = contentType.split(';')[0]?.trim().toLowerCase() ?? '';
  if (base.startsWith('text/') || TEXTUAL_CONTENT_TYPES.has(base)) {
    return 'utf-8';
  }
  return undefined;
}

/**
 * Build a frozen ResourceContent. Strings are encoded as UTF-8.
 */
export function createResourceContent(
  data: Uint8Array | string,
  contentType: string,
  options: {
    readonly encoding?: string | undefined;
    readonly metadata?: Readonly<Record<string, unknown>> | undefined;
  } = {},
): ResourceContent {
  const bytes = typeof data === 'string' ? new TextEncoder().encode(data) : data;
  const encoding = options.encoding ?? (typeof data === 'string' ? 'utf-8' : undefined);
  return Object.freeze({
    data: bytes,
    content_type: contentType,
    ...(encoding !== undefined ? { encoding } : {}),
    ...(options.metadata !== undefined ? { metadata: Object.freeze({ ...options.metadata }) } : {}),
  });
}

/**
 * Decode content as text using its declared encoding.
 *
 * @throws {BinaryResourceError} when the content carries no encoding
 * @throws {RangeError} when the encoding label is not supported
 */
export function resourceText(content: ResourceContent): string {
  if (content.encoding === undefined) {
    throw new BinaryResourceError(content.content_type);
  }
  return new TextDecoder(content.encoding).decode(content.data);
}
