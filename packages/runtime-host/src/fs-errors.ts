/**
 * Respack Runtime Host — Node error narrowing
 */

/**
 * True when `err` is a Node system error with one of the given codes.
 */
export function isNodeError(err: unknown, ...codes: ReadonlyArray<string>): boolean {
  return (
    err !== null &&
    typeof err === 'object' &&
    'code' in err &&
    typeof err.code === 'string' &&
    codes.includes(err.code)
  );
}
