/**
 * Respack CLI — Formatting helpers
 *
 * Pure functions, no I/O.
 */

const SIZE_UNITS = ['KB', 'MB', 'GB', 'TB'] as const;

/**
 * Human-readable byte count: whole bytes below 1 KiB, one decimal above.
 *
 * @example
 * formatSize(512)     // '512 B'
 * formatSize(1229)    // '1.2 KB'
 * formatSize(3565158) // '3.4 MB'
 */
export function formatSize(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  let value = bytes / 1024;
  for (const unit of SIZE_UNITS) {
    if (value < 1024 || unit === 'TB') {
      return `${value.toFixed(1)} ${unit}`;
    }
    value /= 1024;
  }
  return `${value.toFixed(1)} TB`;
}

/**
 * Test a resource name against a glob pattern.
 *
 * - `*` matches any run of characters, '/' included
 * - `?` matches exactly one character
 * - everything else is literal
 *
 * @example
 * matchesGlob('arrow-*', 'arrow-left')      // true
 * matchesGlob('*.svg',   'outlined/x.svg')  // true
 * matchesGlob('icon?',   'icon10')          // false
 */
export function matchesGlob(pattern: string, name: string): boolean {
  const regexStr = pattern
    .replace(/[.+^${}()|[\]\\]/g, '\\$&')
    .replace(/\*/g, '.*')
    .replace(/\?/g, '.');
  return new RegExp(`^${regexStr}$`, 's').test(name);
}

/** 'pack_version' → 'Pack_version' */
export function capitalize(key: string): string {
  return key.charAt(0).toUpperCase() + key.slice(1);
}

/**
 * Render a metadata value on one line.
 */
export function formatValue(value: unknown): string {
  if (Array.isArray(value)) return value.map((v) => formatValue(v)).join(', ');
  if (typeof value === 'object' && value !== null) return JSON.stringify(value);
  return String(value);
}

export function toJson(value: unknown): string {
  return JSON.stringify(value, null, 2);
}
