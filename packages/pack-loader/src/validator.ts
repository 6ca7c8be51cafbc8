/**
 * Respack Pack Loader — Pack Validator
 *
 * Checks a candidate object against the ResourcePack capability contract
 * at registration time and produces a typed rejection instead of letting
 * a half-conforming object reach the registry.
 *
 * Required: getResource(), listResources().
 * Optional, but must be functions when present: getPriority(),
 * getPrefixes(), getPackInfo(), getContentType(), getResourcePath().
 */

import { isRecord } from '@respack/kernel';
import type { ResourcePack, ValidationError, ValidationResult } from '@respack/kernel';
import { describe } from './normalize.js';

const REQUIRED_METHODS = ['getResource', 'listResources'] as const;

const OPTIONAL_METHODS = [
  'getPriority',
  'getPrefixes',
  'getPackInfo',
  'getContentType',
  'getResourcePath',
] as const;

/**
 * Structural check backing the validator. Methods may live on the
 * prototype, so members are read with plain property access.
 */
export function isResourcePack(value: unknown): value is ResourcePack {
  if (!isRecord(value)) return false;
  for (const method of REQUIRED_METHODS) {
    if (typeof value[method] !== 'function') return false;
  }
  for (const method of OPTIONAL_METHODS) {
    const member = value[method];
    if (member !== undefined && typeof member !== 'function') return false;
  }
  return true;
}

export class PackValidator {
  /**
   * Validate an unknown value as a ResourcePack.
   *
   * @returns the value, typed, on success; one error per violated member otherwise
   */
  validatePack(candidate: unknown): ValidationResult<ResourcePack> {
    if (!isRecord(candidate)) {
      return {
        ok: false,
        errors: [{ message: `Pack must be an object, got ${describe(candidate)}` }],
      };
    }

    const errors: ValidationError[] = [];
    for (const method of REQUIRED_METHODS) {
      if (typeof candidate[method] !== 'function') {
        errors.push({ message: `Missing required method ${method}()`, context: method });
      }
    }
    for (const method of OPTIONAL_METHODS) {
      const member = candidate[method];
      if (member !== undefined && typeof member !== 'function') {
        errors.push({
          message: `Optional member ${method} must be a function when present`,
          context: method,
        });
      }
    }

    if (errors.length > 0 || !isResourcePack(candidate)) {
      return { ok: false, errors };
    }
    return { ok: true, value: candidate };
  }

  /**
   * Validate a declared priority.
   */
  validatePriority(priority: unknown): ValidationResult<number> {
    if (typeof priority !== 'number' || !Number.isInteger(priority)) {
      return {
        ok: false,
        errors: [{ message: `getPriority() must return an integer, got ${String(priority)}` }],
      };
    }
    return { ok: true, value: priority };
  }
}
