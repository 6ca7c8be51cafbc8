/**
 * Respack Pack Loader — Factory Normalization and Validation Tests
 *
 *   N1: direct pack objects take aliases from getPrefixes()
 *   N2: [pack, metadata] takes aliases from metadata.prefixes
 *   N3: [descriptor, pack, aliases, ...] takes aliases from the third slot
 *   N4: anything else is rejected with a reason
 *   V1: the validator names every violated member
 */

import { describe, it, expect } from 'vitest';
import { PackValidator, normalizeFactoryResult } from '../src/index.js';
import { StubPack } from './helpers/stub-pack.js';

describe('normalizeFactoryResult', () => {
  it('N1: accepts a pack object and calls its getPrefixes()', () => {
    const pack = { ...methods(), getPrefixes: () => ['luc', 7, 'li'] };
    expect(normalizeFactoryResult(pack)).toEqual({ kind: 'accepted', pack, aliases: ['luc', 'li'] });
  });

  it('N1: accepts a class instance without getPrefixes()', () => {
    const pack = new StubPack();
    expect(normalizeFactoryResult(pack)).toEqual({ kind: 'accepted', pack, aliases: [] });
  });

  it('N2: reads prefixes from the metadata record', () => {
    const pack = new StubPack();
    expect(normalizeFactoryResult([pack, { prefixes: ['luc'] }])).toEqual({
      kind: 'accepted',
      pack,
      aliases: ['luc'],
    });
    expect(normalizeFactoryResult([pack, { prefixes: 'luc' }])).toEqual({
      kind: 'accepted',
      pack,
      aliases: [],
    });
    expect(normalizeFactoryResult([pack, null])).toEqual({ kind: 'accepted', pack, aliases: [] });
  });

  it('N3: ignores the first element of longer tuples', () => {
    const pack = new StubPack();
    expect(normalizeFactoryResult(['icons', pack, ['luc'], 'extra'])).toEqual({
      kind: 'accepted',
      pack,
      aliases: ['luc'],
    });
    expect(normalizeFactoryResult(['icons', pack, 'luc'])).toEqual({
      kind: 'accepted',
      pack,
      aliases: [],
    });
  });

  it('N4: rejects short arrays and non-pack values', () => {
    expect(normalizeFactoryResult([new StubPack()])).toEqual({
      kind: 'rejected',
      reason: 'factory returned an array of length 1; expected 2, or 3 or more',
    });
    expect(normalizeFactoryResult(null)).toEqual({
      kind: 'rejected',
      reason: 'factory returned null, not a pack',
    });
    expect(normalizeFactoryResult({ listResources: () => [] })).toEqual({
      kind: 'rejected',
      reason: 'factory returned an object, not a pack',
    });
    expect(normalizeFactoryResult(42)).toEqual({
      kind: 'rejected',
      reason: 'factory returned number, not a pack',
    });
  });
});

describe('PackValidator', () => {
  const validator = new PackValidator();

  it('V1: accepts a conforming pack', () => {
    const pack = new StubPack();
    expect(validator.validatePack(pack)).toEqual({ ok: true, value: pack });
  });

  it('V1: reports each missing or malformed member', () => {
    const result = validator.validatePack({ getResource: () => undefined, getPriority: 5 });
    expect(result).toEqual({
      ok: false,
      errors: [
        { message: 'Missing required method listResources()', context: 'listResources' },
        { message: 'Optional member getPriority must be a function when present', context: 'getPriority' },
      ],
    });
  });

  it('V1: rejects non-objects', () => {
    expect(validator.validatePack('pack')).toEqual({
      ok: false,
      errors: [{ message: 'Pack must be an object, got string' }],
    });
  });

  it('V1: requires an integer priority', () => {
    expect(validator.validatePriority(50)).toEqual({ ok: true, value: 50 });
    expect(validator.validatePriority(-3)).toEqual({ ok: true, value: -3 });
    expect(validator.validatePriority(Number.NaN).ok).toBe(false);
    expect(validator.validatePriority('high').ok).toBe(false);
  });

  it('V1: rejects a fractional priority', () => {
    expect(validator.validatePriority(1.5)).toEqual({
      ok: false,
      errors: [{ message: 'getPriority() must return an integer, got 1.5' }],
    });
  });
});

function methods(): { getResource: () => Promise<never>; listResources: () => string[] } {
  return {
    getResource: () => Promise.reject(new Error('unused')),
    listResources: () => [],
  };
}
