/**
 * Respack CLI — Formatting Tests
 *
 *   FMT-1: byte sizes
 *   FMT-2: glob matching over resource names
 *   FMT-3: exit codes per failure kind
 */

import { describe, it, expect } from 'vitest';
import { ResolutionErrorKind } from '@respack/kernel';
import { ExitCode, exitCodeFor, formatSize, formatValue, matchesGlob } from '../src/index.js';

describe('formatSize', () => {
  it('FMT-1: whole bytes below one kilobyte', () => {
    expect(formatSize(0)).toBe('0 B');
    expect(formatSize(512)).toBe('512 B');
    expect(formatSize(1023)).toBe('1023 B');
  });

  it('FMT-1: one decimal from kilobytes up', () => {
    expect(formatSize(1024)).toBe('1.0 KB');
    expect(formatSize(1229)).toBe('1.2 KB');
    expect(formatSize(3565158)).toBe('3.4 MB');
    expect(formatSize(1024 ** 4)).toBe('1.0 TB');
  });
});

describe('matchesGlob', () => {
  it('FMT-2: star matches any run, slashes included', () => {
    expect(matchesGlob('arrow-*', 'arrow-left')).toBe(true);
    expect(matchesGlob('*.svg', 'outlined/x.svg')).toBe(true);
    expect(matchesGlob('arrow-*', 'chevron-left')).toBe(false);
  });

  it('FMT-2: question mark matches exactly one character', () => {
    expect(matchesGlob('icon?', 'icon1')).toBe(true);
    expect(matchesGlob('icon?', 'icon10')).toBe(false);
  });

  it('FMT-2: regex metacharacters are literal', () => {
    expect(matchesGlob('a.b', 'axb')).toBe(false);
    expect(matchesGlob('[x]', '[x]')).toBe(true);
    expect(matchesGlob('(a|b)', 'a')).toBe(false);
  });
});

describe('formatValue', () => {
  it('renders arrays, records and primitives on one line', () => {
    expect(formatValue(['a', 'b'])).toBe('a, b');
    expect(formatValue({ w: 24 })).toBe('{"w":24}');
    expect(formatValue(null)).toBe('null');
    expect(formatValue(3)).toBe('3');
  });
});

describe('exitCodeFor', () => {
  it('FMT-3: maps each kind to its own code', () => {
    expect(exitCodeFor(ResolutionErrorKind.NotFound)).toBe(ExitCode.NotFound);
    expect(exitCodeFor(ResolutionErrorKind.UnknownPrefix)).toBe(3);
    expect(exitCodeFor(ResolutionErrorKind.UnknownQualifiedPack)).toBe(4);
    expect(exitCodeFor(ResolutionErrorKind.AmbiguousPrefix)).toBe(5);
    expect(exitCodeFor(ResolutionErrorKind.NoDefaultPrefix)).toBe(6);
  });
});
