/**
 * Respack CLI — Exit codes
 *
 * One code per resolution failure kind, so scripts can branch without
 * parsing messages.
 */

import { ResolutionErrorKind } from '@respack/kernel';

export enum ExitCode {
  Ok = 0,
  Error = 1,
  NotFound = 2,
  UnknownPrefix = 3,
  UnknownQualifiedPack = 4,
  AmbiguousPrefix = 5,
  NoDefaultPrefix = 6,
}

export function exitCodeFor(kind: ResolutionErrorKind): ExitCode {
  switch (kind) {
    case ResolutionErrorKind.NotFound:
      return ExitCode.NotFound;
    case ResolutionErrorKind.UnknownPrefix:
      return ExitCode.UnknownPrefix;
    case ResolutionErrorKind.UnknownQualifiedPack:
      return ExitCode.UnknownQualifiedPack;
    case ResolutionErrorKind.AmbiguousPrefix:
      return ExitCode.AmbiguousPrefix;
    case ResolutionErrorKind.NoDefaultPrefix:
      return ExitCode.NoDefaultPrefix;
    default: {
      const exhaustive: never = kind;
      throw new Error(`Unhandled resolution error kind: ${String(exhaustive)}`);
    }
  }
}
