/**
 * Respack Runtime Host — In-memory Diagnostic Sink
 *
 * Records every diagnostic regardless of level. For tests and for
 * embedders that want to inspect discovery outcomes programmatically.
 */

import type { Diagnostic, DiagnosticSink } from '@respack/kernel';

export class MemoryDiagnosticSink implements DiagnosticSink {
  private readonly entries: Diagnostic[] = [];

  emit(diagnostic: Diagnostic): void {
    this.entries.push(diagnostic);
  }

  /** All diagnostics in emission order. */
  get diagnostics(): ReadonlyArray<Diagnostic> {
    return this.entries;
  }

  /** Diagnostics of one kind, narrowed to that member of the union. */
  ofKind<K extends Diagnostic['kind']>(kind: K): ReadonlyArray<Extract<Diagnostic, { kind: K }>> {
    return this.entries.filter((d): d is Extract<Diagnostic, { kind: K }> => d.kind === kind);
  }

  clear(): void {
    this.entries.length = 0;
  }
}
