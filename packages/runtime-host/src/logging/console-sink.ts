/**
 * Respack Runtime Host — Console Diagnostic Sink
 *
 * Implements the DiagnosticSink interface from @respack/kernel by writing
 * to stderr. `warn` diagnostics are always written; `debug` diagnostics
 * only when enabled (RESPACK_DEBUG, or the constructor flag).
 *
 * stdout is never touched: CLI output stays machine-readable with --json.
 */

import type { Diagnostic, DiagnosticSink } from '@respack/kernel';

/** Where console output goes. Injected so tests can capture it. */
export type LineWriter = (line: string) => void;

const writeStderr: LineWriter = (line) => {
  // eslint-disable-next-line no-console
  console.warn(line);
};

export class ConsoleDiagnosticSink implements DiagnosticSink {
  constructor(
    private readonly debug: boolean = false,
    private readonly write: LineWriter = writeStderr,
  ) {}

  emit(diagnostic: Diagnostic): void {
    if (diagnostic.level === 'debug' && !this.debug) return;
    this.write(formatDiagnostic(diagnostic));
  }
}

/**
 * One-line rendering: `respack [warn] prefix-collision: <message>`.
 */
export function formatDiagnostic(diagnostic: Diagnostic): string {
  return `respack [${diagnostic.level}] ${diagnostic.kind}: ${diagnostic.message}`;
}
