/**
 * Respack CLI — Output channels
 *
 * Commands never touch process.stdout directly; they write through a
 * CliIO so tests can capture output.
 */

import { colorSupported } from './theme.js';

export interface CliIO {
  /** One line of regular output. */
  out(line: string): void;
  /** One line of status or error output. */
  err(line: string): void;
  /** Raw payload to stdout, without a trailing newline. */
  write(data: Uint8Array | string): void;
  readonly color: boolean;
}

export const processIO: CliIO = {
  out(line: string): void {
    // eslint-disable-next-line no-console
    console.log(line);
  },
  err(line: string): void {
    // eslint-disable-next-line no-console
    console.error(line);
  },
  write(data: Uint8Array | string): void {
    process.stdout.write(data);
  },
  color: colorSupported,
};
