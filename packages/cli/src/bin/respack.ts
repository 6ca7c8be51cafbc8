#!/usr/bin/env node
/**
 * bin/respack.ts — entry point for the `respack` command.
 *
 * The exit code is set by the command that ran; see src/exit-codes.ts.
 */

const { buildProgram } = await import('../commands/index.js')
await buildProgram().parseAsync(process.argv)
