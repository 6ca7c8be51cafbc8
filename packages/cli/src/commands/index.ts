/**
 * commands/index.ts — Commander program, configured and returned without parsing.
 *
 * Imported by:
 *   src/bin/respack.ts   (the `respack` executable)
 *   test/cli.test.ts     (with captured output and an in-memory registry)
 */

import { Command } from 'commander'
import type { CliDeps } from '../context.js'
import { defaultDeps } from '../context.js'
import { getCommand } from './get.js'
import { infoCommand } from './info.js'
import { listCommand } from './list.js'
import { packsCommand } from './packs.js'

export const VERSION = '0.1.0'

export function buildProgram(deps: CliDeps = defaultDeps()): Command {
  const program = new Command('respack')
    .description(
      'Resolve and fetch resources from installed resource packs.\n' +
      'Names take the form <prefix>:<resource>, where the prefix is a pack name,\n' +
      'an alias, or a qualified <distribution>/<pack> name.',
    )
    .version(VERSION)
    .option('--blocklist <names>', 'Comma-separated pack names to exclude (short or qualified)')
    .option('--prefix-map <map>', 'Prefix overrides, e.g. "luc=acme-icons/lucide,fa=fa-pack/solid"')
    .option('--default-prefix <prefix>', 'Prefix applied to names without one')
    .option('--policy <policy>', 'Prefix collision policy: ambiguous or priority')
    .option('--json', 'Output as JSON')
    .option('--debug', 'Print debug diagnostics (rejected packs, aliases)')
    .configureOutput({
      writeOut: (str) => deps.io.write(str),
      writeErr: (str) => deps.io.err(str.trimEnd()),
    })

  program.addCommand(listCommand(deps))
  program.addCommand(getCommand(deps))
  program.addCommand(packsCommand(deps))
  program.addCommand(infoCommand(deps))

  return program
}
