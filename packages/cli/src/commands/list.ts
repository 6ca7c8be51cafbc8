/**
 * respack list — List available resources
 *
 * Resources are sorted by pack, then name. --pack takes a qualified name
 * or an unambiguous short prefix; --filter a glob over resource names.
 */

import { Command } from 'commander';
import { compareCodeUnits } from '@respack/kernel';
import type { CliDeps, CommandContext, GlobalOptions } from '../context.js';
import { execute } from '../context.js';
import { ExitCode } from '../exit-codes.js';
import { matchesGlob, toJson } from '../format.js';

export interface ListOptions {
  readonly pack?: string | undefined;
  readonly filter?: string | undefined;
  readonly verbose?: boolean | undefined;
}

export async function runList(ctx: CommandContext, options: ListOptions): Promise<ExitCode> {
  let resources = [...(await ctx.registry.listResources(options.pack))];
  const filter = options.filter;
  if (filter !== undefined) {
    resources = resources.filter((r) => matchesGlob(filter, r.name));
  }
  resources.sort((a, b) => compareCodeUnits(a.pack, b.pack) || compareCodeUnits(a.name, b.name));

  if (ctx.json) {
    ctx.io.out(toJson({
      resources: resources.map((r) => ({
        name: r.name,
        pack: r.pack,
        content_type: r.content_type ?? null,
      })),
      count: resources.length,
    }));
    return ExitCode.Ok;
  }

  const { theme: t } = ctx;
  for (const r of resources) {
    if (options.verbose === true) {
      const type = r.content_type !== undefined ? ' ' + t.accent(`[${r.content_type}]`) : '';
      ctx.io.out(`${t.name(r.name)} ${t.pack(`(${r.pack})`)}${type}`);
    } else {
      ctx.io.out(r.name);
    }
  }
  return ExitCode.Ok;
}

export function listCommand(deps: CliDeps): Command {
  return new Command('list')
    .description('List available resources')
    .option('--pack <filter>', 'Only resources of this pack (qualified name or short prefix)')
    .option('--filter <glob>', "Glob over resource names, e.g. 'arrow-*'")
    .option('--verbose', 'Show pack and content type')
    .action(async (options: ListOptions, command: Command) => {
      await execute(deps, command.optsWithGlobals<GlobalOptions>(), (ctx) => runList(ctx, options));
    });
}
