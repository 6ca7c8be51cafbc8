/**
 * respack packs — List registered packs
 *
 * --verbose adds distribution, pack name, priority, pack metadata, the
 * prefixes each pack holds and the prefixes it contends for, followed by
 * the naming-table hash.
 */

import { Command } from 'commander';
import { compareCodeUnits } from '@respack/kernel';
import type { CliDeps, CommandContext, GlobalOptions } from '../context.js';
import { execute } from '../context.js';
import { ExitCode } from '../exit-codes.js';
import { toJson } from '../format.js';

export interface PacksOptions {
  readonly verbose?: boolean | undefined;
}

interface PackSummary {
  readonly qualified_name: string;
  readonly dist_name: string;
  readonly pack_name: string;
  readonly aliases: ReadonlyArray<string>;
  readonly priority: number;
  readonly description?: string | undefined;
  readonly source_url?: string | undefined;
  readonly license_spdx?: string | undefined;
  readonly prefixes?: ReadonlyArray<string> | undefined;
  readonly colliding_prefixes?: ReadonlyArray<string> | undefined;
}

export async function runPacks(ctx: CommandContext, options: PacksOptions): Promise<ExitCode> {
  const verbose = options.verbose === true;
  const { registry } = ctx;
  const names = [...(await registry.listPacks())].sort(compareCodeUnits);
  const prefixMap = await registry.getPrefixMap();
  const collisions = await registry.getPrefixCollisions();

  const packs: PackSummary[] = [];
  for (const qualified of names) {
    const registered = await registry.getRegisteredPack(qualified);
    if (registered === undefined) continue;
    const info = registered.pack.getPackInfo?.();
    let summary: PackSummary = {
      qualified_name: qualified,
      dist_name: registered.dist_name,
      pack_name: registered.pack_name,
      aliases: [...registered.aliases],
      priority: registered.priority,
      description: info?.description,
      source_url: info?.source_url,
      license_spdx: info?.license_spdx,
    };
    if (verbose) {
      const held = Object.entries(prefixMap)
        .filter(([, target]) => target === qualified)
        .map(([prefix]) => prefix)
        .sort(compareCodeUnits);
      const contended = Object.entries(collisions)
        .filter(([, claimants]) => claimants.includes(qualified))
        .map(([prefix]) => prefix)
        .sort(compareCodeUnits);
      summary = {
        ...summary,
        prefixes: held,
        colliding_prefixes: contended.length > 0 ? contended : undefined,
      };
    }
    packs.push(summary);
  }

  const tableHash = verbose ? await registry.getTableHash() : undefined;

  if (ctx.json) {
    ctx.io.out(toJson({
      packs,
      count: packs.length,
      ...(tableHash !== undefined ? { table_hash: tableHash } : {}),
    }));
    return ExitCode.Ok;
  }

  const { io, theme: t } = ctx;
  if (!verbose) {
    for (const pack of packs) {
      io.out(t.pack(pack.qualified_name));
      const parts: string[] = [];
      if (pack.description !== undefined && pack.description !== '') parts.push(pack.description);
      const origin = [pack.source_url, pack.license_spdx].filter(
        (part): part is string => part !== undefined && part !== '',
      );
      if (origin.length > 0) parts.push(origin.join(' | '));
      if (parts.length > 0) {
        io.out(`  ${t.muted(parts.join(' | '))}`);
      }
    }
    return ExitCode.Ok;
  }

  io.out(t.heading(`Registered resource packs (${packs.length}):`));
  for (const pack of packs) {
    io.out(`  ${t.pack(pack.qualified_name)}`);
    io.out(`    ${t.label('Distribution:')} ${pack.dist_name}`);
    io.out(`    ${t.label('Pack:')} ${pack.pack_name}`);
    io.out(`    ${t.label('Priority:')} ${pack.priority}`);
    if (pack.description !== undefined && pack.description !== '') {
      io.out(`    ${t.label('Description:')} ${pack.description}`);
    }
    if (pack.source_url !== undefined && pack.source_url !== '') {
      io.out(`    ${t.label('Source:')} ${pack.source_url}`);
    }
    if (pack.license_spdx !== undefined && pack.license_spdx !== '') {
      io.out(`    ${t.label('License:')} ${pack.license_spdx}`);
    }
    if (pack.aliases.length > 0) {
      io.out(`    ${t.label('Aliases:')} ${pack.aliases.join(', ')}`);
    }
    if (pack.prefixes !== undefined) {
      io.out(`    ${t.label('Prefixes:')} ${pack.prefixes.join(', ')}`);
    }
    if (pack.colliding_prefixes !== undefined) {
      io.out(`    ${t.label('Colliding prefixes:')} ${t.accent(pack.colliding_prefixes.join(', '))}`);
    }
  }
  if (tableHash !== undefined) {
    io.out(`${t.label('Table hash:')} ${tableHash}`);
  }
  return ExitCode.Ok;
}

export function packsCommand(deps: CliDeps): Command {
  return new Command('packs')
    .description('List registered resource packs')
    .option('--verbose', 'Show prefixes, collisions, pack metadata and the table hash')
    .action(async (options: PacksOptions, command: Command) => {
      await execute(deps, command.optsWithGlobals<GlobalOptions>(), (ctx) => runPacks(ctx, options));
    });
}
