/**
 * respack info — Detailed view of one resource and its pack
 */

import { Command } from 'commander';
import type { CliDeps, CommandContext, GlobalOptions } from '../context.js';
import { execute } from '../context.js';
import { ExitCode } from '../exit-codes.js';
import { capitalize, formatSize, formatValue, toJson } from '../format.js';
import { lookupResource } from './lookup.js';

export async function runInfo(ctx: CommandContext, name: string): Promise<ExitCode> {
  const { resource, pack, registered, path } = await lookupResource(ctx.registry, name);
  const size = resource.data.byteLength;

  if (ctx.json) {
    ctx.io.out(toJson({
      found: true,
      name,
      pack: {
        qualified_name: pack,
        dist_name: registered?.dist_name ?? null,
        pack_name: registered?.pack_name ?? null,
        aliases: registered !== undefined ? [...registered.aliases] : [],
        priority: registered?.priority ?? null,
      },
      content: {
        content_type: resource.content_type,
        encoding: resource.encoding ?? null,
        size,
        size_human: formatSize(size),
        path: path ?? null,
      },
      metadata: resource.metadata ?? null,
    }));
    return ExitCode.Ok;
  }

  const { io, theme: t } = ctx;
  io.out(`${t.label('Resource:')} ${t.name(name)}`);
  io.out(`${t.label('Pack:')} ${t.pack(pack)}`);
  if (registered !== undefined) {
    io.out(`  ${t.label('Distribution:')} ${registered.dist_name}`);
    io.out(`  ${t.label('Pack Name:')} ${registered.pack_name}`);
    if (registered.aliases.length > 0) {
      io.out(`  ${t.label('Aliases:')} ${registered.aliases.join(', ')}`);
    }
  }

  io.out('');
  io.out(t.heading('Content:'));
  io.out(`  ${t.label('Content-Type:')} ${resource.content_type}`);
  if (resource.encoding !== undefined) {
    io.out(`  ${t.label('Encoding:')} ${resource.encoding}`);
  }
  io.out(`  ${t.label('Size:')} ${formatSize(size)} (${size} bytes)`);
  if (path !== undefined) {
    io.out(`  ${t.label('Path:')} ${path}`);
  }

  const metadata = Object.entries(resource.metadata ?? {});
  if (metadata.length > 0) {
    io.out('');
    io.out(t.heading('Metadata:'));
    for (const [key, value] of metadata) {
      if (typeof value === 'object' && value !== null && !Array.isArray(value)) {
        io.out(`  ${t.label(`${capitalize(key)}:`)}`);
        for (const [subkey, subvalue] of Object.entries(value)) {
          io.out(`    ${t.label(`${subkey}:`)} ${formatValue(subvalue)}`);
        }
      } else {
        io.out(`  ${t.label(`${capitalize(key)}:`)} ${formatValue(value)}`);
      }
    }
  }
  return ExitCode.Ok;
}

export function infoCommand(deps: CliDeps): Command {
  return new Command('info')
    .description('Show detailed information about a resource')
    .argument('<name>', 'Resource name, optionally prefixed')
    .action(async (name: string, _options: unknown, command: Command) => {
      await execute(deps, command.optsWithGlobals<GlobalOptions>(), (ctx) => runInfo(ctx, name), name);
    });
}
