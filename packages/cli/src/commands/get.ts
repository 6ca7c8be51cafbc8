/**
 * respack get — Fetch a resource
 *
 * Prints metadata by default. With -o, writes the content instead:
 * `-o -` to stdout, `-o <path>` to a file.
 */

import { writeFile } from 'node:fs/promises';
import { Command } from 'commander';
import { resourceText } from '@respack/kernel';
import type { CliDeps, CommandContext, GlobalOptions } from '../context.js';
import { execute } from '../context.js';
import { ExitCode } from '../exit-codes.js';
import { capitalize, formatSize, formatValue, toJson } from '../format.js';
import { lookupResource } from './lookup.js';

export interface GetOptions {
  readonly output?: string | undefined;
}

export async function runGet(ctx: CommandContext, name: string, options: GetOptions): Promise<ExitCode> {
  const { resource, pack, path } = await lookupResource(ctx.registry, name);

  if (options.output === '-') {
    ctx.io.write(resource.encoding !== undefined ? resourceText(resource) : resource.data);
    return ExitCode.Ok;
  }
  if (options.output !== undefined) {
    await writeFile(options.output, resource.data);
    if (!ctx.json) {
      ctx.io.err(`Saved to: ${options.output}`);
    }
    return ExitCode.Ok;
  }

  const size = resource.data.byteLength;
  if (ctx.json) {
    ctx.io.out(toJson({
      found: true,
      name,
      pack,
      content_type: resource.content_type,
      encoding: resource.encoding ?? null,
      size,
      size_human: formatSize(size),
      metadata: resource.metadata ?? null,
      ...(path !== undefined ? { path } : {}),
    }));
    return ExitCode.Ok;
  }

  const { theme: t } = ctx;
  ctx.io.out(`${t.label('Resource:')} ${t.name(name)}`);
  ctx.io.out(`${t.label('Pack:')} ${t.pack(pack)}`);
  ctx.io.out(`${t.label('Content-Type:')} ${resource.content_type}`);
  if (resource.encoding !== undefined) {
    ctx.io.out(`${t.label('Encoding:')} ${resource.encoding}`);
  }
  ctx.io.out(`${t.label('Size:')} ${formatSize(size)}`);
  if (path !== undefined) {
    ctx.io.out(`${t.label('Path:')} ${path}`);
  }
  for (const [key, value] of Object.entries(resource.metadata ?? {})) {
    ctx.io.out(`${t.label(`${capitalize(key)}:`)} ${formatValue(value)}`);
  }
  return ExitCode.Ok;
}

export function getCommand(deps: CliDeps): Command {
  return new Command('get')
    .description('Fetch a resource (metadata unless -o is given)')
    .argument('<name>', 'Resource name, optionally prefixed (e.g. lucide:home)')
    .option('-o, --output <dest>', "'-' for stdout, or a file path")
    .action(async (name: string, options: GetOptions, command: Command) => {
      await execute(deps, command.optsWithGlobals<GlobalOptions>(), (ctx) => runGet(ctx, name, options), name);
    });
}
