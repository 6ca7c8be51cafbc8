/**
 * Respack CLI — Command context
 *
 * Turns global flags into registry options, builds the registry, runs a
 * command body and maps whatever it throws to an exit code and a message.
 */

import { ResourceNotFoundError, isKindedError } from '@respack/kernel';
import { ResourceRegistry } from '@respack/pack-loader';
import { parseCollisionPolicy, parseList, parsePrefixMap } from '@respack/runtime-host';
import type { RegistryConfigOptions } from '@respack/runtime-host';
import { ExitCode, exitCodeFor } from './exit-codes.js';
import { toJson } from './format.js';
import type { CliIO } from './io.js';
import { processIO } from './io.js';
import { createTheme } from './theme.js';
import type { Theme } from './theme.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Program-level flags, as commander hands them over. */
export type GlobalOptions = {
  readonly blocklist?: string | undefined;
  readonly prefixMap?: string | undefined;
  readonly defaultPrefix?: string | undefined;
  readonly policy?: string | undefined;
  readonly json?: boolean | undefined;
  readonly debug?: boolean | undefined;
};

export type RegistryFactory = (options: RegistryConfigOptions) => ResourceRegistry;

/** Everything the program needs from its surroundings. */
export interface CliDeps {
  readonly io: CliIO;
  readonly createRegistry: RegistryFactory;
  readonly setExitCode: (code: ExitCode) => void;
}

/** What a command body runs against. */
export interface CommandContext {
  readonly registry: ResourceRegistry;
  readonly io: CliIO;
  readonly theme: Theme;
  readonly json: boolean;
}

export function defaultDeps(): CliDeps {
  return {
    io: processIO,
    createRegistry: (options) => new ResourceRegistry(options),
    setExitCode: (code) => {
      process.exitCode = code;
    },
  };
}

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

/**
 * Map global flags to registry options. Flags left unset fall through to
 * the environment inside the registry.
 *
 * @throws {RegistryConfigError} for an unknown --policy value
 */
export function registryOptionsFrom(globals: GlobalOptions): RegistryConfigOptions {
  return {
    blocklist: parseList(globals.blocklist),
    prefixMap: parsePrefixMap(globals.prefixMap),
    defaultPrefix: globals.defaultPrefix,
    collisionPolicy: parseCollisionPolicy(globals.policy),
    debug: globals.debug === true ? true : undefined,
  };
}

// ---------------------------------------------------------------------------
// Execution
// ---------------------------------------------------------------------------

/**
 * Build the registry from the global flags and run a command body.
 *
 * @param subject - Resource name the command is about, for failure output
 */
export async function execute(
  deps: CliDeps,
  globals: GlobalOptions,
  body: (ctx: CommandContext) => Promise<ExitCode>,
  subject?: string,
): Promise<void> {
  const ctx = {
    io: deps.io,
    theme: createTheme(deps.io.color),
    json: globals.json === true,
  };
  let code: ExitCode;
  try {
    const registry = deps.createRegistry(registryOptionsFrom(globals));
    code = await body({ ...ctx, registry });
  } catch (err: unknown) {
    code = reportFailure(err, ctx, subject);
  }
  deps.setExitCode(code);
}

/**
 * Print a failure and pick its exit code. Resolution and not-found
 * messages are printed exactly as the registry produced them.
 */
export function reportFailure(
  err: unknown,
  ctx: Pick<CommandContext, 'io' | 'theme' | 'json'>,
  subject?: string,
): ExitCode {
  const message = err instanceof Error ? err.message : String(err);

  if (isKindedError(err)) {
    if (ctx.json) {
      ctx.io.out(toJson({ found: false, kind: err.kind, error: message }));
    } else {
      if (subject !== undefined) {
        const lead = err instanceof ResourceNotFoundError ? 'Resource not found' : 'Cannot resolve';
        ctx.io.err(`${lead}: ${subject}`);
      }
      ctx.io.err(`${ctx.theme.error('Error:')} ${message}`);
    }
    return exitCodeFor(err.kind);
  }

  if (ctx.json) {
    ctx.io.out(toJson({ error: message }));
  } else {
    ctx.io.err(`${ctx.theme.error('Error:')} ${message}`);
  }
  return ExitCode.Error;
}
