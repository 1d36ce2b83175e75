/**
 * `rootbox run` helpers: merge config-file chroot defaults with flags, then render or execute
 */

import type { ChrootDefaults, RootboxConfig } from '@rootbox/core/config';
import {
  ChrootConfig,
  type CommandExecutor,
  type CommandResult,
  createExecutor,
  type ExecutorMode,
  formatInvocation,
} from '@rootbox/core/unix';

/**
 * chroot-related flags accepted by `rootbox run`
 */
export interface ChrootFlags {
  'skip-chdir': boolean;
  user?: string;
  group?: string;
  groups?: string[];
}

/**
 * All flags accepted by `rootbox run`
 */
export interface RunFlags extends ChrootFlags {
  mode?: ExecutorMode;
  'dry-run': boolean;
}

/**
 * Positional input of `rootbox run`
 */
export interface RunRequest {
  root: string;
  program: string;
  extraArgs: readonly string[];
}

export type RunOutcome =
  | { kind: 'dry-run'; commandLine: string }
  | { kind: 'executed'; result: CommandResult };

/**
 * Build a ChrootConfig from config defaults, then flags
 *
 * - --skip-chdir is on if either source turns it on
 * - --user replaces the configured user and group as a pair
 * - --groups replaces configured groups only when non-empty
 */
export function createChrootConfig(
  defaults: ChrootDefaults | undefined,
  flags: ChrootFlags
): ChrootConfig {
  const config = new ChrootConfig();

  if (flags['skip-chdir'] || defaults?.skipChdir) {
    config.skipChdir();
  }

  const fromFlags = flags.user !== undefined;
  const user = fromFlags ? flags.user : defaults?.user;
  const group = fromFlags ? flags.group : defaults?.group;

  if (user !== undefined) {
    if (group !== undefined) {
      config.userAndGroup(user, group);
    } else {
      config.user(user);
    }
  }

  return config.groups(defaults?.groups ?? []).groups(flags.groups ?? []);
}

/**
 * Pick the executor mode: flag, then config, then 'direct'
 */
export function resolveExecutorMode(
  flagMode: ExecutorMode | undefined,
  config: RootboxConfig
): ExecutorMode {
  return flagMode ?? config.execution?.mode ?? 'direct';
}

/**
 * Split parsed positionals into root, program and the program's arguments
 *
 * `argv` holds every positional argument, including root and program.
 */
export function toRunRequest(
  args: { root: string; program: string },
  argv: readonly unknown[]
): RunRequest {
  return { root: args.root, program: args.program, extraArgs: argv.slice(2).map(String) };
}

/**
 * Build the chroot invocation for `rootbox run` and either render or execute it
 *
 * Executed invocations inherit stdio; the result's exit code is the one the CLI exits with.
 */
export async function runChroot(
  request: RunRequest,
  flags: RunFlags,
  config: RootboxConfig,
  executorFactory: (mode: ExecutorMode) => CommandExecutor = createExecutor
): Promise<RunOutcome> {
  const invocation = createChrootConfig(config.chroot, flags).buildInvocation(
    request.root,
    request.program,
    request.extraArgs
  );

  if (flags['dry-run']) {
    return { kind: 'dry-run', commandLine: formatInvocation(invocation) };
  }

  const executor = executorFactory(resolveExecutorMode(flags.mode, config));
  const result = await executor.exec(invocation, { inheritStdio: true });
  return { kind: 'executed', result };
}
