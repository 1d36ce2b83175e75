/**
 * Command Executor Interface
 *
 * Abstraction for launching chroot invocations.
 * Supports three modes:
 * - DirectExecutor: Runs the invocation as-is (for a CLI already running as root)
 * - SudoDirectExecutor: Prefixes `sudo -n` (for an unprivileged user with passwordless sudo)
 * - NoOpExecutor: Logs what would run (for dry runs and tests)
 *
 * Executors report exit status and output; they never interpret them.
 */

import { type ChildProcess, type SpawnOptions, spawn } from 'node:child_process';
import { getErrorMessage, isErrnoException } from '../utils/errors.js';
import type { Invocation } from './chroot.js';
import { formatInvocation } from './shell-quote.js';

/**
 * Process launcher signature (matches node:child_process.spawn)
 */
export type SpawnFunction = (
  command: string,
  args: readonly string[],
  options: SpawnOptions
) => ChildProcess;

/**
 * Result of command execution
 */
export interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

/**
 * Options for a single execution
 */
export interface ExecOptions {
  /** Data to write to stdin before closing it */
  input?: string;

  /**
   * Attach the child to this process's stdin/stdout/stderr instead of capturing output.
   * stdout and stderr in the result are empty when set.
   */
  inheritStdio?: boolean;
}

/** Exit code reported when the program could not be found */
export const EXIT_CODE_NOT_FOUND = 127;

/** Exit code reported when the program could not be executed */
export const EXIT_CODE_NOT_EXECUTABLE = 126;

/**
 * Command executor interface
 *
 * Implementations determine HOW invocations are launched (directly, via sudo, etc.)
 */
export interface CommandExecutor {
  /**
   * Launch an invocation and wait for it to close
   *
   * Does not reject: launch failures are reported as a non-zero exit code with
   * the failure message in stderr.
   */
  exec(invocation: Invocation, options?: ExecOptions): Promise<CommandResult>;

  /**
   * Check if an invocation succeeds (exit code 0)
   */
  check(invocation: Invocation): Promise<boolean>;
}

export const EXECUTOR_MODES = ['direct', 'sudo-direct', 'noop'] as const;

export type ExecutorMode = (typeof EXECUTOR_MODES)[number];

/**
 * Spawn an invocation without a shell and collect its output
 */
function spawnInvocation(
  spawnFn: SpawnFunction,
  invocation: Invocation,
  options: ExecOptions
): Promise<CommandResult> {
  return new Promise((resolve, reject) => {
    const child = spawnFn(invocation.program, invocation.args, {
      stdio: options.inheritStdio ? 'inherit' : ['pipe', 'pipe', 'pipe'],
    });

    let stdout = '';
    let stderr = '';

    child.stdout?.on('data', (data: Buffer) => {
      stdout += data.toString();
    });

    child.stderr?.on('data', (data: Buffer) => {
      stderr += data.toString();
    });

    child.on('error', reject);

    child.on('close', (code: number | null) => {
      resolve({
        stdout,
        stderr,
        exitCode: code ?? 1,
      });
    });

    if (child.stdin) {
      // EPIPE when the child exits (or never starts) before reading its input
      child.stdin.on('error', (error: Error) => {
        console.warn(`[spawnInvocation] stdin closed early: ${error.message}`);
      });
      if (options.input !== undefined) {
        child.stdin.write(options.input);
      }
      child.stdin.end();
    }
  });
}

function launchFailureExitCode(error: unknown): number {
  if (isErrnoException(error)) {
    if (error.code === 'ENOENT') return EXIT_CODE_NOT_FOUND;
    if (error.code === 'EACCES') return EXIT_CODE_NOT_EXECUTABLE;
  }
  return 1;
}

async function runInvocation(
  label: string,
  spawnFn: SpawnFunction,
  invocation: Invocation,
  options: ExecOptions
): Promise<CommandResult> {
  const commandLine = formatInvocation(invocation);
  console.log(`[${label}] Executing: ${commandLine}`);
  try {
    return await spawnInvocation(spawnFn, invocation, options);
  } catch (error: unknown) {
    const message = getErrorMessage(error);
    console.error(`[${label}] Failed to launch: ${commandLine}`, message);
    return {
      stdout: '',
      stderr: message,
      exitCode: launchFailureExitCode(error),
    };
  }
}

/**
 * Wrap an invocation in `sudo -n`
 *
 * -n (non-interactive) makes sudo fail instead of blocking on a password prompt.
 */
export function withSudo(invocation: Invocation): Invocation {
  return {
    program: 'sudo',
    args: ['-n', invocation.program, ...invocation.args],
  };
}

/**
 * Direct command executor
 *
 * Launches invocations as given. Use when already running as root.
 */
export class DirectExecutor implements CommandExecutor {
  constructor(private readonly spawnFn: SpawnFunction = spawn) {}

  async exec(invocation: Invocation, options: ExecOptions = {}): Promise<CommandResult> {
    return runInvocation('DirectExecutor', this.spawnFn, invocation, options);
  }

  async check(invocation: Invocation): Promise<boolean> {
    const result = await this.exec(invocation);
    return result.exitCode === 0;
  }
}

/**
 * Sudo direct command executor
 *
 * Launches invocations with a `sudo -n` prefix. Use when running as an unprivileged
 * user with passwordless sudo access.
 */
export class SudoDirectExecutor implements CommandExecutor {
  constructor(private readonly spawnFn: SpawnFunction = spawn) {}

  async exec(invocation: Invocation, options: ExecOptions = {}): Promise<CommandResult> {
    return runInvocation('SudoDirectExecutor', this.spawnFn, withSudo(invocation), options);
  }

  async check(invocation: Invocation): Promise<boolean> {
    const result = await this.exec(invocation);
    return result.exitCode === 0;
  }
}

/**
 * No-op executor for dry runs or testing
 *
 * Logs invocations but doesn't launch them.
 */
export class NoOpExecutor implements CommandExecutor {
  async exec(invocation: Invocation, _options?: ExecOptions): Promise<CommandResult> {
    console.log(`[NoOpExecutor] Would execute: ${formatInvocation(invocation)}`);
    return { stdout: '', stderr: '', exitCode: 0 };
  }

  async check(_invocation: Invocation): Promise<boolean> {
    return true;
  }
}

/**
 * Create appropriate executor based on configuration
 *
 * @param mode - Execution mode:
 *   - 'direct': Launch directly (requires root)
 *   - 'sudo-direct': Launch with `sudo -n` prefix
 *   - 'noop': Log but don't launch
 * @param spawnFn - Process launcher for the launching modes
 */
export function createExecutor(mode: ExecutorMode, spawnFn?: SpawnFunction): CommandExecutor {
  switch (mode) {
    case 'direct':
      return new DirectExecutor(spawnFn);
    case 'sudo-direct':
      return new SudoDirectExecutor(spawnFn);
    case 'noop':
      return new NoOpExecutor();
    default: {
      const unknownMode: never = mode;
      throw new Error(`Unknown executor mode: ${String(unknownMode)}`);
    }
  }
}
