/**
 * Shell rendering for invocations
 *
 * Invocations are never executed through a shell. These helpers only produce a
 * copy-pasteable line for logs and dry runs.
 */

import { type Invocation, toArgv } from './chroot.js';

const SAFE_ARG = /^[A-Za-z0-9_./:=@,+%-]+$/;

/**
 * Quote a single argument for POSIX shells
 *
 * @example
 * shellQuote('/srv/rootfs'); // "/srv/rootfs"
 * shellQuote("it's"); // "'it'\\''s'"
 */
export function shellQuote(arg: string): string {
  if (SAFE_ARG.test(arg)) {
    return arg;
  }
  return `'${arg.replace(/'/g, "'\\''")}'`;
}

/**
 * Render an invocation as one shell command line
 */
export function formatInvocation(invocation: Invocation): string {
  return toArgv(invocation).map(shellQuote).join(' ');
}
