/**
 * chroot(1) Invocation Builder
 *
 * Accumulates sandboxing options for the `chroot` utility and materializes them,
 * together with a root directory and a program, into an invocation descriptor.
 *
 * Nothing here is privileged: the builder only produces arguments. Running the
 * result (and failing on a missing root, unknown user, or missing privileges) is
 * left to a CommandExecutor and the `chroot` binary itself.
 *
 * @example
 * ```typescript
 * const invocation = new ChrootConfig()
 *   .userAndGroup('builder', 'staff')
 *   .groups(['wheel'])
 *   .buildInvocation('/srv/rootfs', 'ls', ['/']);
 *
 * toArgv(invocation);
 * // ['chroot', '--userspec=builder:staff', '--groups=wheel', '/srv/rootfs', 'ls', '/']
 * ```
 */

/** Name of the external program every invocation targets */
export const CHROOT_PROGRAM = 'chroot';

/**
 * A program name plus its ordered argument list, ready for a process launcher
 */
export interface Invocation {
  readonly program: string;
  readonly args: readonly string[];
}

/**
 * Flatten an invocation into a single argv array (program first)
 */
export function toArgv(invocation: Invocation): string[] {
  return [invocation.program, ...invocation.args];
}

/**
 * Fluent builder for `chroot` invocations
 *
 * Options are held as discrete fields and only rendered into flags when an
 * invocation is built, so they can be inspected or overwritten until then.
 */
export class ChrootConfig {
  private skipChdirEnabled = false;
  private userSpecValue: string | undefined;
  private groupsValue: string[] | undefined;

  /**
   * Do not change the working directory to `/` after entering the new root.
   */
  skipChdir(): this {
    this.skipChdirEnabled = true;
    return this;
  }

  /**
   * Run as `user` (name or numeric ID). Replaces any earlier user/group setting.
   */
  user(user: string): this {
    this.userSpecValue = user;
    return this;
  }

  /**
   * Run as `user:group` (names or numeric IDs). Replaces any earlier user/group setting.
   */
  userAndGroup(user: string, group: string): this {
    this.userSpecValue = `${user}:${group}`;
    return this;
  }

  /**
   * Set supplementary groups, in the order given
   *
   * An empty sequence leaves the current list untouched; `--groups=` with no
   * value means nothing to chroot(1).
   */
  groups(groups: Iterable<string>): this {
    const list = Array.from(groups);
    if (list.length > 0) {
      this.groupsValue = list;
    }
    return this;
  }

  get skipsChdir(): boolean {
    return this.skipChdirEnabled;
  }

  get userSpec(): string | undefined {
    return this.userSpecValue;
  }

  get supplementaryGroups(): readonly string[] | undefined {
    return this.groupsValue ? [...this.groupsValue] : undefined;
  }

  /**
   * Render the option flags, always as `--skip-chdir`, `--userspec=`, `--groups=`
   * regardless of the order the setters were called in.
   */
  toFlags(): string[] {
    const flags: string[] = [];

    if (this.skipChdirEnabled) {
      flags.push('--skip-chdir');
    }

    if (this.userSpecValue !== undefined) {
      flags.push(`--userspec=${this.userSpecValue}`);
    }

    if (this.groupsValue) {
      flags.push(`--groups=${this.groupsValue.join(',')}`);
    }

    return flags;
  }

  /**
   * Build an invocation that runs `program` with `root` as `/`
   *
   * The root path is passed through verbatim; chroot(1) reports a missing or
   * non-directory root when the invocation is executed.
   *
   * @param root - Directory to use as the new root
   * @param program - Program to run inside the new root
   * @param extraArgs - Arguments for `program`
   */
  buildInvocation(root: string, program: string, extraArgs: Iterable<string> = []): Invocation {
    return {
      program: CHROOT_PROGRAM,
      args: [...this.toFlags(), root, program, ...extraArgs],
    };
  }
}
