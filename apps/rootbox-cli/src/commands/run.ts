/**
 * `rootbox run <root> <program> [-- args...]` - Run a program under chroot(1)
 *
 * PRIVILEGED OPERATION - chroot needs root; run via sudo or use --mode sudo-direct.
 *
 * Flags are merged over the `chroot` section of ~/.rootbox/config.yaml.
 */

import { Args, Flags } from '@oclif/core';
import { EXECUTOR_MODES } from '@rootbox/core/unix';
import chalk from 'chalk';
import { BaseCommand } from '../base-command.js';
import { runChroot, toRunRequest } from '../lib/invocation.js';

export default class Run extends BaseCommand {
  static override description = 'Run a program with a different root directory via chroot(1)';

  static override strict = false;

  static override examples = [
    'sudo <%= config.bin %> <%= command.id %> /srv/rootfs /bin/sh',
    '<%= config.bin %> <%= command.id %> --mode sudo-direct -u builder -g staff /srv/rootfs -- ls -la /',
    '<%= config.bin %> <%= command.id %> --dry-run --skip-chdir -G wheel,docker /srv/rootfs id',
  ];

  static override args = {
    root: Args.string({
      description: 'Directory to use as the new root',
      required: true,
    }),
    program: Args.string({
      description: 'Program to run inside the new root (arguments follow after --)',
      required: true,
    }),
  };

  static override flags = {
    'skip-chdir': Flags.boolean({
      description: 'Do not change the working directory to / inside the new root',
      default: false,
    }),
    user: Flags.string({
      char: 'u',
      description: 'User (name or ID) to run as',
    }),
    group: Flags.string({
      char: 'g',
      description: 'Group (name or ID) to run as',
      dependsOn: ['user'],
    }),
    groups: Flags.string({
      char: 'G',
      description: 'Supplementary groups (repeatable or comma-separated)',
      multiple: true,
      // one value per -G, so root and program are not swallowed
      multipleNonGreedy: true,
      delimiter: ',',
    }),
    mode: Flags.option({
      description: 'How to launch chroot (default: execution.mode from config)',
      options: EXECUTOR_MODES,
    })(),
    'dry-run': Flags.boolean({
      char: 'n',
      description: 'Print the chroot command line without running it',
      default: false,
    }),
  };

  public async run(): Promise<void> {
    const { args, argv, flags } = await this.parse(Run);

    const outcome = await runChroot(toRunRequest(args, argv), flags, this.rootboxConfig);

    if (outcome.kind === 'dry-run') {
      this.log(outcome.commandLine);
      return;
    }

    const { result } = outcome;
    if (result.exitCode !== 0) {
      if (result.stderr) {
        this.logToStderr(chalk.red(`✗ ${result.stderr}`));
      }
      this.exit(result.exitCode);
    }
  }
}
