import { getConfigPath, initConfig } from '@rootbox/core/config';
import chalk from 'chalk';
import { BaseCommand } from '../../base-command.js';

export default class ConfigInit extends BaseCommand {
  static override description = 'Create ~/.rootbox/config.yaml with default settings';

  static override examples = ['<%= config.bin %> <%= command.id %>'];

  public async run(): Promise<void> {
    const created = await initConfig();

    if (created) {
      this.log(chalk.green(`✓ Created ${getConfigPath()}`));
    } else {
      this.log(chalk.dim(`Config already exists at ${getConfigPath()}`));
    }
  }
}
