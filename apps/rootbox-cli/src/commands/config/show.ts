import { formatConfig, getConfigPath } from '@rootbox/core/config';
import chalk from 'chalk';
import { BaseCommand } from '../../base-command.js';

export default class ConfigShow extends BaseCommand {
  static override description = 'Show the effective configuration (file merged with defaults)';

  static override examples = ['<%= config.bin %> <%= command.id %>'];

  public async run(): Promise<void> {
    this.log(chalk.dim(`# ${getConfigPath()}`));
    this.log(formatConfig(this.rootboxConfig).trimEnd());
  }
}
