/**
 * Base Command - Shared logic for all rootbox CLI commands
 *
 * Loads the config file and applies the log level before any command runs.
 */

import { getDefaultConfig, type RootboxConfig } from '@rootbox/core/config';
import { patchConsole } from '@rootbox/core/utils';
import { Command } from '@oclif/core';
import { formatConfigLoadError, loadCliSettings } from './lib/cli-config.js';

/**
 * Base command with resolved configuration
 */
export abstract class BaseCommand extends Command {
  protected rootboxConfig: RootboxConfig = getDefaultConfig();

  public override async init(): Promise<void> {
    await super.init();

    try {
      const settings = await loadCliSettings();
      this.rootboxConfig = settings.config;
      patchConsole(settings.logLevel);
    } catch (error) {
      this.error(formatConfigLoadError(error));
    }
  }
}
