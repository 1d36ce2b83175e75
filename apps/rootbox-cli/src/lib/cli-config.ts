/**
 * Config loading shared by every command
 */

import { loadResolvedConfig, type RootboxConfig } from '@rootbox/core/config';
import { getErrorMessage, type LogLevel, resolveLogLevel } from '@rootbox/core/utils';
import chalk from 'chalk';

export interface CliSettings {
  config: RootboxConfig;
  logLevel: LogLevel;
}

/**
 * Load the resolved config and pick the console log level
 *
 * LOG_LEVEL wins over `logging.level` from the config file.
 *
 * @throws ConfigError if the config file cannot be read, parsed or validated
 */
export async function loadCliSettings(env: NodeJS.ProcessEnv = process.env): Promise<CliSettings> {
  const config = await loadResolvedConfig();
  return {
    config,
    logLevel: resolveLogLevel(env.LOG_LEVEL ?? config.logging?.level),
  };
}

/**
 * Error block printed when the config cannot be loaded
 */
export function formatConfigLoadError(error: unknown): string {
  return (
    chalk.red(`✗ ${getErrorMessage(error)}`) +
    '\n\n' +
    chalk.dim('Fix or remove the config file and try again.')
  );
}
