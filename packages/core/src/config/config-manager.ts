/**
 * rootbox Config Manager
 *
 * Handles loading, validating and saving the YAML configuration file.
 */

import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import yaml from 'js-yaml';
import { ConfigError, getErrorMessage, isErrnoException } from '../utils/errors.js';
import { type RootboxConfig, RootboxConfigSchema } from './types.js';

/**
 * Get rootbox home directory (~/.rootbox)
 */
export function getRootboxHome(): string {
  return path.join(os.homedir(), '.rootbox');
}

/**
 * Get config file path (~/.rootbox/config.yaml)
 */
export function getConfigPath(): string {
  return path.join(getRootboxHome(), 'config.yaml');
}

/**
 * Get default config
 */
export function getDefaultConfig(): RootboxConfig {
  return {
    chroot: {
      skipChdir: false,
    },
    execution: {
      mode: 'direct',
    },
    logging: {
      level: 'info',
    },
  };
}

/**
 * Parse and validate config file content
 *
 * An empty document is an empty config.
 */
export function parseConfig(content: string, configPath: string = getConfigPath()): RootboxConfig {
  let raw: unknown;
  try {
    raw = yaml.load(content);
  } catch (error) {
    throw new ConfigError(
      `Failed to parse config at ${configPath}: ${getErrorMessage(error)}`,
      configPath,
      { cause: error }
    );
  }

  const result = RootboxConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid config at ${configPath}: ${issues}`, configPath);
  }

  return result.data;
}

/**
 * Load config from ~/.rootbox/config.yaml
 *
 * Returns default config if file doesn't exist.
 */
export async function loadConfig(): Promise<RootboxConfig> {
  const configPath = getConfigPath();

  let content: string;
  try {
    content = await fs.readFile(configPath, 'utf-8');
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return getDefaultConfig();
    }
    throw new ConfigError(
      `Failed to load config: ${getErrorMessage(error)}`,
      configPath,
      { cause: error }
    );
  }

  return parseConfig(content, configPath);
}

/**
 * Save config to ~/.rootbox/config.yaml
 */
export async function saveConfig(config: RootboxConfig): Promise<void> {
  await fs.mkdir(getRootboxHome(), { recursive: true });
  await fs.writeFile(getConfigPath(), formatConfig(config), 'utf-8');
}

/**
 * Render config as YAML (the on-disk format)
 */
export function formatConfig(config: RootboxConfig): string {
  return yaml.dump(config, {
    indent: 2,
    lineWidth: 120,
    noRefs: true,
  });
}

/**
 * Initialize config file with defaults if it doesn't exist
 *
 * @returns true if a file was written
 */
export async function initConfig(): Promise<boolean> {
  try {
    await fs.access(getConfigPath());
    // File exists, don't overwrite
    return false;
  } catch {
    await saveConfig(getDefaultConfig());
    return true;
  }
}

/**
 * Merge config with defaults, section by section
 */
export function resolveConfig(config: RootboxConfig): RootboxConfig {
  const defaults = getDefaultConfig();
  return {
    chroot: { ...defaults.chroot, ...config.chroot },
    execution: { ...defaults.execution, ...config.execution },
    logging: { ...defaults.logging, ...config.logging },
  };
}

/**
 * Load config and merge it with defaults
 */
export async function loadResolvedConfig(): Promise<RootboxConfig> {
  return resolveConfig(await loadConfig());
}
