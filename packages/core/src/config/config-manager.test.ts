/**
 * Tests for rootbox Config Manager
 */

import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import yaml from 'js-yaml';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ConfigError } from '../utils/errors.js';
import {
  formatConfig,
  getConfigPath,
  getDefaultConfig,
  getRootboxHome,
  initConfig,
  loadConfig,
  loadResolvedConfig,
  parseConfig,
  resolveConfig,
  saveConfig,
} from './config-manager.js';
import type { RootboxConfig } from './types.js';

/**
 * Helper: Create test config data
 */
function createConfigData(overrides?: Partial<RootboxConfig>): RootboxConfig {
  return {
    chroot: {
      skipChdir: true,
      user: 'builder',
      group: 'staff',
      groups: ['wheel', 'docker'],
    },
    execution: {
      mode: 'sudo-direct',
    },
    logging: {
      level: 'warn',
    },
    ...overrides,
  };
}

describe('getRootboxHome', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should return ~/.rootbox path', () => {
    vi.spyOn(os, 'homedir').mockReturnValue('/home/tester');
    expect(getRootboxHome()).toBe(path.join('/home/tester', '.rootbox'));
    expect(getConfigPath()).toBe(path.join('/home/tester', '.rootbox', 'config.yaml'));
  });
});

describe('getDefaultConfig', () => {
  it('should return the default config structure', () => {
    expect(getDefaultConfig()).toEqual({
      chroot: { skipChdir: false },
      execution: { mode: 'direct' },
      logging: { level: 'info' },
    });
  });
});

describe('parseConfig', () => {
  it('should treat an empty document as an empty config', () => {
    expect(parseConfig('', '/tmp/config.yaml')).toEqual({});
  });

  it('should parse a valid document', () => {
    const config = parseConfig(
      'chroot:\n  user: builder\n  groups: [wheel]\nexecution:\n  mode: noop\n',
      '/tmp/config.yaml'
    );
    expect(config).toEqual({
      chroot: { user: 'builder', groups: ['wheel'] },
      execution: { mode: 'noop' },
    });
  });

  it('should reject malformed YAML', () => {
    expect(() => parseConfig('chroot: [unclosed', '/tmp/config.yaml')).toThrow(ConfigError);
    expect(() => parseConfig('chroot: [unclosed', '/tmp/config.yaml')).toThrow(
      /^Failed to parse config at \/tmp\/config\.yaml: /
    );
  });

  it('should reject an unknown executor mode', () => {
    expect(() => parseConfig('execution:\n  mode: ssh\n', '/tmp/config.yaml')).toThrow(
      /^Invalid config at \/tmp\/config\.yaml: execution\.mode: /
    );
  });

  it('should reject unknown keys', () => {
    expect(() => parseConfig('chroot:\n  userspec: builder\n', '/tmp/config.yaml')).toThrow(
      /Unrecognized key/
    );
  });

  it('should reject a group without a user', () => {
    expect(() => parseConfig('chroot:\n  group: staff\n', '/tmp/config.yaml')).toThrow(
      'Invalid config at /tmp/config.yaml: chroot.group: group requires user to be set'
    );
  });

  it('should record the config path on the error', () => {
    try {
      parseConfig('logging:\n  level: loud\n', '/tmp/config.yaml');
      expect.unreachable('parseConfig should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      expect(error).toHaveProperty('configPath', '/tmp/config.yaml');
    }
  });
});

describe('formatConfig', () => {
  it('should render YAML with two-space indentation', () => {
    expect(formatConfig({ chroot: { user: 'builder', groups: ['wheel'] } })).toBe(
      'chroot:\n  user: builder\n  groups:\n    - wheel\n'
    );
  });
});

describe('resolveConfig', () => {
  it('should fill missing sections and keys from defaults', () => {
    expect(resolveConfig({ chroot: { user: 'builder' } })).toEqual({
      chroot: { skipChdir: false, user: 'builder' },
      execution: { mode: 'direct' },
      logging: { level: 'info' },
    });
  });

  it('should let configured values win', () => {
    const config = createConfigData();
    expect(resolveConfig(config)).toEqual(config);
  });
});

describe('config file', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'rootbox-test-'));
    vi.spyOn(os, 'homedir').mockReturnValue(tempDir);
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  describe('loadConfig', () => {
    it('should return defaults when the file does not exist', async () => {
      expect(await loadConfig()).toEqual(getDefaultConfig());
    });

    it('should load an existing config file', async () => {
      const configData = createConfigData();
      await fs.mkdir(path.join(tempDir, '.rootbox'), { recursive: true });
      await fs.writeFile(
        path.join(tempDir, '.rootbox', 'config.yaml'),
        yaml.dump(configData),
        'utf-8'
      );

      expect(await loadConfig()).toEqual(configData);
    });

    it('should throw ConfigError for an invalid file', async () => {
      await fs.mkdir(path.join(tempDir, '.rootbox'), { recursive: true });
      await fs.writeFile(
        path.join(tempDir, '.rootbox', 'config.yaml'),
        'execution:\n  mode: 42\n',
        'utf-8'
      );

      await expect(loadConfig()).rejects.toBeInstanceOf(ConfigError);
    });

    it('should throw ConfigError when the path cannot be read as a file', async () => {
      await fs.mkdir(path.join(tempDir, '.rootbox', 'config.yaml'), { recursive: true });

      await expect(loadConfig()).rejects.toThrow(/^Failed to load config: /);
    });
  });

  describe('saveConfig', () => {
    it('should create the home directory and write YAML', async () => {
      const configData = createConfigData();
      await saveConfig(configData);

      const content = await fs.readFile(path.join(tempDir, '.rootbox', 'config.yaml'), 'utf-8');
      expect(yaml.load(content)).toEqual(configData);
      expect(await loadConfig()).toEqual(configData);
    });
  });

  describe('initConfig', () => {
    it('should write defaults when no file exists', async () => {
      expect(await initConfig()).toBe(true);
      expect(await loadConfig()).toEqual(getDefaultConfig());
    });

    it('should not overwrite an existing file', async () => {
      const configData = createConfigData();
      await saveConfig(configData);

      expect(await initConfig()).toBe(false);
      expect(await loadConfig()).toEqual(configData);
    });
  });

  describe('loadResolvedConfig', () => {
    it('should merge the file over defaults', async () => {
      await saveConfig({ execution: { mode: 'noop' } });

      expect(await loadResolvedConfig()).toEqual({
        chroot: { skipChdir: false },
        execution: { mode: 'noop' },
        logging: { level: 'info' },
      });
    });
  });
});
