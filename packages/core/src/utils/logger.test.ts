import { afterEach, beforeEach, describe, expect, it, type Mock, vi } from 'vitest';
import { patchConsole, resolveLogLevel, restoreConsole } from './logger.js';

describe('resolveLogLevel', () => {
  it('should accept known levels case-insensitively', () => {
    expect(resolveLogLevel('debug')).toBe('debug');
    expect(resolveLogLevel('WARN')).toBe('warn');
    expect(resolveLogLevel(' error ')).toBe('error');
    expect(resolveLogLevel('silent')).toBe('silent');
  });

  it('should fall back to info', () => {
    expect(resolveLogLevel(undefined)).toBe('info');
    expect(resolveLogLevel('')).toBe('info');
    expect(resolveLogLevel('verbose')).toBe('info');
  });
});

describe('patchConsole', () => {
  let debug: Mock;
  let log: Mock;
  let warn: Mock;
  let error: Mock;

  beforeEach(() => {
    debug = vi.fn();
    log = vi.fn();
    warn = vi.fn();
    error = vi.fn();
    vi.spyOn(console, 'debug').mockImplementation(debug);
    vi.spyOn(console, 'log').mockImplementation(log);
    vi.spyOn(console, 'info').mockImplementation(log);
    vi.spyOn(console, 'warn').mockImplementation(warn);
    vi.spyOn(console, 'error').mockImplementation(error);
  });

  afterEach(() => {
    restoreConsole();
    vi.restoreAllMocks();
  });

  it('should drop output below the level', () => {
    patchConsole('warn');

    console.debug('d');
    console.log('l');
    console.info('i');
    console.warn('w');
    console.error('e');

    expect(debug).not.toHaveBeenCalled();
    expect(log).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith('w');
    expect(error).toHaveBeenCalledWith('e');
  });

  it('should keep everything at debug', () => {
    patchConsole('debug');

    console.debug('d');
    console.log('l');

    expect(debug).toHaveBeenCalledWith('d');
    expect(log).toHaveBeenCalledWith('l');
  });

  it('should drop everything when silent', () => {
    patchConsole('silent');

    console.error('e');

    expect(error).not.toHaveBeenCalled();
  });

  it('should re-derive from the original methods on repeated calls', () => {
    patchConsole('error');
    patchConsole('info');

    console.log('l');

    expect(log).toHaveBeenCalledWith('l');
  });

  it('should restore the original methods', () => {
    patchConsole('silent');
    restoreConsole();

    console.warn('w');

    expect(warn).toHaveBeenCalledWith('w');
  });
});
