/**
 * Console log level filtering
 *
 * Library code logs through plain `console.*` calls with a `[Component]` prefix.
 * patchConsole() swaps the console methods for no-ops below the active level,
 * so that output can be tuned with LOG_LEVEL without touching call sites.
 */

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 50,
};

type ConsoleMethod = 'debug' | 'log' | 'info' | 'warn' | 'error';

const CONSOLE_METHODS: readonly ConsoleMethod[] = ['debug', 'log', 'info', 'warn', 'error'];

// console.log is treated as info
const METHOD_LEVELS: Record<ConsoleMethod, LogLevel> = {
  debug: 'debug',
  log: 'info',
  info: 'info',
  warn: 'warn',
  error: 'error',
};

type ConsoleSnapshot = Record<ConsoleMethod, Console[ConsoleMethod]>;

let originalConsole: ConsoleSnapshot | null = null;

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Map a level name (e.g. from LOG_LEVEL) to a LogLevel, defaulting to 'info'
 */
export function resolveLogLevel(value: string | undefined): LogLevel {
  const normalized = value?.trim().toLowerCase() ?? '';
  return isLogLevel(normalized) ? normalized : 'info';
}

/**
 * Patch console methods to drop output below `level`
 *
 * Safe to call repeatedly; each call starts from the unpatched methods.
 */
export function patchConsole(level: LogLevel = resolveLogLevel(process.env.LOG_LEVEL)): void {
  const original: ConsoleSnapshot = originalConsole ?? {
    debug: console.debug,
    log: console.log,
    info: console.info,
    warn: console.warn,
    error: console.error,
  };
  originalConsole = original;

  const threshold = LEVEL_ORDER[level];
  const noop = () => {};

  for (const method of CONSOLE_METHODS) {
    console[method] = LEVEL_ORDER[METHOD_LEVELS[method]] >= threshold ? original[method] : noop;
  }
}

/**
 * Undo patchConsole()
 */
export function restoreConsole(): void {
  const original = originalConsole;
  if (!original) {
    return;
  }
  for (const method of CONSOLE_METHODS) {
    console[method] = original[method];
  }
  originalConsole = null;
}
