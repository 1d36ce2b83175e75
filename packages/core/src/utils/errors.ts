/**
 * Error handling and formatting utilities
 */

/**
 * Extract a readable message from anything that was thrown
 */
export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Narrow an unknown error to a Node.js system error carrying a `code`
 */
export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/**
 * Configuration file could not be read, parsed, or validated
 */
export class ConfigError extends Error {
  readonly configPath: string;

  constructor(message: string, configPath: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigError';
    this.configPath = configPath;
  }
}
