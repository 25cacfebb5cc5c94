/**
 * Logger Utility
 * Provides debug and standard logging with global debug and quiet flag control
 */

let debugMode = false;
let quietMode = false;

/**
 * Logger shape accepted by the core modules
 */
export interface Logger {
  debug: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
}

/**
 * Set the global debug mode
 */
export function setDebugMode(enabled: boolean): void {
  debugMode = enabled;
}

/**
 * Get the current debug mode status
 */
export function isDebugMode(): boolean {
  return debugMode;
}

/**
 * Suppress info and debug output (warnings and errors still show)
 */
export function setQuietMode(enabled: boolean): void {
  quietMode = enabled;
}

export function isQuietMode(): boolean {
  return quietMode;
}

/**
 * Log a debug message (only shown when debug mode is enabled)
 */
export function debug(...args: unknown[]): void {
  if (debugMode && !quietMode) {
    console.log(...args);
  }
}

/**
 * Log an info message (hidden in quiet mode)
 */
export function info(...args: unknown[]): void {
  if (!quietMode) {
    console.log(...args);
  }
}

/**
 * Log a warning message (always shown)
 */
export function warn(...args: unknown[]): void {
  console.warn(...args);
}

/**
 * Log an error message (always shown)
 */
export function error(...args: unknown[]): void {
  console.error(...args);
}

/**
 * Create a scoped logger with a prefix
 */
export function createLogger(prefix: string): Logger {
  return {
    debug: (...args: unknown[]) => debug(`[${prefix}]`, ...args),
    info: (...args: unknown[]) => info(`[${prefix}]`, ...args),
    warn: (...args: unknown[]) => warn(`[${prefix}]`, ...args),
    error: (...args: unknown[]) => error(`[${prefix}]`, ...args),
  };
}

/**
 * Logger that drops everything
 */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
