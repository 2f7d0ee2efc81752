/**
 * @fileoverview Debug logging for histokit. Output is conditional on debug
 *   flags so that hot paths such as `increment` pay only a boolean check.
 */

const GLOBAL_FLAG = '__HISTOKIT_DEBUG';
const ENV_FLAG = 'HISTOKIT_DEBUG';

/**
 * Simple logger that only outputs when debug mode is enabled.
 * Debug mode is activated via:
 * - globalThis.__HISTOKIT_DEBUG = true
 * - process.env.HISTOKIT_DEBUG set to any non-empty value
 */
export class Logger {
  private readonly enabled: boolean;
  private readonly prefix: string;

  constructor(prefix: string, forceEnable = false) {
    this.prefix = prefix;
    this.enabled = forceEnable || isDebugMode();
  }

  get isEnabled(): boolean {
    return this.enabled;
  }

  /**
   * Log a message if debug mode is enabled.
   * Arguments are passed directly to console.log after the prefix.
   */
  log(...args: unknown[]): void {
    if (this.enabled) {
      console.log(`[${this.prefix}]`, ...args);
    }
  }
}

/**
 * Check if debug mode is enabled via global flags.
 */
export function isDebugMode(): boolean {
  return Boolean(
    Reflect.get(globalThis, GLOBAL_FLAG) ||
      (typeof process !== 'undefined' && process.env[ENV_FLAG])
  );
}

/**
 * Create a logger instance with a given prefix.
 */
export function createLogger(prefix: string, forceEnable = false): Logger {
  return new Logger(prefix, forceEnable);
}
