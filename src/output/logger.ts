/**
 * Console output that can be silenced for machine-readable output formats.
 * With `--output json` only the JSON document goes to stdout.
 */

let silentMode = false;

/**
 * Enable or disable silent mode.
 * When enabled, log() and warn() output nothing.
 * error() always outputs to stderr.
 */
export function setSilentMode(silent: boolean): void {
  silentMode = silent;
}

export function isSilentMode(): boolean {
  return silentMode;
}

/**
 * Log to stdout. Silenced in silent mode.
 */
export function log(...args: unknown[]): void {
  if (!silentMode) {
    console.log(...args);
  }
}

/**
 * Log warning to stderr. Silenced in silent mode.
 */
export function warn(...args: unknown[]): void {
  if (!silentMode) {
    console.warn(...args);
  }
}

// Never silenced
export function error(...args: unknown[]): void {
  console.error(...args);
}
