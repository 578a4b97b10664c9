// Helpers for reading environment flags from the rules core. The core stays
// free of Node-only imports so it can run in any JavaScript host; when no
// process.env exists every flag reads as unset.

// Type-safe process.env access that works in both Node and browser contexts
type ProcessEnv = Record<string, string | undefined>;
function getProcessEnv(): ProcessEnv | undefined {
  if (typeof process !== 'undefined' && typeof process.env === 'object') {
    return process.env;
  }
  return undefined;
}

export function readEnv(name: string): string | undefined {
  const env = getProcessEnv();
  if (env) {
    const value = env[name];
    if (typeof value === 'string') {
      return value;
    }
  }

  return undefined;
}

/**
 * Returns true if running inside a Jest worker process, even when NODE_ENV
 * says otherwise.
 */
export function isJestRuntime(): boolean {
  return readEnv('JEST_WORKER_ID') !== undefined;
}

export function flagEnabled(name: string): boolean {
  const raw = readEnv(name);
  if (!raw) return false;
  return raw === '1' || raw === 'true' || raw === 'TRUE';
}

/**
 * Trace every validator rejection (code, reason, move) to the console.
 * Set RANKFILE_DEBUG_VALIDATION=1 to enable.
 */
export function isValidationDebugEnabled(): boolean {
  return flagEnabled('RANKFILE_DEBUG_VALIDATION');
}

/**
 * Debug logging wrapper. The wrapped console.log is only invoked if the
 * condition is true.
 *
 * @example
 * debugLog(isValidationDebugEnabled(), '[validateMove] rejected', details);
 */
export function debugLog(condition: boolean, ...args: unknown[]): void {
  if (condition) {
    // eslint-disable-next-line no-console
    console.log(...args);
  }
}
