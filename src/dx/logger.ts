export type LogLevel = 'debug' | 'info' | 'warn';

export const DEBUG_ENV_VAR = 'BACKEND_CC_PROBE_DEBUG';

let enabled = false;

// Keep this extremely low overhead when disabled. Output goes to stderr so
// it never mixes with CLI results on stdout.
export function isDebugEnabled(): boolean {
  return enabled || process.env[DEBUG_ENV_VAR] === '1';
}

/**
 * Enable/disable debug logging programmatically.
 *
 * This is primarily intended for tests and the CLI `--debug` flag.
 */
export function setDebugEnabled(v: boolean) {
  enabled = v;
}

export function logDebug(...args: unknown[]) {
  if (!isDebugEnabled()) return;
  // eslint-disable-next-line no-console
  console.error('[backend-cc-probe]', ...args);
}

export function logInfo(...args: unknown[]) {
  if (!isDebugEnabled()) return;
  // eslint-disable-next-line no-console
  console.error('[backend-cc-probe]', ...args);
}

export function logWarn(...args: unknown[]) {
  if (!isDebugEnabled()) return;
  // eslint-disable-next-line no-console
  console.warn('[backend-cc-probe]', ...args);
}
