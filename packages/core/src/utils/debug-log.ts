import { CONFIG } from './config.js';

/** Diagnostic line on stderr, printed only when `VERBOSE=true`. */
export function debugLog(scope: string, msg: string, data?: unknown): void {
  if (!CONFIG.debug.verbose) return;
  console.error(`[${scope}] ${msg}`, data !== undefined ? JSON.stringify(data) : '');
}
