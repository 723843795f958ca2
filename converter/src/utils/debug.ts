/**
 * Level-gated debug logging
 *
 * Debug levels:
 * - 0: No debug output
 * - 1: Essential debugging - skipped cards, file writes
 * - 2: Verbose debugging - every ability block the compiler dropped
 *
 * Usage:
 * import { debug } from './utils/debug';
 *
 * debug(1, '[convert] Skipped card without a name');
 * debug(2, '[convert] Dropped block:', block.raw);
 */

let cachedDebugLevel: number | null = null;

function getDebugLevel(): number {
  if (cachedDebugLevel !== null) {
    return cachedDebugLevel;
  }

  const parsed = parseInt(process.env.DEBUG_STATE ?? '', 10);
  cachedDebugLevel = isNaN(parsed) || parsed < 0 ? 0 : Math.min(parsed, 2);
  return cachedDebugLevel;
}

/**
 * Forget the cached level so the next call reads DEBUG_STATE again
 */
export function resetDebugLevel(): void {
  cachedDebugLevel = null;
}

/**
 * Log a debug message if the current debug level is >= the required level
 */
export function debug(requiredLevel: number, ...args: unknown[]): void {
  if (getDebugLevel() >= requiredLevel) {
    console.log(...args);
  }
}

export function debugWarn(requiredLevel: number, ...args: unknown[]): void {
  if (getDebugLevel() >= requiredLevel) {
    console.warn(...args);
  }
}

export function isDebugEnabled(requiredLevel: number): boolean {
  return getDebugLevel() >= requiredLevel;
}
