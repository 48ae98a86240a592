/**
 * Debug utility for textkit
 * Controlled by TEXTKIT_DEBUG environment variable:
 * - 0 or undefined: No debug output (default)
 * - 1: Basic debug information
 * - 2: Detailed debug information including parsed arguments and results
 */

export type DebugLevel = 0 | 1 | 2;

export function parseDebugLevel(raw: string | undefined): DebugLevel {
  const level = Number.parseInt(raw || '0', 10);
  if (Number.isNaN(level) || level <= 0) return 0;
  return level >= 2 ? 2 : 1;
}

let debugLevel: DebugLevel = parseDebugLevel(process.env.TEXTKIT_DEBUG);

/**
 * Override the level read from the environment (CLI --verbose, tests)
 */
export function setDebugLevel(level: DebugLevel): void {
  debugLevel = level;
}

export function debugLog(message: string, ...args: unknown[]): void {
  if (debugLevel > 0) {
    console.error(`[TEXTKIT] ${message}`, ...args);
  }
}

export function debugVerbose(message: string, ...args: unknown[]): void {
  if (debugLevel >= 2) {
    console.error(`[TEXTKIT:VERBOSE] ${message}`, ...args);
  }
}

export function debugError(message: string, error: unknown): void {
  if (debugLevel > 0) {
    console.error(`[TEXTKIT:ERROR] ${message}`);
    if (error instanceof Error) {
      console.error(`  Message: ${error.message}`);
      if (debugLevel >= 2 && error.stack) {
        console.error(`  Stack: ${error.stack}`);
      }
    } else {
      console.error(`  Error: ${String(error)}`);
    }
  }
}

/**
 * Format value for debug output
 */
export function debugFormat(value: unknown): string {
  try {
    return JSON.stringify(value, null, 2);
  } catch {
    return String(value);
  }
}
