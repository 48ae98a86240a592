/**
 * Output manager for controlling console output verbosity
 *
 * Supports three levels:
 * - quiet: Only errors and operation results
 * - normal: Errors, warnings, info, and results (default)
 * - verbose: All output including debug messages
 */

export type OutputLevel = 'quiet' | 'normal' | 'verbose';

export class OutputManager {
  private static instance: OutputManager | null = null;
  private level: OutputLevel = 'normal';

  constructor(env: NodeJS.ProcessEnv = process.env) {
    if (env.TEXTKIT_QUIET === '1') {
      this.level = 'quiet';
    } else if (env.TEXTKIT_VERBOSE === '1') {
      this.level = 'verbose';
    }
  }

  static getInstance(): OutputManager {
    if (!OutputManager.instance) {
      OutputManager.instance = new OutputManager();
    }
    return OutputManager.instance;
  }

  /**
   * Set output level (CLI flags override environment variables)
   */
  setLevel(level: OutputLevel): void {
    this.level = level;
  }

  getLevel(): OutputLevel {
    return this.level;
  }

  /**
   * Operation result - always shown, even in quiet mode
   */
  result(message: string): void {
    console.log(message);
  }

  /**
   * Info message - shown in normal and verbose modes
   */
  info(message: string): void {
    if (this.level !== 'quiet') {
      console.log(message);
    }
  }

  /**
   * Warning message - suppressed in quiet mode
   */
  warn(message: string): void {
    if (this.level !== 'quiet') {
      console.warn(message);
    }
  }

  /**
   * Error message - always shown
   */
  error(message: string): void {
    console.error(message);
  }

  /**
   * Debug message - only shown in verbose mode
   */
  debug(message: string): void {
    if (this.level === 'verbose') {
      console.error(`[DEBUG] ${message}`);
    }
  }
}

export const output = OutputManager.getInstance();
