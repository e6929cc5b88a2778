/**
 * Logger - Level-gated console logging
 *
 * Components log with a bracketed tag (`[AGENT]`, `[MCP]`, ...). The CLI
 * raises the level with --verbose or --debug.
 */

export enum LogLevel {
  ERROR = 0,
  WARN = 1,
  INFO = 2,
  VERBOSE = 3,
  DEBUG = 4,
}

export class Logger {
  private static instance: Logger | null = null;
  private logLevel: LogLevel = LogLevel.INFO;

  private constructor() {}

  static getInstance(): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger();
    }
    return Logger.instance;
  }

  setLevel(level: LogLevel): void {
    this.logLevel = level;
  }

  getLevel(): LogLevel {
    return this.logLevel;
  }

  /**
   * Configure logging from CLI flags; debug wins over verbose
   */
  configure(options: { verbose?: boolean; debug?: boolean }): void {
    if (options.debug) {
      this.logLevel = LogLevel.DEBUG;
    } else if (options.verbose) {
      this.logLevel = LogLevel.VERBOSE;
    } else {
      this.logLevel = LogLevel.INFO;
    }
  }

  /**
   * Log an error (always shown)
   */
  error(...args: unknown[]): void {
    console.error(...args);
  }

  warn(...args: unknown[]): void {
    if (this.logLevel >= LogLevel.WARN) {
      console.warn(...args);
    }
  }

  info(...args: unknown[]): void {
    if (this.logLevel >= LogLevel.INFO) {
      console.log(...args);
    }
  }

  verbose(...args: unknown[]): void {
    if (this.logLevel >= LogLevel.VERBOSE) {
      console.log(...args);
    }
  }

  debug(...args: unknown[]): void {
    if (this.logLevel >= LogLevel.DEBUG) {
      console.log(...args);
    }
  }
}

export const logger = Logger.getInstance();
