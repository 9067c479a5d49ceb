/**
 * Leveled logger with module prefixes
 *
 * Each module creates its own Logger and output is printed with a `[Module]`
 * prefix. The process-wide level starts from the loaded configuration and can
 * be changed at runtime; an instance may override it locally.
 *
 * @example
 * ```typescript
 * const logger = new Logger('Layout');
 * logger.debug('Computed strides', [12, 4, 1]);
 * // [Layout] Computed strides [ 12, 4, 1 ]
 * ```
 */

import { CONFIG, type LogLevelName } from './config';

export enum LogLevel {
  NONE = 0,
  ERROR = 1,
  WARN = 2,
  INFO = 3,
  DEBUG = 4,
}

const LEVELS_BY_NAME: Readonly<Record<LogLevelName, LogLevel>> = Object.freeze({
  none: LogLevel.NONE,
  error: LogLevel.ERROR,
  warn: LogLevel.WARN,
  info: LogLevel.INFO,
  debug: LogLevel.DEBUG,
});

/**
 * Map a configured level name to its numeric level
 */
export function logLevelFromName(name: LogLevelName): LogLevel {
  return LEVELS_BY_NAME[name];
}

let globalLogLevel: LogLevel = logLevelFromName(CONFIG.logLevel);

export function setGlobalLogLevel(level: LogLevel): void {
  globalLogLevel = level;
}

export function getGlobalLogLevel(): LogLevel {
  return globalLogLevel;
}

export class Logger {
  private readonly module: string;
  private localLevel: LogLevel | undefined;

  constructor(module: string) {
    this.module = module;
  }

  /**
   * Override the global level for this instance only
   */
  setLevel(level: LogLevel | undefined): void {
    this.localLevel = level;
  }

  isEnabled(level: LogLevel): boolean {
    return this.getEffectiveLevel() >= level;
  }

  debug(...args: unknown[]): void {
    if (this.isEnabled(LogLevel.DEBUG)) {
      console.log(this.prefix(), ...args);
    }
  }

  info(...args: unknown[]): void {
    if (this.isEnabled(LogLevel.INFO)) {
      console.info(this.prefix(), ...args);
    }
  }

  warn(...args: unknown[]): void {
    if (this.isEnabled(LogLevel.WARN)) {
      console.warn(this.prefix(), ...args);
    }
  }

  error(...args: unknown[]): void {
    if (this.isEnabled(LogLevel.ERROR)) {
      console.error(this.prefix(), ...args);
    }
  }

  private getEffectiveLevel(): LogLevel {
    return this.localLevel ?? globalLogLevel;
  }

  private prefix(): string {
    return `[${this.module}]`;
  }
}
