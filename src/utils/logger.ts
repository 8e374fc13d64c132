/**
 * Defines the available log levels.
 */
export enum LogLevel {
  ERROR = 0,
  WARN = 1,
  INFO = 2,
  DEBUG = 3,
}

let currentLogLevel: LogLevel = LogLevel.INFO; // Default level

/**
 * Sets the current logging level for the application.
 * @param level - The desired log level.
 */
export function setLogLevel(level: LogLevel): void {
  currentLogLevel = level;
}

/**
 * Maps the CLI's `--verbose` / `--silent` switches to a level. Silent wins.
 */
export function logLevelFromFlags(flags: { verbose?: boolean; silent?: boolean }): LogLevel {
  if (flags.silent) {
    return LogLevel.ERROR;
  }
  return flags.verbose ? LogLevel.DEBUG : LogLevel.INFO;
}

/**
 * Provides logging functionalities with level control.
 * Progress goes to stdout, warnings and errors to stderr.
 */
export const logger = {
  debug: (message: string) => {
    if (currentLogLevel >= LogLevel.DEBUG) {
      console.debug(message);
    }
  },
  info: (message: string) => {
    if (currentLogLevel >= LogLevel.INFO) {
      console.log(message);
    }
  },
  warn: (message: string) => {
    if (currentLogLevel >= LogLevel.WARN) {
      console.warn(message);
    }
  },
  /** Always logs. */
  error: (message: string) => {
    if (currentLogLevel >= LogLevel.ERROR) {
      console.error(message);
    }
  },
};
