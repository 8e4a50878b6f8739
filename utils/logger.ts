import { config, LOG_LEVELS, LogLevel } from "./config";

export interface Logger {
  error(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  info(...args: unknown[]): void;
  debug(...args: unknown[]): void;
}

const enabled = (level: LogLevel, threshold: LogLevel): boolean =>
  level !== "silent" &&
  LOG_LEVELS.indexOf(level) <= LOG_LEVELS.indexOf(threshold);

/**
 * Console logger prefixed with the component name, e.g. `[DefaultStateManager]`.
 */
export function createLogger(
  component: string,
  threshold: LogLevel = config.LOG_LEVEL
): Logger {
  const prefix = `[${component}]`;
  return {
    error: (...args) => {
      if (enabled("error", threshold)) console.error(prefix, ...args);
    },
    warn: (...args) => {
      if (enabled("warn", threshold)) console.warn(prefix, ...args);
    },
    info: (...args) => {
      if (enabled("info", threshold)) console.log(prefix, ...args);
    },
    debug: (...args) => {
      if (enabled("debug", threshold)) console.log(prefix, ...args);
    }
  };
}
