/**
 * Console logger with a `[sluice]` prefix.
 *
 * `debug` and `info` are printed only when `config.debug` is on;
 * `warn` and `error` are always printed.
 */

import { config } from "./config.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export function createLogger(scope?: string): Logger {
  const prefix = scope === undefined ? "[sluice]" : `[sluice/${scope}]`;

  const log = (level: LogLevel, message: string): void => {
    switch (level) {
      case "debug":
        if (config.isDebug()) console.debug(`${prefix} DEBUG: ${message}`);
        break;
      case "info":
        if (config.isDebug()) console.info(`${prefix} INFO: ${message}`);
        break;
      case "warn":
        console.warn(`${prefix} WARN: ${message}`);
        break;
      case "error":
        console.error(`${prefix} ERROR: ${message}`);
        break;
    }
  };

  return {
    debug: (message) => log("debug", message),
    info: (message) => log("info", message),
    warn: (message) => log("warn", message),
    error: (message) => log("error", message),
  };
}

export const logger = createLogger();
