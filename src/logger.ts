// SPDX-License-Identifier: MIT
// SPDX-FileCopyrightText: © 2025 David Osipov <personal@david-osipov.vision>

/**
 * Component-scoped logger over secureDevLog.
 * @module
 */

import { secureDevLog, type LogLevel } from "./utils";
import { environment } from "./environment";

export type { LogLevel };

export type Logger = {
  readonly component: string;
  readonly debug: (message: string, context?: unknown) => void;
  readonly info: (message: string, context?: unknown) => void;
  readonly warn: (message: string, context?: unknown) => void;
  readonly error: (message: string, context?: unknown) => void;
  /** Logger for a sub-component, named `parent:sub`. */
  readonly child: (sub: string) => Logger;
};

/**
 * Creates a logger instance for a specific component.
 * Output only happens outside production; see {@link secureDevLog}.
 */
export function createLogger(component: string): Logger {
  const log = (level: LogLevel, message: string, context?: unknown) => {
    if (environment.isProduction) return;
    secureDevLog(level, component, message, context);
  };
  return Object.freeze({
    component,
    debug: (message: string, context?: unknown) =>
      log("debug", message, context),
    info: (message: string, context?: unknown) => log("info", message, context),
    warn: (message: string, context?: unknown) => log("warn", message, context),
    error: (message: string, context?: unknown) =>
      log("error", message, context),
    child: (sub: string) => createLogger(`${component}:${sub}`),
  });
}
