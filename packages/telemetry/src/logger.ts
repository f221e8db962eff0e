/**
 * Logging utilities for Turnlab
 *
 * Debug output is opt-in through TURNLAB_DEBUG (or a development NODE_ENV);
 * warnings and errors are always printed and mirrored to Sentry, which is a
 * no-op until initTelemetry() has been called with a DSN.
 */

import * as Sentry from "@sentry/node";

function isDebugEnabled(): boolean {
  const flag = process.env.TURNLAB_DEBUG;
  if (flag && flag !== "0" && flag.toLowerCase() !== "false") return true;
  return process.env.NODE_ENV === "development";
}

function describeArgs(args: unknown[]): string {
  return args
    .map((a) => (typeof a === "string" ? a : JSON.stringify(a)))
    .join(" ");
}

/**
 * Log debug messages (only when debugging is enabled)
 */
export function debugLog(prefix: string, ...args: unknown[]): void {
  if (isDebugEnabled()) {
    console.debug(`[${prefix}]`, ...args);
  }
}

/**
 * Log info messages (always visible)
 */
export function infoLog(prefix: string, ...args: unknown[]): void {
  console.log(`[${prefix}]`, ...args);
}

/**
 * Log warning messages and leave a Sentry breadcrumb
 */
export function warnLog(prefix: string, ...args: unknown[]): void {
  console.warn(`[${prefix}]`, ...args);

  Sentry.addBreadcrumb({
    category: prefix.toLowerCase(),
    message: describeArgs(args),
    level: "warning",
  });
}

/**
 * Log error messages
 * Captures the first Error argument to Sentry, or the whole line as a message
 */
export function errorLog(prefix: string, ...args: unknown[]): void {
  console.error(`[${prefix}]`, ...args);

  const errorArg = args.find((a) => a instanceof Error);
  if (errorArg instanceof Error) {
    Sentry.captureException(errorArg, {
      tags: { module: prefix.toLowerCase() },
      extra: {
        args: describeArgs(args.filter((a) => !(a instanceof Error))),
      },
    });
  } else {
    Sentry.captureMessage(`[${prefix}] ${describeArgs(args)}`, {
      level: "error",
      tags: { module: prefix.toLowerCase() },
    });
  }
}

export interface Logger {
  debug: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
}

/**
 * Create a scoped logger for a specific module
 *
 * @example
 * const log = createLogger("EnergyVAD");
 * log.debug("frames", 120); // [EnergyVAD] frames 120 (debug only)
 * log.info("Ready"); // [EnergyVAD] Ready
 */
export function createLogger(prefix: string): Logger {
  return {
    debug: (...args: unknown[]) => debugLog(prefix, ...args),
    info: (...args: unknown[]) => infoLog(prefix, ...args),
    warn: (...args: unknown[]) => warnLog(prefix, ...args),
    error: (...args: unknown[]) => errorLog(prefix, ...args),
  };
}
