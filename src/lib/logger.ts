/**
 * Structured logger for consistent logging across the library.
 * Namespaced loggers are pino child loggers carrying a `namespace` binding.
 */

import pino from "pino";
import { getConfig } from "@/lib/config";

interface LogContext {
  [key: string]: unknown;
}

export interface Logger {
  debug: (message: string, context?: LogContext) => void;
  info: (message: string, context?: LogContext) => void;
  warn: (message: string, context?: LogContext) => void;
  error: (message: string, context?: LogContext) => void;
  child: (childNamespace: string) => Logger;
}

export const pinoConfig: pino.LoggerOptions = {
  level: getConfig().logLevel,
  base: null,
  timestamp: pino.stdTimeFunctions.isoTime,
};

const rootLogger = pino(pinoConfig);

/**
 * Creates a namespaced logger instance
 * @param namespace - The namespace for this logger (e.g., "pipeline", "provenance")
 *
 * @example
 * const logger = createLogger("pipeline");
 * logger.info("Run finished", { runId: "s01_ses1_001", steps: 4 });
 *
 * // Child loggers join namespaces with a colon
 * const stepLogger = logger.child("compute");
 * stepLogger.debug("Resolved inputs", { roles: ["signal"] });
 */
export function createLogger(
  namespace: string,
  base: pino.Logger = rootLogger,
): Logger {
  const target = base.child({ namespace });

  const log = (
    level: "debug" | "info" | "warn" | "error",
    message: string,
    context?: LogContext,
  ): void => {
    if (context && Object.keys(context).length > 0) {
      target[level](context, message);
    } else {
      target[level](message);
    }
  };

  return {
    debug: (message, context) => log("debug", message, context),
    info: (message, context) => log("info", message, context),
    warn: (message, context) => log("warn", message, context),
    error: (message, context) => log("error", message, context),
    child: (childNamespace: string) =>
      createLogger(`${namespace}:${childNamespace}`, base),
  };
}

// Pre-configured loggers for the library's namespaces
export const loggers = {
  resolver: createLogger("resolver"),
  provenance: createLogger("provenance"),
  pipeline: createLogger("pipeline"),
  persistence: createLogger("persistence"),
  export: createLogger("export"),
  plugins: createLogger("plugins"),
} as const;

export default createLogger;
