/**
 * Leveled diagnostic logging.
 *
 * stdout carries the MCP transport, so every line goes to stderr.
 */

export type LogLevel = "debug" | "info" | "error";

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  error(message: string): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  error: 2,
};

/** Create a logger that drops messages below `level`. */
export function createLogger(level: LogLevel = "info"): Logger {
  const emit = (msgLevel: LogLevel, message: string): void => {
    if (LEVEL_ORDER[msgLevel] < LEVEL_ORDER[level]) return;
    console.error(`[buttonmap] ${msgLevel}: ${message}`);
  };

  return {
    debug: (message) => emit("debug", message),
    info: (message) => emit("info", message),
    error: (message) => emit("error", message),
  };
}

let processLogger: Logger = createLogger();

/** Logger used by components that were not handed one explicitly. */
export function getLogger(): Logger {
  return processLogger;
}

export function setLogger(logger: Logger): void {
  processLogger = logger;
}

/** Throw on a broken internal invariant. */
export function assert(condition: boolean, message: string): asserts condition {
  if (!condition) {
    throw new Error(`Assertion failed: ${message}`);
  }
}
