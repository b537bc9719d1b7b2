import pino, { type Logger } from "pino";

export type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace" | "silent";

export type { Logger };

/**
 * Root logger writing to stderr, so stdout stays free for progress output.
 */
export function createRootLogger(level: LogLevel = "info"): Logger {
  return pino({ level, base: null }, pino.destination(2));
}

export function createLogger(root: Logger, service: string): Logger {
  return root.child({ service });
}
