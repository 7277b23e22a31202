import pino from "pino";
import type { DestinationStream, Logger } from "pino";

export type { Logger } from "pino";

/**
 * Root logger. The level is validated with the rest of the config and applied
 * by the caller afterwards, so construction never reads the environment.
 */
export function createLogger(level: string = "info", destination?: DestinationStream): Logger {
  // JSON to stdout unless a destination is given, no transports
  return destination ? pino({ level }, destination) : pino({ level });
}

/**
 * Bind context to a logger. Pino children copy the parent's level when they
 * are created, so bind after the configured level has been applied.
 */
export function createChildLogger(
  logger: Logger,
  context: { munger?: string; issueNumber?: number; cycle?: number; [key: string]: unknown },
): Logger {
  return logger.child(context);
}
