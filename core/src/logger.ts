/**
 * Logger interface shared by client and service components.
 * Allows optional structured logging with context and message.
 */

export interface Logger {
  debug?: (ctx: object, msg: string) => void;
  info?: (ctx: object, msg: string) => void;
  warn?: (ctx: object, msg: string) => void;
  error?: (ctx: object, msg: string) => void;
}

/** Either a Logger or an object with get(name) returning one. */
export type LoggerFactory = Logger | { get(name: string): Logger };

/** Resolve logger from factory (supports loggerFactory or loggerFactory.get(name)). */
export function resolveLogger(factory: LoggerFactory | undefined, name: string): Logger {
  if (!factory) return console;
  return "get" in factory ? factory.get(name) : factory;
}
