/**
 * Minimal JSON-lines logger for service processes. Matches the Logger
 * interface (structured context + message); swap in any logger with the
 * same shape.
 */

import type { Logger } from "@switchrpc/core";

type Level = "debug" | "info" | "warn" | "error";

function log(level: Level, ctx: object, msg: string): void {
  const payload = Object.keys(ctx).length ? { ...ctx, msg } : { msg };
  const line = JSON.stringify({ level, time: new Date().toISOString(), ...payload });
  if (level === "error" || level === "warn") {
    console.error(line);
  } else {
    console.log(line);
  }
}

/**
 * Create a node-style logger factory. Returns an object with get(prefix)
 * that returns a logger tagging every record with the service and prefix.
 * Debug records are only written when `debug` is set.
 */
export function createNodeJSLogger(
  serviceName: string,
  options: { debug?: boolean } = {}
): { get: (prefix: string) => Logger } {
  return {
    get(prefix: string) {
      const tag = { service: serviceName, prefix };
      return {
        debug: options.debug ? (ctx, msg) => log("debug", { ...ctx, ...tag }, msg) : undefined,
        info: (ctx, msg) => log("info", { ...ctx, ...tag }, msg),
        warn: (ctx, msg) => log("warn", { ...ctx, ...tag }, msg),
        error: (ctx, msg) => log("error", { ...ctx, ...tag }, msg),
      };
    },
  };
}
