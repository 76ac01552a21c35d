/**
 * Service process configuration: where the description lives and how the
 * bindings listen.
 */

import { readFileSync } from "node:fs";
import { type ApiConfig, type Logger, RpcError, fromDescription } from "@switchrpc/core";
import { DEFAULT_MAX_BODY_BYTES } from "./http/server.js";

const LOG_PREFIX = "switchrpc-service:config";

export interface ServiceProcessConfig {
  /** Path to the JSON API description */
  descriptionPath?: string;
  /** HTTP listen address */
  host: string;
  port: number;
  /** Largest accepted request body */
  maxBodyBytes: number;
  /** Optional NATS binding */
  natsUrl?: string;
  natsQueue?: string;
  /** Forces debug mode regardless of the description */
  debug?: boolean;
}

function parseInteger(value: string | undefined, fallback: number): number {
  if (value === undefined || value === "") return fallback;
  const parsed = Number.parseInt(value, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

/**
 * Load config from environment.
 * Env: DESCRIPTION_PATH, HOST, PORT, MAX_BODY_BYTES, NATS_URL, NATS_QUEUE, DEBUG.
 */
export function loadConfig(params: { log?: Logger; env?: NodeJS.ProcessEnv } = {}): ServiceProcessConfig {
  const log = params.log ?? console;
  const env = params.env ?? process.env;

  const config: ServiceProcessConfig = {
    descriptionPath: env.DESCRIPTION_PATH,
    host: env.HOST ?? "localhost",
    port: parseInteger(env.PORT, 8080),
    maxBodyBytes: parseInteger(env.MAX_BODY_BYTES, DEFAULT_MAX_BODY_BYTES),
    natsUrl: env.NATS_URL,
    natsQueue: env.NATS_QUEUE,
    debug: env.DEBUG === undefined ? undefined : ["1", "true", "yes"].includes(env.DEBUG.toLowerCase()),
  };

  log.info?.(
    { host: config.host, port: config.port, descriptionPath: config.descriptionPath, nats: Boolean(config.natsUrl) },
    `${LOG_PREFIX}:loadConfig - Loaded config`
  );
  return config;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Read and parse a JSON description file. `overrides.debug` replaces the
 * description's debug flag when set.
 */
export function loadDescriptionFile(path: string, overrides: { debug?: boolean } = {}): ApiConfig {
  let data: unknown;
  try {
    data = JSON.parse(readFileSync(path, "utf-8"));
  } catch (err) {
    throw new RpcError({
      code: "VALIDATION_ERROR",
      message: `${LOG_PREFIX}:loadDescriptionFile - Cannot read description ${path}`,
      cause: err,
    });
  }
  if (overrides.debug !== undefined && isRecord(data)) {
    return fromDescription({ ...data, debug: overrides.debug });
  }
  return fromDescription(data);
}
