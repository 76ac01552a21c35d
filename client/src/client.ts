/**
 * RpcClient — calls the operations of one described API.
 *
 * Each call runs a fresh ClientProcessor:
 *   request units -> operation units -> transport POST
 *
 * Faults carried back by the service are re-raised from this client's own
 * exception registry, so `err instanceof client.exceptions.get("Name")`
 * holds for faults received by this client.
 */

import {
  type Codec,
  type Container,
  type Logger,
  type Scope,
  type ScopeUnits,
  type Transport,
  ApiConfig,
  ExceptionRegistry,
  PluginRegistry,
  RpcError,
  fromDescription,
  jsonCodec,
  resolveLogger,
} from "@switchrpc/core";

import { ClientProcessor, projectResult } from "./client-processor.js";
import type { RpcClientOptions } from "./config.js";
import { createHttpTransport } from "./transport/http-transport.js";

const SERVICE_NAME = "switchrpc-client";

export type BoundOperation = (...args: unknown[]) => Promise<unknown>;

export class RpcClient {
  readonly api: ApiConfig;
  readonly plugins = new PluginRegistry();
  readonly exceptions = new ExceptionRegistry();

  private readonly transport: Transport;
  private readonly codec: Codec;
  private readonly timeoutMs: number;
  private readonly log: Logger;
  private readonly bound = new Map<string, BoundOperation>();

  constructor(options: RpcClientOptions) {
    this.api = options.api instanceof ApiConfig ? options.api : fromDescription(options.api);
    this.codec = options.codec ?? jsonCodec;
    this.transport = options.transport ?? createHttpTransport({ contentType: this.codec.contentType });
    this.timeoutMs = options.timeoutMs ?? this.api.timeoutMs;
    this.log = resolveLogger(options.loggerFactory, SERVICE_NAME);

    // Fail at construction rather than on the first call.
    this.api.clientPattern();
  }

  /**
   * Add a plugin unit (must be called before the first call).
   */
  use<S extends Scope>(scope: S, unit: ScopeUnits[S]): this {
    this.plugins.use(scope, unit);
    return this;
  }

  /**
   * Call an operation with positional inputs in declared order and return
   * its outputs: null, a bare value, or an array for several outputs.
   */
  async call(operation: string, ...args: unknown[]): Promise<unknown> {
    const descriptor = this.api.operation(operation);
    if (args.length > descriptor.input.length) {
      throw new RpcError({
        code: "VALIDATION_ERROR",
        message: `${SERVICE_NAME}:call - ${operation} takes ${descriptor.input.length} argument(s), got ${args.length}`,
      });
    }
    const fields = Object.fromEntries(
      descriptor.input.map((name, i) => [name, i < args.length ? args[i] : null])
    );
    const response = await this.invoke(operation, fields);
    return projectResult(descriptor, response);
  }

  /**
   * Call an operation with named inputs and return the response container.
   * Declared inputs that are not supplied are sent as null.
   */
  async invoke(operation: string, fields: Record<string, unknown> = {}): Promise<Container> {
    const descriptor = this.api.operation(operation);
    const unknown = Object.keys(fields).filter((key) => !descriptor.input.includes(key));
    if (unknown.length > 0) {
      throw new RpcError({
        code: "VALIDATION_ERROR",
        message: `${SERVICE_NAME}:invoke - Unknown input field(s) for ${operation}: ${unknown.join(", ")}`,
      });
    }

    this.log.debug?.({ operation }, `${SERVICE_NAME}:invoke - Calling`);
    const processor = new ClientProcessor({
      descriptor,
      plugins: this.plugins,
      log: this.log,
      api: this.api,
      transport: this.transport,
      codec: this.codec,
      exceptions: this.exceptions,
      timeoutMs: this.timeoutMs,
      fields: Object.fromEntries(descriptor.input.map((name) => [name, fields[name] ?? null])),
    });
    return processor.process();
  }

  /**
   * Bound function for one operation; the same function is returned on
   * every lookup.
   */
  operation(name: string): BoundOperation {
    const cached = this.bound.get(name);
    if (cached) return cached;
    this.api.operation(name);
    const fn: BoundOperation = (...args) => this.call(name, ...args);
    this.bound.set(name, fn);
    return fn;
  }
}
