/**
 * RpcService — serves the operations of one described API.
 *
 * Handlers are bound per declared operation. Each inbound call runs a fresh
 * ServiceProcessor:
 *   request units -> decode -> operation units -> handler -> encode
 *
 * dispatch() is the transport-neutral entry point used by the HTTP and NATS
 * bindings and by the client's loopback transport.
 */

import {
  type ApiDescription,
  type Codec,
  type Dispatcher,
  type Logger,
  type LoggerFactory,
  type Scope,
  type ScopeUnits,
  type TransportResponse,
  ApiConfig,
  ExceptionRegistry,
  PluginRegistry,
  RpcError,
  fromDescription,
  jsonCodec,
  reasonFor,
  resolveLogger,
} from "@switchrpc/core";

import { type OperationHandler, ServiceProcessor } from "./service-processor.js";

const SERVICE_NAME = "switchrpc-service";

export interface RpcServiceOptions {
  api: ApiConfig | ApiDescription;
  codec?: Codec;
  loggerFactory?: LoggerFactory;
}

export class RpcService implements Dispatcher {
  readonly api: ApiConfig;
  readonly plugins = new PluginRegistry();
  /** Fault types handlers may throw by name: `service.exceptions.get("Unauthorized")`. */
  readonly exceptions = new ExceptionRegistry();

  readonly codec: Codec;

  private readonly log: Logger;
  private readonly handlers = new Map<string, OperationHandler>();

  constructor(options: RpcServiceOptions) {
    this.api = options.api instanceof ApiConfig ? options.api : fromDescription(options.api);
    this.codec = options.codec ?? jsonCodec;
    this.log = resolveLogger(options.loggerFactory, SERVICE_NAME);

    this.api.serverMatcher();
  }

  use<S extends Scope>(scope: S, unit: ScopeUnits[S]): this {
    this.plugins.use(scope, unit);
    return this;
  }

  /**
   * Bind the handler for a declared operation. Fails for undeclared
   * operations and once the first call has been processed.
   */
  operation(name: string, handler: OperationHandler): this {
    this.api.operation(name);
    if (this.plugins.finalized) {
      throw new RpcError({
        code: "REGISTRY_FINALIZED",
        message: `${SERVICE_NAME}:operation - Cannot bind ${name} after the first call`,
      });
    }
    this.handlers.set(name, handler);
    return this;
  }

  /** Fails when any declared operation has no handler. */
  assertReady(): void {
    const missing = [...this.api.operations.keys()].filter((name) => !this.handlers.has(name));
    if (missing.length > 0) {
      throw new RpcError({
        code: "NOT_IMPLEMENTED",
        message: `${SERVICE_NAME}:assertReady - No handler bound for ${missing.join(", ")}`,
        details: { missing },
      });
    }
  }

  /** Run one call of `operation` against a request body and return the response body. */
  async process(operation: string, body: string): Promise<string> {
    const descriptor = this.api.operation(operation);
    const processor = new ServiceProcessor({
      descriptor,
      plugins: this.plugins,
      log: this.log,
      api: this.api,
      codec: this.codec,
      handler: this.handlers.get(operation),
      requestBody: body,
    });
    return processor.process();
  }

  async dispatch(path: string, body: string): Promise<TransportResponse> {
    const operation = this.api.matchOperation(path);
    if (operation === null || !this.api.operations.has(operation)) {
      this.log.debug?.({ path }, `${SERVICE_NAME}:dispatch - No operation for path`);
      return { status: 404, reason: reasonFor(404), text: "" };
    }

    try {
      const text = await this.process(operation, body);
      return { status: 200, reason: reasonFor(200), text };
    } catch (err) {
      this.log.error?.(
        { operation, error: err instanceof Error ? err.message : String(err) },
        `${SERVICE_NAME}:dispatch - Processing failed`
      );
      return { status: 500, reason: reasonFor(500), text: "" };
    }
  }
}
