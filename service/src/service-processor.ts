/**
 * ServiceProcessor: runs the service pipeline for one inbound call.
 *
 * - enterScope("operation") decodes the request body, so operation units
 *   and the handler see populated request fields.
 * - exitScope("operation") encodes the declared output fields right after
 *   the handler, before request-scope units resume. Undeclared response
 *   fields never reach the wire; unset outputs are sent as null.
 * - onFault() is the single fault boundary: whitelisted faults (or any
 *   fault in debug mode) keep their name and args, everything else is
 *   replaced by the redacted identity. Either way the response is reduced
 *   to the reserved fault key.
 */

import {
  type ApiConfig,
  type Codec,
  type Container,
  type ProcessorParams,
  type ProcessorScope,
  CallContext,
  Processor,
  REDACTED_FAULT,
  RpcError,
  describeFault,
  faultBody,
} from "@switchrpc/core";

const LOG_PREFIX = "switchrpc-service:processor";

export type OperationHandler = (
  request: Container,
  response: Container,
  context: CallContext
) => Promise<void> | void;

export interface ServiceProcessorParams extends ProcessorParams {
  api: ApiConfig;
  codec: Codec;
  handler?: OperationHandler;
  requestBody: string;
}

export class ServiceProcessor extends Processor<string> {
  private readonly api: ApiConfig;
  private readonly codec: Codec;
  private readonly handler?: OperationHandler;

  constructor(params: ServiceProcessorParams) {
    super(params);
    this.api = params.api;
    this.codec = params.codec;
    this.handler = params.handler;
    this.requestBody = params.requestBody;
  }

  /** Wire text of the response; an empty field map if nothing was encoded. */
  get result(): string {
    return this.responseBody ?? this.encodeOutputs();
  }

  protected async execute(): Promise<void> {
    if (!this.handler) {
      throw new RpcError({
        code: "NOT_IMPLEMENTED",
        message: `${LOG_PREFIX}:execute - No handler bound for ${this.operation}`,
      });
    }
    // The handler is the innermost step; its continuation has nothing left to run.
    const context = new CallContext(this, async () => {});
    await this.handler(this.request, this.response, context);
  }

  protected override async enterScope(scope: ProcessorScope): Promise<void> {
    if (scope === "operation") {
      this.request.update(this.codec.deserialize(this.requestBody ?? ""));
    }
  }

  protected override async exitScope(scope: ProcessorScope): Promise<void> {
    if (scope === "operation") {
      this.responseBody = this.encodeOutputs();
    }
  }

  private encodeOutputs(): string {
    return this.codec.serialize(
      Object.fromEntries(this.descriptor.output.map((field) => [field, this.response.get(field)]))
    );
  }

  protected override async onFault(err: unknown): Promise<void> {
    const fault = describeFault(err);
    const passThrough = this.api.debug || this.api.exceptions.has(fault.cls);
    const sent = passThrough ? fault : REDACTED_FAULT;

    if (passThrough) {
      this.log.info?.(
        { operation: this.operation, cls: fault.cls },
        `${LOG_PREFIX}:onFault - Returning fault to caller`
      );
    } else {
      this.log.warn?.(
        {
          operation: this.operation,
          cls: fault.cls,
          error: err instanceof Error ? err.message : String(err),
        },
        `${LOG_PREFIX}:onFault - Redacting fault`
      );
    }

    this.response.clear();
    this.responseBody = this.codec.serialize(faultBody(sent));
  }
}
