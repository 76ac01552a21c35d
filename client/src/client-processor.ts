/**
 * ClientProcessor: runs the client pipeline for one call and performs the
 * remote call as its terminal action.
 *
 *   serialize request -> format URI -> transport.post -> check status
 *   -> deserialize response -> raise carried fault (if any)
 *   -> keep the declared output fields
 *
 * A success body must carry every declared output; undeclared fields are
 * dropped. A fault body must carry the reserved key alone.
 */

import {
  type ApiConfig,
  type Codec,
  type ExceptionRegistry,
  type OperationDescriptor,
  type ProcessorParams,
  type Transport,
  type TransportResponse,
  Container,
  EXCEPTION_KEY,
  FaultPayloadSchema,
  Processor,
  RpcError,
  isSuccessStatus,
} from "@switchrpc/core";

const LOG_PREFIX = "switchrpc-client:processor";

/** Name of the fault raised for transport failures and non-2xx statuses. */
export const TRANSPORT_FAULT = "RequestException";

export interface ClientProcessorParams extends ProcessorParams {
  api: ApiConfig;
  transport: Transport;
  codec: Codec;
  exceptions: ExceptionRegistry;
  timeoutMs: number;
  fields: Record<string, unknown>;
}

export class ClientProcessor extends Processor<Container> {
  private readonly api: ApiConfig;
  private readonly transport: Transport;
  private readonly codec: Codec;
  private readonly exceptions: ExceptionRegistry;
  private readonly timeoutMs: number;

  constructor(params: ClientProcessorParams) {
    super(params);
    this.api = params.api;
    this.transport = params.transport;
    this.codec = params.codec;
    this.exceptions = params.exceptions;
    this.timeoutMs = params.timeoutMs;
    this.request.update(params.fields);
  }

  get result(): Container {
    return this.response;
  }

  protected async execute(): Promise<void> {
    this.requestBody = this.codec.serialize(this.request.toRecord());
    const uri = this.api.clientUri(this.operation);

    const reply = await this.send(uri, this.requestBody);
    if (!isSuccessStatus(reply.status)) {
      this.log.warn?.(
        { operation: this.operation, uri, status: reply.status },
        `${LOG_PREFIX}:execute - Non-success status`
      );
      throw this.exceptions.create(TRANSPORT_FAULT, [`${reply.status} ${reply.reason}`]);
    }

    this.responseBody = reply.text;
    const fields = this.decode(reply.text);
    if (EXCEPTION_KEY in fields) this.raiseCarriedFault(fields);
    this.response.update(this.declaredOutputs(fields));
  }

  private async send(uri: string, body: string): Promise<TransportResponse> {
    try {
      return await this.transport.post(uri, body, this.timeoutMs);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      this.log.warn?.(
        { operation: this.operation, uri, error: reason },
        `${LOG_PREFIX}:send - Transport failed`
      );
      throw this.exceptions.create(TRANSPORT_FAULT, [reason]);
    }
  }

  private decode(text: string): Record<string, unknown> {
    try {
      return this.codec.deserialize(text);
    } catch (err) {
      throw new RpcError({
        code: "PROTOCOL_ERROR",
        message: `${LOG_PREFIX}:decode - Invalid response for ${this.operation}`,
        cause: err,
      });
    }
  }

  private declaredOutputs(fields: Record<string, unknown>): Record<string, unknown> {
    const missing = this.descriptor.output.filter((field) => !(field in fields));
    if (missing.length > 0) {
      throw new RpcError({
        code: "PROTOCOL_ERROR",
        message: `${LOG_PREFIX}:declaredOutputs - Invalid response for ${this.operation}: missing ${missing.join(", ")}`,
        details: { missing },
      });
    }
    return Object.fromEntries(this.descriptor.output.map((field) => [field, fields[field]]));
  }

  /**
   * Rebuild a carried fault from this client's own registry. The reserved
   * key never shares a body with ordinary fields.
   */
  private raiseCarriedFault(fields: Record<string, unknown>): never {
    const extra = Object.keys(fields).filter((key) => key !== EXCEPTION_KEY);
    if (extra.length > 0) {
      throw new RpcError({
        code: "PROTOCOL_ERROR",
        message: `${LOG_PREFIX}:raiseCarriedFault - Invalid response: fault mixed with ${extra.join(", ")}`,
        details: { extra },
      });
    }
    const parsed = FaultPayloadSchema.safeParse(fields[EXCEPTION_KEY]);
    if (!parsed.success) {
      throw new RpcError({
        code: "PROTOCOL_ERROR",
        message: `${LOG_PREFIX}:raiseCarriedFault - Invalid response: malformed fault payload`,
        details: parsed.error.format(),
      });
    }
    throw this.exceptions.create(parsed.data.cls, parsed.data.args);
  }
}

/**
 * Positional view of a response: no outputs -> null, one -> the bare value,
 * several -> values in declared order.
 */
export function projectResult(descriptor: OperationDescriptor, response: Container): unknown {
  const values = descriptor.output.map((field) => response.get(field));
  if (values.length === 0) return null;
  if (values.length === 1) return values[0];
  return values;
}
