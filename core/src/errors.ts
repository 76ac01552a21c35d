/**
 * Structured error for the RPC runtime.
 *
 * Covers the local failure kinds (invalid descriptions, invalid wire
 * payloads, misuse of a processor or registry). Faults raised by handlers
 * are `Fault` instances instead; see exceptions.ts.
 */

export type RpcErrorCode =
  | "VALIDATION_ERROR"
  | "PROTOCOL_ERROR"
  | "ALREADY_PROCESSED"
  | "REGISTRY_FINALIZED"
  | "CONTINUATION_REUSED"
  | "NOT_IMPLEMENTED"
  | "PAYLOAD_TOO_LARGE";

export class RpcError extends Error {
  public readonly code: RpcErrorCode;
  public readonly status?: number;
  public readonly details?: unknown;
  public readonly cause?: unknown;

  constructor(args: {
    code: RpcErrorCode;
    message: string;
    status?: number;
    details?: unknown;
    cause?: unknown;
  }) {
    super(args.message);
    this.name = "RpcError";
    this.code = args.code;
    this.status = args.status;
    this.details = args.details;
    this.cause = args.cause;
  }
}

export function isRpcError(err: unknown, code?: RpcErrorCode): err is RpcError {
  return err instanceof RpcError && (code === undefined || err.code === code);
}
