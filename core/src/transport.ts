/**
 * Collaborator contracts between the processors and the outside world.
 */

import { RpcError } from "./errors.js";

/** What a client transport reports back for one POST. */
export interface TransportResponse {
  status: number;
  reason: string;
  text: string;
}

/**
 * Client-side transport. Resolves with whatever status the far side sent;
 * rejects only on communication failure (no connection, timeout).
 */
export interface Transport {
  post(uri: string, body: string, timeoutMs: number): Promise<TransportResponse>;
}

/** Server-side entry point: route an inbound path + body to an operation. */
export interface Dispatcher {
  dispatch(path: string, body: string): Promise<TransportResponse>;
}

/** Message headers carrying the HTTP-style status over request/reply transports. */
export const STATUS_HEADER = "Rpc-Status";
export const REASON_HEADER = "Rpc-Reason";

export function isSuccessStatus(status: number): boolean {
  return status >= 200 && status <= 299;
}

export const STATUS_REASONS: Readonly<Record<number, string>> = {
  200: "OK",
  400: "Bad Request",
  404: "Not Found",
  405: "Method Not Allowed",
  413: "Payload Too Large",
  500: "Internal Server Error",
  503: "Service Unavailable",
};

export function reasonFor(status: number): string {
  return STATUS_REASONS[status] ?? "Unknown";
}

/**
 * Map a URI or path onto a message subject: `/api/1/upper` -> `api.1.upper`.
 */
export function toSubject(uriOrPath: string, prefix?: string): string {
  const path = new URL(uriOrPath, "http://localhost").pathname;
  const tokens = path.split("/").filter((token) => token.length > 0);
  return (prefix ? [prefix, ...tokens] : tokens).join(".");
}

const utf8 = new TextDecoder("utf-8", { fatal: true });

/** Decode a wire body; invalid UTF-8 is a PROTOCOL_ERROR (status 400). */
export function decodeUtf8(bytes: Uint8Array): string {
  try {
    return utf8.decode(bytes);
  } catch (err) {
    throw new RpcError({
      code: "PROTOCOL_ERROR",
      message: "switchrpc-core:decodeUtf8 - Body is not valid UTF-8",
      status: 400,
      cause: err,
    });
  }
}
