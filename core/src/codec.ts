/**
 * Text codec collaborator: field map <-> wire text.
 */

import { RpcError } from "./errors.js";

export interface Codec {
  readonly contentType: string;
  serialize(fields: Record<string, unknown>): string;
  /** Must throw a PROTOCOL_ERROR on malformed text, never return a partial map. */
  deserialize(text: string): Record<string, unknown>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export const jsonCodec: Codec = {
  contentType: "application/json",

  serialize(fields) {
    try {
      return JSON.stringify(fields);
    } catch (err) {
      throw new RpcError({
        code: "PROTOCOL_ERROR",
        message: `switchrpc-core:jsonCodec.serialize - ${err instanceof Error ? err.message : String(err)}`,
        cause: err,
      });
    }
  },

  deserialize(text) {
    let decoded: unknown;
    try {
      decoded = JSON.parse(text);
    } catch (err) {
      throw new RpcError({
        code: "PROTOCOL_ERROR",
        message: "switchrpc-core:jsonCodec.deserialize - Malformed JSON",
        cause: err,
      });
    }
    if (!isRecord(decoded)) {
      throw new RpcError({
        code: "PROTOCOL_ERROR",
        message: "switchrpc-core:jsonCodec.deserialize - Expected a JSON object",
      });
    }
    return decoded;
  },
};
