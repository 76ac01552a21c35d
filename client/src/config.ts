/**
 * RPC client configuration.
 */

import type { ApiConfig, ApiDescription, Codec, LoggerFactory, Transport } from "@switchrpc/core";

export interface RpcClientOptions {
  /** Parsed ApiConfig, or a description object for fromDescription(). */
  api: ApiConfig | ApiDescription;

  // ── Collaborators ─────────────────────────────────────────────────
  /** Defaults to the fetch-based HTTP transport. */
  transport?: Transport;
  /** Defaults to the JSON codec. */
  codec?: Codec;

  // ── Defaults ──────────────────────────────────────────────────────
  /** Overrides the description's timeout for this client only. */
  timeoutMs?: number;

  /** Logger factory (Logger or { get(name): Logger }) */
  loggerFactory?: LoggerFactory;
}
