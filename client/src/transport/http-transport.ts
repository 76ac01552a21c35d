/**
 * HTTP transport: one POST per call, timeout enforced with an abort signal.
 */

import type { Transport } from "@switchrpc/core";

export interface HttpTransportConfig {
  /** Optional custom fetch implementation (for testing or environments without global fetch) */
  fetchImpl?: typeof fetch;
  /** Extra headers sent with every call */
  headers?: Record<string, string>;
  contentType?: string;
}

/**
 * Creates a Transport that POSTs the request body to the call URI.
 *
 * Usage:
 * ```typescript
 * const client = new RpcClient({
 *   api,
 *   transport: createHttpTransport({ headers: { Authorization: "Bearer test-token" } }),
 * });
 * ```
 */
export function createHttpTransport(config: HttpTransportConfig = {}): Transport {
  const fetchFn = config.fetchImpl ?? globalThis.fetch;
  const contentType = config.contentType ?? "application/json";

  return {
    async post(uri, body, timeoutMs) {
      const response = await fetchFn(uri, {
        method: "POST",
        headers: { "Content-Type": contentType, ...config.headers },
        body,
        signal: AbortSignal.timeout(timeoutMs),
      });
      return {
        status: response.status,
        reason: response.statusText,
        text: await response.text(),
      };
    },
  };
}
