import type { Dispatcher, Transport } from "@switchrpc/core";

/**
 * In-process transport: hands the call straight to a Dispatcher (usually an
 * RpcService). The timeout is not enforced.
 */
export function createLoopbackTransport(dispatcher: Dispatcher): Transport {
  return {
    post(uri, body) {
      return dispatcher.dispatch(new URL(uri).pathname, body);
    },
  };
}
