/**
 * NATS request/reply transport.
 *
 * The call URI is mapped onto a subject (`http://h:1/api/1/upper` ->
 * `api.1.upper`); status and reason travel in reply headers. A reply
 * without a status header is treated as 200.
 */

import { StringCodec, type Msg } from "nats";
import {
  type Transport,
  REASON_HEADER,
  RpcError,
  STATUS_HEADER,
  reasonFor,
  toSubject,
} from "@switchrpc/core";

const SERVICE_NAME = "switchrpc-client:nats-transport";
const sc = StringCodec();
const STATUS_PATTERN = /^\d{3}$/;

/** The part of a NatsConnection the transport needs. */
export interface NatsRequester {
  request(subject: string, payload: Uint8Array, opts: { timeout: number }): Promise<Pick<Msg, "data" | "headers">>;
}

export interface NatsTransportConfig {
  connection: NatsRequester;
  /** Prepended to every subject, e.g. "rpc" -> rpc.api.1.upper */
  subjectPrefix?: string;
}

export function createNatsTransport(config: NatsTransportConfig): Transport {
  return {
    async post(uri, body, timeoutMs) {
      const subject = toSubject(uri, config.subjectPrefix);
      const msg = await config.connection.request(subject, sc.encode(body), { timeout: timeoutMs });

      const rawStatus = msg.headers?.get(STATUS_HEADER);
      if (rawStatus && !STATUS_PATTERN.test(rawStatus)) {
        throw new RpcError({
          code: "PROTOCOL_ERROR",
          message: `${SERVICE_NAME}:post - Invalid ${STATUS_HEADER} header: ${rawStatus}`,
        });
      }

      const status = rawStatus ? Number.parseInt(rawStatus, 10) : 200;
      return {
        status,
        reason: msg.headers?.get(REASON_HEADER) || reasonFor(status),
        text: sc.decode(msg.data),
      };
    },
  };
}
