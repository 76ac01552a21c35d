/**
 * NATS binding: one queue-group subscription per declared operation (times
 * `concurrentWorkers`), each message routed through RpcService.dispatch().
 * Status and reason travel back in reply headers.
 */

import { connect, headers, StringCodec, type MsgHdrs } from "nats";
import {
  type Logger,
  type TransportResponse,
  REASON_HEADER,
  STATUS_HEADER,
  decodeUtf8,
  isRpcError,
  reasonFor,
  toSubject,
} from "@switchrpc/core";
import type { RpcService } from "../service.js";

const LOG_PREFIX = "switchrpc-service:nats-worker";
const sc = StringCodec();

/** The parts of a NATS message the worker touches. */
export interface NatsMessage {
  data: Uint8Array;
  reply?: string;
  respond(payload: Uint8Array, opts?: { headers?: MsgHdrs }): boolean;
}

export interface NatsSubscription extends AsyncIterable<NatsMessage> {
  drain(): Promise<void>;
}

/** Satisfied by a `NatsConnection`. */
export interface NatsSubscriber {
  subscribe(subject: string, opts?: { queue?: string }): NatsSubscription;
  close(): Promise<void>;
}

export interface NatsServiceWorkerParams {
  service: RpcService;
  /** Existing connection; when omitted the worker connects to `natsUrl` and owns the connection. */
  connection?: NatsSubscriber;
  natsUrl?: string;
  connectionName?: string;
  /** Queue group shared by every worker of this service (default: API name) */
  queue?: string;
  subjectPrefix?: string;
  concurrentWorkers?: number;
  log?: Logger;
}

function replyHeaders(result: TransportResponse): MsgHdrs {
  const h = headers();
  h.set(STATUS_HEADER, String(result.status));
  h.set(REASON_HEADER, result.reason);
  return h;
}

export class NatsServiceWorker {
  private readonly params: NatsServiceWorkerParams;
  private readonly log: Logger;
  private connection: NatsSubscriber | null;
  private ownsConnection = false;
  private subscriptions: NatsSubscription[] = [];

  constructor(params: NatsServiceWorkerParams) {
    this.params = params;
    this.log = params.log ?? console;
    this.connection = params.connection ?? null;
  }

  /** Subjects served, one per declared operation. */
  subjects(): string[] {
    const { api } = this.params.service;
    return [...api.operations.keys()].map((name) => toSubject(api.path(name), this.params.subjectPrefix));
  }

  async start(): Promise<void> {
    const { service } = this.params;
    service.assertReady();

    const connection = this.connection ?? (await this.connect());
    const queue = this.params.queue ?? service.api.name;
    const concurrentWorkers = Math.max(1, this.params.concurrentWorkers ?? 1);

    for (const name of service.api.operations.keys()) {
      const path = service.api.path(name);
      const subject = toSubject(path, this.params.subjectPrefix);
      for (let w = 0; w < concurrentWorkers; w++) {
        const sub = connection.subscribe(subject, { queue });
        this.subscriptions.push(sub);
        this.runWorker(sub, subject, path);
      }
    }
    this.log.info?.(
      { queue, operations: service.api.operations.size, concurrentWorkers },
      `${LOG_PREFIX}:start - Subscribed`
    );
  }

  private async connect(): Promise<NatsSubscriber> {
    const servers = this.params.natsUrl ?? "nats://127.0.0.1:4222";
    this.log.info?.({ servers }, `${LOG_PREFIX}:connect - Connecting`);
    const connection = await connect({
      servers,
      name: this.params.connectionName ?? this.params.service.api.name,
    });
    this.connection = connection;
    this.ownsConnection = true;
    return connection;
  }

  private runWorker(sub: NatsSubscription, subject: string, path: string): void {
    (async () => {
      for await (const msg of sub) {
        let result: TransportResponse;
        try {
          result = await this.params.service.dispatch(path, decodeUtf8(msg.data));
        } catch (err) {
          const status = isRpcError(err, "PROTOCOL_ERROR") ? 400 : 500;
          this.log.error?.(
            { subject, status, error: err instanceof Error ? err.message : String(err) },
            `${LOG_PREFIX}:runWorker - Dispatch failed`
          );
          result = { status, reason: reasonFor(status), text: "" };
        }
        if (msg.reply) {
          msg.respond(sc.encode(result.text), { headers: replyHeaders(result) });
        }
      }
    })().catch((err) => {
      this.log.error?.(
        { subject, error: err instanceof Error ? err.message : String(err) },
        `${LOG_PREFIX}:runWorker - Worker loop error`
      );
    });
  }

  /** Drain subscriptions; close the connection if the worker opened it. */
  async stop(): Promise<void> {
    this.log.info?.({}, `${LOG_PREFIX}:stop - Stopping`);
    for (const sub of this.subscriptions) {
      await sub.drain();
    }
    this.subscriptions = [];
    if (this.connection && this.ownsConnection) {
      await this.connection.close();
    }
    this.connection = this.ownsConnection ? null : this.connection;
    this.ownsConnection = false;
    this.log.info?.({}, `${LOG_PREFIX}:stop - Stopped`);
  }
}
