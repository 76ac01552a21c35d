/**
 * HTTP binding: POST <pattern> -> RpcService.dispatch().
 */

import {
  type IncomingHttpHeaders,
  type Server,
  type ServerResponse,
  createServer,
} from "node:http";
import {
  type Logger,
  type LoggerFactory,
  type TransportResponse,
  RpcError,
  decodeUtf8,
  isRpcError,
  reasonFor,
  resolveLogger,
} from "@switchrpc/core";
import type { RpcService } from "../service.js";

const LOG_PREFIX = "switchrpc-service:http";

export const DEFAULT_MAX_BODY_BYTES = 102_400;

export interface HttpBindingOptions {
  maxBodyBytes?: number;
  /** Response Content-Type (default: the service codec's) */
  contentType?: string;
  loggerFactory?: LoggerFactory;
}

export interface ServeHttpOptions extends HttpBindingOptions {
  host?: string;
  port?: number;
}

/** What the binding reads from an inbound request. */
export interface HttpRequestLike extends AsyncIterable<unknown> {
  method?: string;
  url?: string;
  headers: IncomingHttpHeaders;
}

/** The parts of a response the binding writes. */
export type HttpResponseLike = Pick<ServerResponse, "writeHead" | "end" | "headersSent">;

/**
 * Collect a request body, failing with PAYLOAD_TOO_LARGE past `maxBytes`
 * and with PROTOCOL_ERROR on invalid UTF-8.
 */
export async function readBody(stream: AsyncIterable<unknown>, maxBytes: number): Promise<string> {
  const chunks: Buffer[] = [];
  let size = 0;
  for await (const chunk of stream) {
    const buf = chunk instanceof Uint8Array ? Buffer.from(chunk) : Buffer.from(String(chunk));
    size += buf.length;
    if (size > maxBytes) {
      throw new RpcError({
        code: "PAYLOAD_TOO_LARGE",
        message: `${LOG_PREFIX}:readBody - Body exceeds ${maxBytes} bytes`,
        status: 413,
      });
    }
    chunks.push(buf);
  }
  return decodeUtf8(Buffer.concat(chunks));
}

function statusOnly(status: number): TransportResponse {
  return { status, reason: reasonFor(status), text: "" };
}

/** Route one request to the service and return the status and body to send. */
export async function handleHttpRequest(
  service: RpcService,
  req: HttpRequestLike,
  options: HttpBindingOptions = {}
): Promise<TransportResponse> {
  const maxBodyBytes = options.maxBodyBytes ?? DEFAULT_MAX_BODY_BYTES;
  if (req.method !== "POST") return statusOnly(405);

  const declared = Number(req.headers["content-length"]);
  if (Number.isFinite(declared) && declared > maxBodyBytes) return statusOnly(413);

  let body: string;
  try {
    body = await readBody(req, maxBodyBytes);
  } catch (err) {
    if (isRpcError(err, "PAYLOAD_TOO_LARGE")) return statusOnly(413);
    if (isRpcError(err, "PROTOCOL_ERROR")) return statusOnly(400);
    throw err;
  }

  const path = new URL(req.url ?? "/", "http://localhost").pathname;
  return service.dispatch(path, body);
}

function send(res: HttpResponseLike, result: TransportResponse, contentType: string): void {
  res.writeHead(result.status, result.reason, {
    "Content-Type": contentType,
    "Content-Length": Buffer.byteLength(result.text),
  });
  res.end(result.text);
}

/** Request listener for `http.createServer` or any compatible framework. */
export function createHttpListener(
  service: RpcService,
  options: HttpBindingOptions = {}
): (req: HttpRequestLike, res: HttpResponseLike) => void {
  const log: Logger = resolveLogger(options.loggerFactory, LOG_PREFIX);
  const contentType = options.contentType ?? service.codec.contentType;

  return (req, res) => {
    (async () => {
      const result = await handleHttpRequest(service, req, options);
      log.debug?.({ method: req.method, url: req.url, status: result.status }, `${LOG_PREFIX}:listener - Handled`);
      send(res, result, contentType);
    })().catch((err) => {
      log.error?.(
        { url: req.url, error: err instanceof Error ? err.message : String(err) },
        `${LOG_PREFIX}:listener - Request failed`
      );
      if (!res.headersSent) send(res, statusOnly(500), contentType);
      else res.end();
    });
  };
}

/**
 * Start an HTTP server for the service. Every declared operation must have
 * a handler.
 */
export async function serveHttp(service: RpcService, options: ServeHttpOptions = {}): Promise<Server> {
  service.assertReady();
  const log: Logger = resolveLogger(options.loggerFactory, LOG_PREFIX);
  const host = options.host ?? service.api.endpoint.host ?? "localhost";
  const port = options.port ?? service.api.endpoint.port ?? 8080;

  const server = createServer(createHttpListener(service, options));
  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(port, host, () => {
      server.off("error", reject);
      resolve();
    });
  });
  log.info?.({ host, port, api: service.api.name }, `${LOG_PREFIX}:serveHttp - Listening`);
  return server;
}
