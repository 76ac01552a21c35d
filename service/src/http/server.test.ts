import { Readable } from "node:stream";
import type { IncomingHttpHeaders } from "node:http";
import { describe, it, expect, vi } from "vitest";
import { isRpcError, jsonCodec } from "@switchrpc/core";
import { RpcService } from "../service.js";
import {
  DEFAULT_MAX_BODY_BYTES,
  createHttpListener,
  handleHttpRequest,
  readBody,
  type HttpRequestLike,
} from "./server.js";

const service = new RpcService({
  api: {
    name: "text",
    version: "1",
    operations: [{ name: "upper", input: ["text"], output: ["result"] }],
  },
  loggerFactory: {},
}).operation("upper", (request, response) => {
  response.set("result", String(request.get("text")).toUpperCase());
});

function request(init: {
  method?: string;
  url?: string;
  headers?: IncomingHttpHeaders;
  body?: Array<string | Buffer>;
}): HttpRequestLike {
  const chunks = (init.body ?? []).map((chunk) => (typeof chunk === "string" ? Buffer.from(chunk) : chunk));
  return Object.assign(Readable.from(chunks), {
    method: init.method ?? "POST",
    url: init.url ?? "/api/1/upper",
    headers: init.headers ?? {},
  });
}

describe("readBody", () => {
  it("joins buffer and string chunks", async () => {
    await expect(readBody(Readable.from([Buffer.from("ab"), "cd"]), 10)).resolves.toBe("abcd");
  });

  it("fails once the body passes the limit", async () => {
    const error = await readBody(Readable.from([Buffer.from("abc"), Buffer.from("def")]), 5).catch(
      (err: unknown) => err
    );
    expect(isRpcError(error, "PAYLOAD_TOO_LARGE")).toBe(true);
  });

  it("rejects invalid UTF-8", async () => {
    const error = await readBody(Readable.from([Buffer.from([0x7b, 0xff, 0x7d])]), 10).catch(
      (err: unknown) => err
    );
    expect(isRpcError(error, "PROTOCOL_ERROR")).toBe(true);
  });

  it("defaults to a 100 KiB limit", () => {
    expect(DEFAULT_MAX_BODY_BYTES).toBe(102400);
  });
});

describe("handleHttpRequest", () => {
  it("dispatches POST bodies to the service", async () => {
    const result = await handleHttpRequest(service, request({ body: ['{"text":', '"hi"}'] }));
    expect(result).toEqual({ status: 200, reason: "OK", text: '{"result":"HI"}' });
  });

  it("ignores the query string when matching", async () => {
    const result = await handleHttpRequest(service, request({ url: "/api/1/upper?x=1", body: ['{"text":"a"}'] }));
    expect(result.text).toBe('{"result":"A"}');
  });

  it("answers 405 for other methods", async () => {
    await expect(handleHttpRequest(service, request({ method: "GET" }))).resolves.toEqual({
      status: 405,
      reason: "Method Not Allowed",
      text: "",
    });
  });

  it("answers 413 for a declared length over the limit", async () => {
    const result = await handleHttpRequest(
      service,
      request({ headers: { "content-length": "200000" }, body: ["{}"] })
    );
    expect(result.status).toBe(413);
  });

  it("answers 413 when the streamed body passes the limit", async () => {
    const result = await handleHttpRequest(service, request({ body: ['{"text":"hello"}'] }), {
      maxBodyBytes: 8,
    });
    expect(result).toEqual({ status: 413, reason: "Payload Too Large", text: "" });
  });

  it("answers 400 for bodies that are not UTF-8", async () => {
    const result = await handleHttpRequest(service, request({ body: [Buffer.from([0xc3, 0x28])] }));
    expect(result).toEqual({ status: 400, reason: "Bad Request", text: "" });
  });

  it("answers 404 for unknown paths", async () => {
    const result = await handleHttpRequest(service, request({ url: "/api/1/lower", body: ["{}"] }));
    expect(result.status).toBe(404);
  });
});

describe("createHttpListener", () => {
  it("labels responses with the service codec's content type", async () => {
    const textService = new RpcService({
      api: {
        name: "text",
        version: "1",
        operations: [{ name: "upper", input: ["text"], output: ["result"] }],
      },
      codec: { ...jsonCodec, contentType: "application/vnd.text+json" },
      loggerFactory: {},
    }).operation("upper", (req, res) => {
      res.set("result", String(req.get("text")).toUpperCase());
    });
    const writeHead = vi.fn();
    const end = vi.fn();

    createHttpListener(textService, { loggerFactory: {} })(request({ body: ['{"text":"hi"}'] }), {
      writeHead,
      end,
      headersSent: false,
    });

    await vi.waitFor(() => expect(end).toHaveBeenCalledWith('{"result":"HI"}'));
    expect(writeHead).toHaveBeenCalledWith(200, "OK", {
      "Content-Type": "application/vnd.text+json",
      "Content-Length": 15,
    });
  });
});
