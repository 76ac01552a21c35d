/**
 * Unit tests for the NATS transport with a mocked connection.
 */

import { describe, it, expect, vi } from "vitest";
import { headers, StringCodec, type Msg } from "nats";
import type { NatsRequester } from "./nats-transport.js";
import { createNatsTransport } from "./nats-transport.js";

const sc = StringCodec();

type Reply = Pick<Msg, "data" | "headers">;

function reply(text: string, status?: string, reason?: string): Reply {
  const h = headers();
  if (status) h.set("Rpc-Status", status);
  if (reason) h.set("Rpc-Reason", reason);
  return { data: sc.encode(text), headers: status || reason ? h : undefined };
}

function mockRequest(impl: () => Promise<Reply>) {
  return vi.fn<NatsRequester["request"]>(impl);
}

describe("createNatsTransport", () => {
  it("requests on the subject derived from the URI path", async () => {
    const request = mockRequest(async () => reply('{"result":"HI"}'));
    const transport = createNatsTransport({ connection: { request }, subjectPrefix: "rpc" });

    const res = await transport.post("http://localhost:8080/api/1/upper", '{"text":"hi"}', 1500);

    expect(res).toEqual({ status: 200, reason: "OK", text: '{"result":"HI"}' });
    expect(request).toHaveBeenCalledWith("rpc.api.1.upper", sc.encode('{"text":"hi"}'), { timeout: 1500 });
  });

  it("reads status and reason from reply headers", async () => {
    const request = mockRequest(async () => reply("", "404", "Not Found"));
    const transport = createNatsTransport({ connection: { request } });

    await expect(transport.post("http://localhost/api/1/nope", "{}", 100)).resolves.toEqual({
      status: 404,
      reason: "Not Found",
      text: "",
    });
    expect(request.mock.calls[0][0]).toBe("api.1.nope");
  });

  it.each(["abc", "200abc", "20", "2000", " 200"])("rejects the status header %j", async (status) => {
    const request = mockRequest(async () => reply("", status));
    const transport = createNatsTransport({ connection: { request } });

    await expect(transport.post("http://localhost/api/1/x", "{}", 100)).rejects.toMatchObject({
      code: "PROTOCOL_ERROR",
    });
  });

  it("propagates request failures", async () => {
    const request = mockRequest(async () => {
      throw new Error("TIMEOUT");
    });
    const transport = createNatsTransport({ connection: { request } });

    await expect(transport.post("http://localhost/api/1/x", "{}", 100)).rejects.toThrow("TIMEOUT");
  });
});
