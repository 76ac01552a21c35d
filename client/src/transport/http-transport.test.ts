import { describe, it, expect, vi } from "vitest";
import { createHttpTransport } from "./http-transport.js";

describe("createHttpTransport", () => {
  it("POSTs the body and reports status, reason and text", async () => {
    const fetchImpl = vi.fn<typeof fetch>(
      async () => new Response('{"result":"HI"}', { status: 200, statusText: "OK" })
    );
    const transport = createHttpTransport({ fetchImpl, headers: { "X-Trace": "t-1" } });

    const reply = await transport.post("http://localhost:8080/api/1/upper", '{"text":"hi"}', 1000);

    expect(reply).toEqual({ status: 200, reason: "OK", text: '{"result":"HI"}' });
    const [url, init] = fetchImpl.mock.calls[0];
    expect(url).toBe("http://localhost:8080/api/1/upper");
    expect(init?.method).toBe("POST");
    expect(init?.body).toBe('{"text":"hi"}');
    expect(init?.headers).toEqual({ "Content-Type": "application/json", "X-Trace": "t-1" });
    expect(init?.signal).toBeInstanceOf(AbortSignal);
  });

  it("resolves with non-2xx statuses instead of throwing", async () => {
    const fetchImpl = vi.fn<typeof fetch>(
      async () => new Response("", { status: 404, statusText: "Not Found" })
    );
    const transport = createHttpTransport({ fetchImpl });

    await expect(transport.post("http://localhost/x", "{}", 1000)).resolves.toEqual({
      status: 404,
      reason: "Not Found",
      text: "",
    });
  });

  it("propagates network failures", async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => {
      throw new TypeError("fetch failed");
    });
    const transport = createHttpTransport({ fetchImpl });

    await expect(transport.post("http://localhost/x", "{}", 1000)).rejects.toThrow("fetch failed");
  });
});
