/**
 * Client and service wired together in-process through the loopback transport.
 */

import { describe, it, expect, vi } from "vitest";
import { RpcClient, createLoopbackTransport } from "@switchrpc/client";
import { Fault } from "@switchrpc/core";
import { RpcService } from "./service.js";
import type { OperationHandler } from "./service-processor.js";

const api = {
  name: "text",
  version: "1",
  exceptions: ["Unauthorized"],
  operations: [
    { name: "upper", input: ["text"], output: ["result"] },
    { name: "whoami", input: ["token"], output: ["user"] },
  ],
};

function setup() {
  const upper = vi.fn<OperationHandler>((request, response) => {
    response.set("result", String(request.get("text")).toUpperCase());
  });
  const service = new RpcService({ api, loggerFactory: {} })
    .use("operation", async (request, response, context) => {
      if (request.get("text") === "!") throw new Error("unit refused input");
      if (request.get("text") === "") {
        response.set("result", "");
        return;
      }
      await context.continue();
    })
    .operation("upper", upper)
    .operation("whoami", (request, response) => {
      const token = request.get("token");
      if (token === "test-secret") {
        response.set("user", "alice");
        return;
      }
      if (token === null) throw new Error("token lookup crashed");
      throw new (service.exceptions.fault("Unauthorized"))("bad token");
    });

  const client = new RpcClient({
    api,
    transport: createLoopbackTransport(service),
    loggerFactory: {},
  });
  return { service, client, upper };
}

describe("client/service round trip", () => {
  it("calls an operation end to end", async () => {
    const { client } = setup();
    await expect(client.call("upper", "hi")).resolves.toBe("HI");
  });

  it("short-circuits in an operation unit without running the handler", async () => {
    const { client, upper } = setup();

    await expect(client.call("upper", "")).resolves.toBe("");
    expect(upper).not.toHaveBeenCalled();
  });

  it("redacts a fault raised by a short-circuiting operation unit", async () => {
    const { service, client, upper } = setup();

    await expect(service.dispatch("/api/1/upper", '{"text":"!"}')).resolves.toEqual({
      status: 200,
      reason: "OK",
      text: '{"__exception__":{"cls":"RequestException","args":[500]}}',
    });
    await expect(client.call("upper", "!")).rejects.toMatchObject({
      name: "RequestException",
      args: [500],
    });
    expect(upper).not.toHaveBeenCalled();
  });

  it("re-raises whitelisted faults from the client's registry", async () => {
    const { client } = setup();

    const error = await client.call("whoami", "wrong").catch((err: unknown) => err);

    expect(error).toBeInstanceOf(client.exceptions.fault("Unauthorized"));
    expect(error).toMatchObject({ name: "Unauthorized", args: ["bad token"] });
    await expect(client.call("whoami", "test-secret")).resolves.toBe("alice");
  });

  it("collapses other faults into a redacted RequestException", async () => {
    const { client } = setup();

    const error = await client.call("whoami").catch((err: unknown) => err);

    expect(error).toBeInstanceOf(Fault);
    expect(error).toMatchObject({ name: "RequestException", args: [500] });
  });

  it("surfaces unknown operations as a 404 RequestException", async () => {
    const { service } = setup();
    const client = new RpcClient({
      api: { ...api, operations: [...api.operations, { name: "lower", input: ["text"], output: ["result"] }] },
      transport: createLoopbackTransport(service),
      loggerFactory: {},
    });

    await expect(client.call("lower", "HI")).rejects.toMatchObject({
      name: "RequestException",
      args: ["404 Not Found"],
    });
  });
});
