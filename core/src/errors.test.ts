import { describe, it, expect } from "vitest";
import { RpcError, isRpcError } from "./errors.js";

describe("RpcError", () => {
  it("carries code, status, details and cause", () => {
    const cause = new Error("socket closed");
    const err = new RpcError({
      code: "PAYLOAD_TOO_LARGE",
      message: "too big",
      status: 413,
      details: { limit: 10 },
      cause,
    });

    expect(err).toBeInstanceOf(Error);
    expect(err).toMatchObject({
      name: "RpcError",
      code: "PAYLOAD_TOO_LARGE",
      message: "too big",
      status: 413,
      details: { limit: 10 },
    });
    expect(err.cause).toBe(cause);
    expect(err).not.toHaveProperty("retryable");
  });

  it("matches by code", () => {
    const err = new RpcError({ code: "PROTOCOL_ERROR", message: "bad" });

    expect(isRpcError(err)).toBe(true);
    expect(isRpcError(err, "PROTOCOL_ERROR")).toBe(true);
    expect(isRpcError(err, "VALIDATION_ERROR")).toBe(false);
    expect(isRpcError(new Error("bad"))).toBe(false);
  });
});
