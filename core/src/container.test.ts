import { describe, it, expect } from "vitest";
import { Container } from "./container.js";

describe("Container", () => {
  it("returns null for missing keys without inserting them", () => {
    const c = new Container();
    expect(c.get("missing")).toBeNull();
    expect(c.has("missing")).toBe(false);
    expect(c.size).toBe(0);
  });

  it("stores and overwrites values", () => {
    const c = new Container({ a: 1 });
    c.set("a", 2).set("b", "two");
    expect(c.get("a")).toBe(2);
    expect(c.toRecord()).toEqual({ a: 2, b: "two" });
  });

  it("keeps an explicit null distinct from a missing key", () => {
    const c = new Container();
    c.set("empty", null);
    expect(c.has("empty")).toBe(true);
    expect(c.get("empty")).toBeNull();
  });

  it("updates, deletes and clears", () => {
    const c = new Container();
    c.update({ x: 1, y: 2 });
    expect(c.keys()).toEqual(["x", "y"]);
    expect(c.delete("x")).toBe(true);
    expect(c.keys()).toEqual(["y"]);
    c.clear();
    expect(c.size).toBe(0);
  });
});
