import { describe, expect, it } from "vitest";

import type { JsonObject } from "../protocol/json.js";
import { DeltaOpSchema } from "../protocol/messages.js";

import { applyOps, deleteAt, getAt, normalizePath, setAt } from "./state-tree.js";

describe("state tree paths", () => {
  it("splits dotted paths", () => {
    expect(normalizePath("metrics.loss")).toEqual(["metrics", "loss"]);
    expect(normalizePath(["a", "b"])).toEqual(["a", "b"]);
  });

  it("rejects empty segments", () => {
    expect(() => normalizePath("a..b")).toThrow("Invalid state path");
    expect(() => normalizePath([])).toThrow("Invalid state path");
  });

  it("creates intermediate objects on set", () => {
    const root: JsonObject = {};
    setAt(root, ["metrics", "loss"], 0.5);

    expect(root).toEqual({ metrics: { loss: 0.5 } });
    expect(getAt(root, ["metrics", "loss"])).toBe(0.5);
    expect(getAt(root, ["metrics", "missing", "deeper"])).toBeUndefined();
  });

  it("replaces a scalar parent with an object", () => {
    const root: JsonObject = { metrics: 3 };
    setAt(root, ["metrics", "loss"], 1);
    expect(root).toEqual({ metrics: { loss: 1 } });
  });

  it("reports whether a delete removed anything", () => {
    const root: JsonObject = { a: { b: 1 } };

    expect(deleteAt(root, ["a", "c"])).toBe(false);
    expect(deleteAt(root, ["a", "b"])).toBe(true);
    expect(root).toEqual({ a: {} });
  });

  it("applies ops in order", () => {
    const root: JsonObject = {};
    applyOps(root, [
      { op: "set", path: ["x"], value: 1 },
      { op: "set", path: ["y"], value: [1, 2] },
      { op: "delete", path: ["x"] },
    ]);

    expect(root).toEqual({ y: [1, 2] });
  });

  it("never walks into prototype keys", () => {
    const root: JsonObject = { a: 1 };

    expect(() => normalizePath("__proto__.polluted")).toThrow("Invalid state path");
    expect(() => setAt(root, ["constructor", "prototype", "polluted"], "yes")).toThrow(
      "Invalid state path",
    );
    expect(getAt(root, ["toString"])).toBeUndefined();
    expect(deleteAt(root, ["hasOwnProperty"])).toBe(false);
    expect(Object.prototype).not.toHaveProperty("polluted");
  });

  it("skips ops with reserved segments and returns them", () => {
    const root: JsonObject = {};
    const rejected = applyOps(root, [
      { op: "set", path: ["__proto__", "polluted"], value: "yes" },
      { op: "set", path: ["ok"], value: true },
    ]);

    expect(rejected).toEqual([{ op: "set", path: ["__proto__", "polluted"], value: "yes" }]);
    expect(root).toEqual({ ok: true });
    expect(Object.prototype).not.toHaveProperty("polluted");
  });

  it("rejects reserved segments in delta ops on the wire", () => {
    const parsed = DeltaOpSchema.safeParse({ op: "delete", path: ["state", "prototype"] });
    expect(parsed.success).toBe(false);
  });
});
