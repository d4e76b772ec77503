import { describe, expect, it } from "vitest";

import { OrchestratorError } from "../core/errors.js";

import { MemoryQueuingSystem } from "./queuing-system.js";
import { QueueRegistry } from "./registry.js";

function callRequest(seq: number) {
  return { kind: "call" as const, seq, args: [], sent_at: "2026-01-01T00:00:00.000Z" };
}

describe("QueueRegistry", () => {
  it("throws when app queues are read before prepare", () => {
    const registry = new QueueRegistry(new MemoryQueuingSystem(), "q1");
    expect(() => registry.app).toThrow(OrchestratorError);
  });

  it("prepares the app-wide queues from the fabric", () => {
    const system = new MemoryQueuingSystem();
    const registry = new QueueRegistry(system, "q1");

    const app = registry.prepare();

    expect(app.delta).toBe(system.getDeltaQueue("q1"));
    expect(app.readiness.name).toBe("q1:readiness");
    expect(registry.app).toBe(app);
  });

  it("registers a work once", () => {
    const registry = new QueueRegistry(new MemoryQueuingSystem(), "q1");
    registry.prepare();

    const first = registry.register("root.trainer");
    const second = registry.register("root.trainer");

    expect(second).toBe(first);
    expect(first.caller.name).toBe("q1:caller:root.trainer");
    expect(registry.workNames()).toEqual(["root.trainer"]);
  });

  it("drains queued traffic and reports how much was dropped", () => {
    const registry = new QueueRegistry(new MemoryQueuingSystem(), "q1");
    registry.prepare();
    const set = registry.register("root.trainer");
    set.caller.push(callRequest(1));
    set.caller.push(callRequest(2));
    set.request.push({ kind: "stop" });

    expect(registry.drainWork("root.trainer")).toBe(3);
    expect(set.caller.size()).toBe(0);
    expect(registry.drainWork("root.unknown")).toBe(0);
  });

  it("unregisters a work and closes its queues", () => {
    const registry = new QueueRegistry(new MemoryQueuingSystem(), "q1");
    registry.prepare();
    const set = registry.register("root.trainer");

    registry.unregister("root.trainer");

    expect(registry.has("root.trainer")).toBe(false);
    expect(set.caller.closed).toBe(true);
  });
});
