import { describe, expect, it } from "vitest";

import { ProvisioningError } from "../core/errors.js";
import { createDeferred, type Deferred } from "../core/utils.js";
import { MemoryQueuingSystem } from "../queues/queuing-system.js";
import { QueueRegistry } from "../queues/registry.js";
import { Flow } from "../work/flow.js";
import type { WorkStatus } from "../work/status.js";
import { Work } from "../work/work.js";

import type { ExecutionDriver, LaunchTarget, ProbeResult } from "./driver.js";
import { WorkBackend } from "./work-backend.js";
import { WorkLifecycle } from "./work-lifecycle.js";

class Echo extends Work<[string], string> {
  run(text: string): string {
    return text;
  }
}

type FakeHandle = { id: number; epoch: number };

class FakeDriver implements ExecutionDriver<FakeHandle> {
  readonly kind = "local" as const;
  readonly launched: LaunchTarget[] = [];
  readonly terminated: number[] = [];
  launchError?: Error;
  launchGate?: Deferred<void>;
  terminateGate?: Deferred<void>;
  probeResult: ProbeResult = { state: "running" };

  async launch(target: LaunchTarget): Promise<FakeHandle> {
    if (this.launchError) throw this.launchError;
    this.launched.push(target);
    if (this.launchGate) await this.launchGate.promise;
    return { id: this.launched.length, epoch: target.epoch };
  }

  async terminate(handle: FakeHandle): Promise<void> {
    if (this.terminateGate) await this.terminateGate.promise;
    this.terminated.push(handle.id);
  }

  async probe(handles: readonly FakeHandle[]): Promise<ProbeResult[]> {
    return handles.map(() => this.probeResult);
  }

  address(handle: FakeHandle, port: number): string {
    return `http://fake-${handle.id}:${port}`;
  }
}

function settle(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 0));
}

function setup() {
  const work = new Echo({ port: 8080 });
  new Flow().add("echo", work);
  const registry = new QueueRegistry(new MemoryQueuingSystem(), "q1");
  const appQueues = registry.prepare();
  const queues = registry.register(work.name);
  const driver = new FakeDriver();
  const manager = new WorkLifecycle({
    work,
    driver,
    queueId: "q1",
    queues,
    appQueues,
    registry,
  });
  const transitions: string[] = [];
  manager.onTransition((from: WorkStatus, to: WorkStatus) => transitions.push(`${from}->${to}`));
  return { work, registry, queues, driver, manager, transitions };
}

describe("WorkLifecycle", () => {
  it("starts a work and assigns the first epoch", async () => {
    const { manager, driver, transitions } = setup();

    await manager.start();

    expect(manager.status).toBe("running");
    expect(manager.isAlive()).toBe(true);
    expect(manager.epoch).toBe(1);
    expect(driver.launched.map((target) => target.epoch)).toEqual([1]);
    expect(transitions).toEqual(["created->starting", "starting->running"]);
  });

  it("does not relaunch a running work", async () => {
    const { manager, driver } = setup();
    await manager.start();
    await manager.start();

    expect(driver.launched).toHaveLength(1);
  });

  it("kills idempotently and drains queued calls", async () => {
    const { manager, driver, queues } = setup();
    await manager.start();
    queues.caller.push({ kind: "call", seq: 1, args: ["hi"], sent_at: "2026-01-01T00:00:00.000Z" });

    await manager.kill();
    await manager.kill();

    expect(manager.status).toBe("stopped");
    expect(manager.isAlive()).toBe(false);
    expect(driver.terminated).toEqual([1]);
    expect(queues.caller.size()).toBe(0);
  });

  it("restarts into a new epoch", async () => {
    const { manager, driver, transitions } = setup();
    await manager.start();

    await manager.restart();

    expect(manager.status).toBe("running");
    expect(manager.epoch).toBe(2);
    expect(driver.terminated).toEqual([1]);
    expect(transitions.slice(2)).toEqual([
      "running->restarting",
      "restarting->starting",
      "starting->running",
    ]);
  });

  it("never reports alive while a restart is in flight", async () => {
    const { manager, driver } = setup();
    await manager.start();
    driver.terminateGate = createDeferred<void>();
    driver.launchGate = createDeferred<void>();

    const restarting = manager.restart();
    await settle();
    expect(manager.status).toBe("restarting");
    expect(manager.isAlive()).toBe(false);

    driver.terminateGate.resolve();
    await settle();
    expect(manager.status).toBe("starting");
    expect(manager.isAlive()).toBe(false);
    expect(driver.launched).toHaveLength(2);

    driver.launchGate.resolve();
    await restarting;
    expect(manager.isAlive()).toBe(true);
    expect(manager.epoch).toBe(2);
  });

  it("rejects start with a ProvisioningError when the work fails while launching", async () => {
    const { manager, driver } = setup();
    driver.launchGate = createDeferred<void>();

    const starting = manager.start();
    await settle();
    expect(driver.launched).toHaveLength(1);
    expect(manager.fail("Error: boom", 1)).toBe(true);

    driver.launchGate.resolve();
    await expect(starting).rejects.toThrow(
      new ProvisioningError("Work root.echo failed while starting: Error: boom", "root.echo"),
    );
    await settle();

    expect(manager.status).toBe("failed");
    expect(manager.lastError).toBe("Error: boom");
    expect(driver.terminated).toEqual([1]);
    expect(manager.activeHandle).toBeUndefined();
  });

  it("fails the work when provisioning fails", async () => {
    const { manager, driver, work } = setup();
    driver.launchError = new Error("image not found");

    await expect(manager.start()).rejects.toBeInstanceOf(ProvisioningError);

    expect(manager.status).toBe("failed");
    expect(work.lastError).toBe("Failed to provision local context for root.echo: image not found");
  });

  it("accepts readiness only for the current epoch", async () => {
    const { manager } = setup();
    await manager.start();

    expect(manager.markReady(2)).toBe(false);
    expect(manager.ready).toBe(false);
    expect(manager.markReady(1)).toBe(true);
    expect(manager.ready).toBe(true);
  });

  it("ignores error signals from an older epoch", async () => {
    const { manager } = setup();
    await manager.start();
    await manager.restart();

    expect(manager.fail("old crash", 1)).toBe(false);
    expect(manager.status).toBe("running");

    expect(manager.fail("new crash", 2)).toBe(true);
    expect(manager.status).toBe("failed");
    expect(manager.lastError).toBe("new crash");
  });

  it("maps an exit code to failure and a clean exit to stopped", async () => {
    const crashed = setup();
    await crashed.manager.start();
    crashed.manager.observeExit({ state: "exited", exitCode: 3 });
    expect(crashed.manager.status).toBe("failed");
    expect(crashed.work.lastError).toBe("Execution context of root.echo exited with code 3");

    const finished = setup();
    await finished.manager.start();
    finished.manager.observeExit({ state: "exited", exitCode: 0 });
    expect(finished.manager.status).toBe("stopped");
  });
});

describe("WorkBackend", () => {
  function host() {
    const registry = new QueueRegistry(new MemoryQueuingSystem(), "q1");
    registry.prepare();
    return { queueId: "q1", registry, registerProxy: () => undefined };
  }

  it("creates one manager per work and reuses it", async () => {
    const driver = new FakeDriver();
    const backend = new WorkBackend(driver);
    const app = { ...host(), backend };
    const work = new Echo();
    new Flow().add("echo", work);

    await backend.createWork(app, work);
    await backend.createWork(app, work);

    expect(driver.launched).toHaveLength(1);
    expect(backend.getManager("root.echo")?.status).toBe("running");
  });

  it("fails works whose context disappeared", async () => {
    const driver = new FakeDriver();
    const backend = new WorkBackend(driver);
    const app = { ...host(), backend };
    const work = new Echo();
    new Flow().add("echo", work);
    await backend.createWork(app, work);

    driver.probeResult = { state: "missing" };
    await backend.updateWorkStatuses([work]);

    expect(work.status).toBe("failed");
    expect(work.lastError).toBe("Execution context of root.echo disappeared");
  });

  it("stops works idempotently", async () => {
    const driver = new FakeDriver();
    const backend = new WorkBackend(driver);
    const app = { ...host(), backend };
    const work = new Echo();
    new Flow().add("echo", work);
    await backend.createWork(app, work);

    await backend.stopWork(app, work);
    await backend.stopAllWorks([work]);

    expect(work.status).toBe("stopped");
    expect(driver.terminated).toEqual([1]);
  });

  it("resolves urls from the base url or the driver address", async () => {
    const driver = new FakeDriver();
    const backend = new WorkBackend(driver);
    const app = { ...host(), backend };
    const served = new Echo({ port: 8080 });
    const silent = new Echo();
    new Flow().add("served", served).add("silent", silent);
    await backend.createWork(app, served);

    expect(backend.resolveUrl(served, "https://apps.example.test/")).toBe(
      "https://apps.example.test/root.served",
    );
    expect(backend.resolveUrl(served)).toBe("http://fake-1:8080");
    expect(backend.resolveUrl(silent)).toBeUndefined();
  });
});
