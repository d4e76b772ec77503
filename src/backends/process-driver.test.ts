import { describe, expect, it } from "vitest";

import { createChannelPair } from "../__tests__/helpers/paired-channel.js";
import { ProvisioningError } from "../core/errors.js";
import { createDeferred } from "../core/utils.js";
import { MemoryQueuingSystem } from "../queues/queuing-system.js";
import { QueueRegistry } from "../queues/registry.js";
import { IpcTransport } from "../transport/ipc-transport.js";
import { Flow } from "../work/flow.js";
import { Work } from "../work/work.js";
import { serveWork } from "../../worker/serve.js";

import type { LaunchTarget } from "./driver.js";
import { ProcessDriver, workerEnv } from "./process-driver.js";
import type {
  OutputListener,
  WorkProcess,
  WorkProcessExit,
  WorkProcessSpec,
} from "./process-spawner.js";

class Trainer extends Work<[{ batch: number }], { loss: number }> {
  run({ batch }: { batch: number }): { loss: number } {
    this.setState("progress", batch);
    return { loss: 0.42 };
  }
}

type FakeProcessOptions = {
  /** Serve the work in-process over the paired channel. */
  serve: boolean;
  exitBeforeReady?: number;
  ignoreSigterm?: boolean;
};

class FakeProcess implements WorkProcess {
  readonly pid = 4242;
  readonly signals: string[] = [];
  readonly pair = createChannelPair();
  private readonly exit = createDeferred<WorkProcessExit>();
  private output?: OutputListener;
  private stopSession?: () => Promise<void>;

  constructor(
    readonly spec: WorkProcessSpec,
    private readonly opts: FakeProcessOptions,
  ) {
    if (opts.exitBeforeReady !== undefined) {
      this.exit.resolve({ exitCode: opts.exitBeforeReady });
    }
  }

  get channel() {
    return this.pair.app;
  }

  get exited(): Promise<WorkProcessExit> {
    return this.exit.promise;
  }

  onOutput(listener: OutputListener): void {
    this.output = listener;
  }

  startWorker(): void {
    if (!this.opts.serve) return;
    const env = this.spec.env;
    const session = serveWork({
      settings: {
        workName: env.WORKMESH_WORK_NAME ?? "",
        entrypoint: env.WORKMESH_ENTRYPOINT ?? "",
        queueId: env.WORKMESH_QUEUE_ID ?? "",
        epoch: Number(env.WORKMESH_EPOCH),
        transport: "ipc",
      },
      definition: { root: new Flow().add("trainer", new Trainer()) },
      transport: new IpcTransport(this.pair.worker),
      logger: { log: (event) => this.output?.(JSON.stringify(event), "stderr") },
    });
    this.stopSession = session.stop;
  }

  kill(signal: NodeJS.Signals = "SIGTERM"): void {
    this.signals.push(signal);
    if (signal === "SIGTERM" && this.opts.ignoreSigterm) return;
    const stop = this.stopSession ?? (() => Promise.resolve());
    void stop().then(() => {
      this.pair.disconnect();
      this.exit.resolve(signal === "SIGKILL" ? { exitCode: 137, signal } : { exitCode: 0 });
    });
  }
}

function launchTarget(epoch = 1): LaunchTarget {
  const work = new Trainer();
  new Flow().add("trainer", work);
  const registry = new QueueRegistry(new MemoryQueuingSystem(), "q1");
  const appQueues = registry.prepare();
  return { work, queueId: "q1", epoch, queues: registry.register(work.name), appQueues };
}

function driverWith(opts: FakeProcessOptions, overrides: { startupTimeoutMs?: number; killTimeoutMs?: number } = {}) {
  const spawned: FakeProcess[] = [];
  const driver = new ProcessDriver({
    entrypoint: "/srv/app/entry.js",
    workerScript: "/srv/workmesh/worker/index.js",
    nodeOptions: ["--enable-source-maps"],
    spawner: (spec) => {
      const child = new FakeProcess(spec, opts);
      spawned.push(child);
      child.startWorker();
      return child;
    },
    ...overrides,
  });
  return { driver, spawned };
}

describe("workerEnv", () => {
  it("describes the work to serve", () => {
    expect(workerEnv("/srv/app/entry.js", launchTarget(3))).toEqual({
      WORKMESH_WORK_NAME: "root.trainer",
      WORKMESH_ENTRYPOINT: "/srv/app/entry.js",
      WORKMESH_QUEUE_ID: "q1",
      WORKMESH_EPOCH: "3",
      WORKMESH_TRANSPORT: "ipc",
    });
  });
});

describe("ProcessDriver", () => {
  it("launches a worker, waits for readiness and relays calls", async () => {
    const { driver, spawned } = driverWith({ serve: true });
    const target = launchTarget();

    const handle = await driver.launch(target);

    expect(spawned[0]?.spec.script).toBe("/srv/workmesh/worker/index.js");
    expect(spawned[0]?.spec.nodeOptions).toEqual(["--enable-source-maps"]);
    expect(target.appQueues.readiness.drain()).toMatchObject([{ work_name: "root.trainer", epoch: 1 }]);

    target.queues.caller.push({ kind: "call", seq: 1, args: [{ batch: 5 }], sent_at: "t" });
    expect(await target.queues.response.pop(1_000)).toEqual({
      kind: "result",
      seq: 1,
      ok: true,
      value: { loss: 0.42 },
    });
    expect(await driver.probe([handle])).toEqual([{ state: "running" }]);

    await driver.terminate(handle);
    expect(spawned[0]?.signals).toEqual(["SIGTERM"]);
    expect(await driver.probe([handle])).toEqual([{ state: "exited", exitCode: 0 }]);
  });

  it("fails provisioning when the worker exits before it is ready", async () => {
    const { driver } = driverWith({ serve: false, exitBeforeReady: 2 });

    const error = await driver.launch(launchTarget()).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ProvisioningError);
    expect(error).toMatchObject({
      workName: "root.trainer",
      message: "Worker process for root.trainer exited with code 2 before it became ready",
    });
  });

  it("fails provisioning when readiness never arrives", async () => {
    const { driver, spawned } = driverWith({ serve: false }, { startupTimeoutMs: 20 });

    await expect(driver.launch(launchTarget())).rejects.toThrow(
      "Worker process for root.trainer did not report readiness within 20ms",
    );
    expect(spawned[0]?.signals).toEqual(["SIGTERM"]);
  });

  it("escalates to SIGKILL when the worker ignores SIGTERM", async () => {
    const { driver, spawned } = driverWith({ serve: true, ignoreSigterm: true }, { killTimeoutMs: 10 });
    const handle = await driver.launch(launchTarget());

    await driver.terminate(handle);

    expect(spawned[0]?.signals).toEqual(["SIGTERM", "SIGKILL"]);
    expect(await driver.probe([handle])).toEqual([
      { state: "exited", exitCode: 137, error: "Worker process terminated by SIGKILL" },
    ]);
  });

  it("wraps spawn failures", async () => {
    const driver = new ProcessDriver({
      entrypoint: "/srv/app/entry.js",
      workerScript: "/srv/workmesh/worker/index.js",
      spawner: () => {
        throw new Error("ENOENT");
      },
    });

    await expect(driver.launch(launchTarget())).rejects.toThrow(
      "Failed to spawn worker process for root.trainer: ENOENT",
    );
  });
});
