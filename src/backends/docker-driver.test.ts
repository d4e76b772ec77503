import { describe, expect, it } from "vitest";

import { asDocker, FakeDocker } from "../__tests__/helpers/fake-docker.js";
import { parseAppConfig } from "../core/config.js";
import { ProvisioningError } from "../core/errors.js";
import { DockerManager } from "../docker/manager.js";
import { MemoryQueuingSystem } from "../queues/queuing-system.js";
import { QueueRegistry } from "../queues/registry.js";
import { Flow } from "../work/flow.js";
import { Work } from "../work/work.js";

import type { LaunchTarget } from "./driver.js";
import { DockerDriver } from "./docker-driver.js";

class Trainer extends Work<[{ batch: number }], { loss: number }> {
  run(): { loss: number } {
    return { loss: 0.42 };
  }
}

const IMAGE = "workmesh-worker:test";

function launchTarget(queueId = "q1", epoch = 1): LaunchTarget {
  const work = new Trainer();
  new Flow().add("trainer", work);
  const registry = new QueueRegistry(new MemoryQueuingSystem(), queueId);
  const appQueues = registry.prepare();
  return { work, queueId, epoch, queues: registry.register(work.name), appQueues };
}

function setup(startupTimeoutMs?: number) {
  const fake = new FakeDocker();
  fake.images.add(IMAGE);
  const config = parseAppConfig({
    docker: { image: IMAGE, resources: { memory_mb: 512, cpu_quota: 50_000 } },
  });
  const driver = new DockerDriver({
    entrypoint: "/home/dev/project/app.js",
    docker: config.docker,
    manager: new DockerManager({ docker: asDocker(fake) }),
    startupTimeoutMs,
  });
  return { fake, driver };
}

describe("DockerDriver", () => {
  it("creates a labelled container with the worker command and mounts the app module", async () => {
    const { fake, driver } = setup();
    const target = launchTarget("q1", 2);

    const handle = await driver.launch(target);
    const container = fake.containers[0];

    expect(handle.containerName).toBe("wm-q1-root.trainer-e2");
    expect(container?.started).toBe(true);
    expect(container?.options).toMatchObject({
      Image: IMAGE,
      name: "wm-q1-root.trainer-e2",
      Cmd: ["node", "/app/dist/worker/index.js"],
      WorkingDir: "/app/entry",
      OpenStdin: true,
      Labels: {
        "workmesh.managed": "true",
        "workmesh.queue_id": "q1",
        "workmesh.work_name": "root.trainer",
      },
      HostConfig: {
        Binds: ["/home/dev/project:/app/entry:ro"],
        Memory: 512 * 1024 * 1024,
        CpuQuota: 50_000,
        CpuPeriod: 100_000,
      },
    });
    expect(container?.env("WORKMESH_ENTRYPOINT")).toBe("/app/entry/app.js");
    expect(container?.env("WORKMESH_TRANSPORT")).toBe("stdio");
    expect(target.appQueues.readiness.drain()).toMatchObject([{ work_name: "root.trainer", epoch: 2 }]);
    expect(driver.address(handle, 8000)).toBe("http://172.17.0.9:8000");

    await driver.terminate(handle);
  });

  it("writes queued calls to the container as JSON lines", async () => {
    const { fake, driver } = setup();
    const target = launchTarget();
    const handle = await driver.launch(target);
    const container = fake.containers[0];

    const written = new Promise<string>((resolve) => {
      if (container) container.stdio.onWrite = resolve;
    });
    target.queues.caller.push({ kind: "call", seq: 1, args: [{ batch: 5 }], sent_at: "t" });

    expect(JSON.parse(await written)).toEqual({
      role: "caller",
      message: { kind: "call", seq: 1, args: [{ batch: 5 }], sent_at: "t" },
    });
    await driver.terminate(handle);
  });

  it("fails provisioning when the image is missing and creates nothing", async () => {
    const { fake, driver } = setup();
    fake.images.clear();

    const error = await driver.launch(launchTarget()).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ProvisioningError);
    expect(error).toMatchObject({
      message:
        "Failed to provision container for root.trainer: Worker image workmesh-worker:test was not found; build or pull it first. " +
        "Check that the worker image and docker settings are valid, then retry.",
    });
    expect(fake.containers).toEqual([]);
  });

  it("removes the container when readiness never arrives", async () => {
    const { fake, driver } = setup(20);
    fake.onCreate = (container) => {
      container.announceReady = false;
    };

    await expect(driver.launch(launchTarget())).rejects.toThrow(
      "Container wm-q1-root.trainer-e1 for root.trainer did not report readiness within 20ms",
    );
    expect(fake.containers[0]?.removed).toBe(true);
  });

  it("probes containers with one listing per queue", async () => {
    const { fake, driver } = setup();
    const handle = await driver.launch(launchTarget());

    expect(await driver.probe([handle])).toEqual([{ state: "running" }]);

    const container = fake.containers[0];
    if (container) {
      container.state = "exited";
      container.status = "Exited (3) 2 seconds ago";
    }
    expect(await driver.probe([handle])).toEqual([{ state: "exited", exitCode: 3 }]);

    await driver.terminate(handle);
    expect(container?.stopped).toBe(true);
    expect(container?.removed).toBe(true);
    expect(await driver.probe([handle])).toEqual([{ state: "missing" }]);
  });
});
