import { WorkRuntime } from "../runtime/work-runtime.js";

import type { ExecutionDriver, LaunchTarget, ProbeResult } from "./driver.js";

export type LocalHandle = {
  runtime: WorkRuntime;
  workName: string;
};

/** Serves works in-process on the App's own queues. */
export class LocalDriver implements ExecutionDriver<LocalHandle> {
  readonly kind = "local" as const;

  async launch(target: LaunchTarget): Promise<LocalHandle> {
    const runtime = new WorkRuntime({
      work: target.work,
      epoch: target.epoch,
      queues: target.queues,
      appQueues: target.appQueues,
      logger: target.logger,
    });
    runtime.start();
    return { runtime, workName: target.work.name };
  }

  async terminate(handle: LocalHandle): Promise<void> {
    await handle.runtime.stop();
  }

  async probe(handles: readonly LocalHandle[]): Promise<ProbeResult[]> {
    return handles.map((handle) => probeRuntime(handle.runtime));
  }

  address(_handle: LocalHandle, port: number): string {
    return `http://127.0.0.1:${port}`;
  }
}

function probeRuntime(runtime: WorkRuntime): ProbeResult {
  switch (runtime.state) {
    case "idle":
    case "running":
      return { state: "running" };
    case "stopped":
      return { state: "exited", exitCode: 0 };
    case "crashed":
      return {
        state: "exited",
        exitCode: 1,
        error: runtime.failure?.message ?? "work runtime crashed",
      };
  }
}
