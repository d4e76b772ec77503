/**
 * ProcessDriver runs each work in a child Node process.
 * Purpose: isolate works from the App while keeping them on the local machine.
 * Assumptions: the worker script serves one work over the IPC channel; launch() returns once
 * the worker has reported readiness.
 */

import { formatErrorMessage } from "../core/error-format.js";
import { ProvisioningError } from "../core/errors.js";
import { logJsonLineOrRaw, logOrchestratorEvent, type JsonlLogger } from "../core/logger.js";
import { sleep } from "../core/utils.js";
import { IpcTransport } from "../transport/ipc-transport.js";
import { QueueBridge } from "../transport/queue-bridge.js";
import { appSideRoutes } from "../transport/routes.js";

import type { ExecutionDriver, LaunchTarget, ProbeResult } from "./driver.js";
import {
  execaSpawner,
  type ProcessSpawner,
  type WorkProcess,
  type WorkProcessExit,
} from "./process-spawner.js";

// =============================================================================
// TYPES
// =============================================================================

export type ProcessDriverOptions = {
  /** Module exporting the App definition; the worker rebuilds the flow from it. */
  entrypoint: string;
  workerScript: string;
  nodeOptions?: string[];
  killTimeoutMs?: number;
  startupTimeoutMs?: number;
  spawner?: ProcessSpawner;
  logger?: JsonlLogger;
};

export type ProcessHandle = {
  workName: string;
  process: WorkProcess;
  bridge: QueueBridge;
  transport: IpcTransport;
  exit?: WorkProcessExit;
};

const DEFAULT_KILL_TIMEOUT_MS = 5_000;
const DEFAULT_STARTUP_TIMEOUT_MS = 30_000;

// =============================================================================
// DRIVER
// =============================================================================

export class ProcessDriver implements ExecutionDriver<ProcessHandle> {
  readonly kind = "process" as const;
  private readonly spawner: ProcessSpawner;

  constructor(private readonly opts: ProcessDriverOptions) {
    this.spawner = opts.spawner ?? execaSpawner;
  }

  async launch(target: LaunchTarget): Promise<ProcessHandle> {
    const workName = target.work.name;
    const logger = target.logger ?? this.opts.logger;

    let child: WorkProcess;
    try {
      child = this.spawner({
        script: this.opts.workerScript,
        args: [],
        env: workerEnv(this.opts.entrypoint, target),
        nodeOptions: this.opts.nodeOptions ?? [],
      });
    } catch (err) {
      throw new ProvisioningError(
        `Failed to spawn worker process for ${workName}: ${formatErrorMessage(err)}`,
        workName,
        err,
      );
    }

    const transport = new IpcTransport(child.channel);
    const bridge = new QueueBridge({
      transport,
      ...appSideRoutes(target.queues, target.appQueues),
      logger,
      workName,
    });
    const handle: ProcessHandle = { workName, process: child, bridge, transport };

    void child.exited.then((exit) => {
      handle.exit = exit;
      logOrchestratorEvent(logger, "work.process.exit", {
        workName,
        exit_code: exit.exitCode,
        signal: exit.signal ?? null,
      });
    });
    child.onOutput((line, stream) => {
      if (logger) logJsonLineOrRaw(logger, line, stream, "work.log", workName);
    });
    bridge.start();

    try {
      await this.awaitStartup(handle);
    } catch (err) {
      await this.terminate(handle);
      throw err;
    }

    logOrchestratorEvent(logger, "work.process.start", {
      workName,
      pid: child.pid ?? null,
      epoch: target.epoch,
    });
    return handle;
  }

  async terminate(handle: ProcessHandle): Promise<void> {
    if (!handle.exit) {
      handle.process.kill("SIGTERM");
      const exited = await this.waitForExit(handle, this.opts.killTimeoutMs ?? DEFAULT_KILL_TIMEOUT_MS);
      if (!exited) {
        handle.process.kill("SIGKILL");
        await handle.process.exited;
      }
    }
    await handle.bridge.stop();
    handle.transport.close();
  }

  async probe(handles: readonly ProcessHandle[]): Promise<ProbeResult[]> {
    return handles.map((handle) => {
      if (!handle.exit) return { state: "running" };
      return {
        state: "exited",
        exitCode: handle.exit.exitCode,
        ...(handle.exit.signal ? { error: `Worker process terminated by ${handle.exit.signal}` } : {}),
      };
    });
  }

  address(_handle: ProcessHandle, port: number): string {
    return `http://127.0.0.1:${port}`;
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private async awaitStartup(handle: ProcessHandle): Promise<void> {
    const timeoutMs = this.opts.startupTimeoutMs ?? DEFAULT_STARTUP_TIMEOUT_MS;
    const abort = new AbortController();
    try {
      const outcome = await Promise.race([
        handle.bridge.connected.then(() => "ready" as const),
        handle.process.exited,
        sleep(timeoutMs, abort.signal).then(() => "timeout" as const),
      ]);
      if (outcome === "ready") return;
      if (outcome === "timeout") {
        throw new ProvisioningError(
          `Worker process for ${handle.workName} did not report readiness within ${timeoutMs}ms`,
          handle.workName,
        );
      }
      throw new ProvisioningError(
        `Worker process for ${handle.workName} exited with code ${outcome.exitCode} before it became ready`,
        handle.workName,
      );
    } finally {
      abort.abort();
    }
  }

  private async waitForExit(handle: ProcessHandle, timeoutMs: number): Promise<boolean> {
    const abort = new AbortController();
    try {
      const outcome = await Promise.race([
        handle.process.exited.then(() => true),
        sleep(timeoutMs, abort.signal).then(() => false),
      ]);
      return outcome;
    } finally {
      abort.abort();
    }
  }
}

export function workerEnv(entrypoint: string, target: LaunchTarget): Record<string, string> {
  return {
    WORKMESH_WORK_NAME: target.work.name,
    WORKMESH_ENTRYPOINT: entrypoint,
    WORKMESH_QUEUE_ID: target.queueId,
    WORKMESH_EPOCH: String(target.epoch),
    WORKMESH_TRANSPORT: "ipc",
  };
}
