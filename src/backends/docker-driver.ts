/**
 * DockerDriver runs each work in its own container.
 * Purpose: provision isolated execution contexts from the worker image.
 * Assumptions: the image runs the worker script with the stdio transport; the App definition
 * module's directory is mounted read-only at `entrypoint_dir`.
 */

import path from "node:path";

import type Docker from "dockerode";

import type { AppConfig } from "../core/config.js";
import { formatErrorMessage } from "../core/error-format.js";
import { DockerError, ProvisioningError } from "../core/errors.js";
import { logJsonLineOrRaw, logOrchestratorEvent, type JsonlLogger } from "../core/logger.js";
import { sleep } from "../core/utils.js";
import { dockerHint, type ContainerSpec } from "../docker/docker.js";
import { DockerManager, type ManagedContainerState } from "../docker/manager.js";
import { buildWorkContainerLabels, buildWorkContainerName } from "../docker/names.js";
import type { AttachedStream } from "../docker/streams.js";
import { LineTransport } from "../transport/line-transport.js";
import { QueueBridge } from "../transport/queue-bridge.js";
import { appSideRoutes } from "../transport/routes.js";

import type { ExecutionDriver, LaunchTarget, ProbeResult } from "./driver.js";
import { workerEnv } from "./process-driver.js";

// =============================================================================
// TYPES
// =============================================================================

export type DockerDriverOptions = {
  /** Host path of the module exporting the App definition. */
  entrypoint: string;
  docker: AppConfig["docker"];
  manager?: DockerManager;
  startupTimeoutMs?: number;
  logger?: JsonlLogger;
};

export type DockerHandle = {
  workName: string;
  queueId: string;
  containerId: string;
  containerName: string;
  container: Docker.Container;
  stream: AttachedStream;
  transport: LineTransport;
  bridge: QueueBridge;
  ip?: string;
};

const DEFAULT_STARTUP_TIMEOUT_MS = 60_000;
const RUNNING_STATES = new Set(["created", "running", "restarting", "paused"]);

// =============================================================================
// DRIVER
// =============================================================================

export class DockerDriver implements ExecutionDriver<DockerHandle> {
  readonly kind = "docker" as const;
  private readonly manager: DockerManager;

  constructor(private readonly opts: DockerDriverOptions) {
    this.manager = opts.manager ?? new DockerManager();
  }

  async launch(target: LaunchTarget): Promise<DockerHandle> {
    const workName = target.work.name;
    const logger = target.logger ?? this.opts.logger;
    const spec = this.buildSpec(target);

    let container: Docker.Container | undefined;
    let handle: DockerHandle | undefined;
    try {
      const image = this.opts.docker.image;
      if (!(await this.manager.imageExists(image))) {
        throw new DockerError(`Worker image ${image} was not found; build or pull it first`);
      }

      container = await this.manager.createContainer(spec);
      handle = await this.connect(container, spec.name, target, logger);
      await this.manager.startContainer(container);
      handle.ip = await this.manager.address(container);
      await this.awaitStartup(handle);

      logOrchestratorEvent(logger, "work.container.start", {
        workName,
        container_id: handle.containerId,
        container_name: handle.containerName,
        epoch: target.epoch,
      });
      return handle;
    } catch (err) {
      if (handle) {
        await handle.bridge.stop();
        handle.transport.close();
        handle.stream.detach();
      }
      if (container) {
        await this.discard(container, workName, logger);
      }
      if (err instanceof ProvisioningError) throw err;
      throw new ProvisioningError(
        `Failed to provision container for ${workName}: ${formatErrorMessage(err)}. ${dockerHint(err)}`,
        workName,
        err,
      );
    }
  }

  async terminate(handle: DockerHandle): Promise<void> {
    await handle.bridge.stop();
    handle.transport.close();
    handle.stream.detach();
    await this.manager.stopContainer(handle.container, this.opts.docker.stop_timeout_seconds);
    await this.manager.removeContainer(handle.container);
  }

  async probe(handles: readonly DockerHandle[]): Promise<ProbeResult[]> {
    if (handles.length === 0) return [];

    const byQueue = new Map<string, Map<string, ManagedContainerState>>();
    for (const queueId of new Set(handles.map((h) => h.queueId))) {
      const listed = await this.manager.listManagedContainers(queueId);
      byQueue.set(queueId, new Map(listed.map((c) => [c.id, c])));
    }

    return handles.map((handle) => {
      const info = byQueue.get(handle.queueId)?.get(handle.containerId);
      return info ? toProbeResult(info) : { state: "missing" };
    });
  }

  address(handle: DockerHandle, port: number): string | undefined {
    return handle.ip ? `http://${handle.ip}:${port}` : undefined;
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private buildSpec(target: LaunchTarget): ContainerSpec {
    const docker = this.opts.docker;
    const entryDir = docker.entrypoint_dir;
    const containerEntrypoint = path.posix.join(entryDir, path.basename(this.opts.entrypoint));

    return {
      name: buildWorkContainerName({
        queueId: target.queueId,
        workName: target.work.name,
        epoch: target.epoch,
      }),
      image: docker.image,
      env: {
        ...workerEnv(containerEntrypoint, target),
        WORKMESH_TRANSPORT: "stdio",
      },
      binds: [
        { hostPath: path.dirname(this.opts.entrypoint), containerPath: entryDir, mode: "ro" },
      ],
      workdir: entryDir,
      labels: buildWorkContainerLabels(target.queueId, target.work.name),
      cmd: ["node", docker.worker_script],
      user: docker.user,
      networkMode: docker.network_mode,
      openStdin: true,
      resources: docker.resources
        ? {
            memoryBytes:
              docker.resources.memory_mb !== undefined
                ? docker.resources.memory_mb * 1024 * 1024
                : undefined,
            cpuQuota: docker.resources.cpu_quota,
            cpuPeriod: docker.resources.cpu_period,
            pidsLimit: docker.resources.pids_limit,
          }
        : undefined,
    };
  }

  private async connect(
    container: Docker.Container,
    containerName: string,
    target: LaunchTarget,
    logger: JsonlLogger | undefined,
  ): Promise<DockerHandle> {
    const workName = target.work.name;
    let transport: LineTransport | undefined;

    const stream = await this.manager.attach(container, (line, source) => {
      if (source === "stdout" && transport?.acceptLine(line)) return;
      if (logger) logJsonLineOrRaw(logger, line, source, "work.log", workName);
    });

    transport = new LineTransport({ writeLine: (line) => stream.input.write(line) });
    const bridge = new QueueBridge({
      transport,
      ...appSideRoutes(target.queues, target.appQueues),
      logger,
      workName,
    });
    bridge.start();

    return {
      workName,
      queueId: target.queueId,
      containerId: container.id,
      containerName,
      container,
      stream,
      transport,
      bridge,
    };
  }

  private async awaitStartup(handle: DockerHandle): Promise<void> {
    const timeoutMs = this.opts.startupTimeoutMs ?? DEFAULT_STARTUP_TIMEOUT_MS;
    const abort = new AbortController();
    try {
      const outcome = await Promise.race([
        handle.bridge.connected.then(() => "ready" as const),
        handle.stream.completed.then(() => "exited" as const),
        sleep(timeoutMs, abort.signal).then(() => "timeout" as const),
      ]);
      if (outcome === "ready") return;
      throw new ProvisioningError(
        outcome === "exited"
          ? `Container ${handle.containerName} for ${handle.workName} exited before it became ready`
          : `Container ${handle.containerName} for ${handle.workName} did not report readiness within ${timeoutMs}ms`,
        handle.workName,
      );
    } finally {
      abort.abort();
    }
  }

  private async discard(
    container: Docker.Container,
    workName: string,
    logger: JsonlLogger | undefined,
  ): Promise<void> {
    try {
      await this.manager.removeContainer(container);
    } catch (err) {
      logOrchestratorEvent(logger, "work.container.cleanup.failed", {
        workName,
        message: formatErrorMessage(err),
      });
    }
  }
}

function toProbeResult(info: ManagedContainerState): ProbeResult {
  if (RUNNING_STATES.has(info.state)) return { state: "running" };
  const match = /Exited \((-?\d+)\)/.exec(info.status);
  const exitCode = match?.[1] !== undefined ? Number(match[1]) : 1;
  return {
    state: "exited",
    exitCode,
    ...(info.state === "dead" ? { error: `Container is dead: ${info.status}` } : {}),
  };
}
