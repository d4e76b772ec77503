import { fileURLToPath } from "node:url";

import type { AppConfig } from "../core/config.js";
import { ConfigurationError } from "../core/errors.js";
import type { JsonlLogger } from "../core/logger.js";
import type { DockerManager } from "../docker/manager.js";

import type { Backend } from "./backend.js";
import { DockerDriver } from "./docker-driver.js";
import { LocalDriver } from "./local-driver.js";
import { ProcessDriver } from "./process-driver.js";
import type { ProcessSpawner } from "./process-spawner.js";
import { WorkBackend } from "./work-backend.js";

export type { Backend, WorkManager } from "./backend.js";
export type { ExecutionDriver, LaunchTarget, ProbeResult } from "./driver.js";
export { WorkBackend } from "./work-backend.js";
export { WorkLifecycle } from "./work-lifecycle.js";

export type CreateBackendOptions = {
  config: AppConfig;
  /** Module exporting the App definition; required by process and docker backends. */
  entrypoint?: string;
  logger?: JsonlLogger;
  spawner?: ProcessSpawner;
  dockerManager?: DockerManager;
};

export function defaultWorkerScript(): string {
  return fileURLToPath(new URL("../../worker/index.js", import.meta.url));
}

export function createBackend(opts: CreateBackendOptions): Backend {
  const { config, logger } = opts;
  switch (config.backend.type) {
    case "local":
      return new WorkBackend(new LocalDriver(), logger);
    case "process":
      return new WorkBackend(
        new ProcessDriver({
          entrypoint: requireEntrypoint(opts, "process"),
          workerScript: config.process.worker_script ?? defaultWorkerScript(),
          nodeOptions: config.process.node_options,
          killTimeoutMs: config.process.kill_timeout_ms,
          spawner: opts.spawner,
          logger,
        }),
        logger,
      );
    case "docker":
      return new WorkBackend(
        new DockerDriver({
          entrypoint: requireEntrypoint(opts, "docker"),
          docker: config.docker,
          manager: opts.dockerManager,
          logger,
        }),
        logger,
      );
  }
}

function requireEntrypoint(opts: CreateBackendOptions, kind: string): string {
  if (!opts.entrypoint) {
    throw new ConfigurationError(
      `The ${kind} backend needs the App definition module path to start workers`,
    );
  }
  return opts.entrypoint;
}
