import type { BackendKind } from "../core/config.js";
import type { JsonlLogger } from "../core/logger.js";
import type { AppQueueSet, WorkQueueSet } from "../queues/registry.js";
import type { AnyWork } from "../work/work.js";

// =============================================================================
// TYPES
// =============================================================================

export type LaunchTarget = {
  work: AnyWork;
  queueId: string;
  epoch: number;
  queues: WorkQueueSet;
  appQueues: AppQueueSet;
  logger?: JsonlLogger;
};

export type ProbeResult =
  | { state: "running" }
  | { state: "exited"; exitCode: number; error?: string }
  | { state: "missing" };

/**
 * The environment-specific half of a backend.
 * launch() throws ProvisioningError; terminate() treats an already gone context as stopped.
 */
export type ExecutionDriver<H> = {
  readonly kind: BackendKind;
  launch(target: LaunchTarget): Promise<H>;
  terminate(handle: H): Promise<void>;
  /** One result per handle, in the same order. */
  probe(handles: readonly H[]): Promise<ProbeResult[]>;
  address(handle: H, port: number): string | undefined;
};
