/**
 * QueueRegistry is the App-owned map from work name to that work's queues.
 * Purpose: replace process-wide queue globals with one explicit owner.
 * Assumptions: only the App mutates it (single writer), during registration/teardown.
 * Usage: registry.prepare(); registry.register("root.trainer").caller.push(...)
 */

import { OrchestratorError } from "../core/errors.js";
import type { RoleMessage } from "../protocol/messages.js";

import type { QueueHandle } from "./memory-queue.js";
import type { QueuingSystem } from "./queuing-system.js";

// =============================================================================
// TYPES
// =============================================================================

export type WorkQueueSet = {
  request: QueueHandle<RoleMessage["orchestrator-request"]>;
  response: QueueHandle<RoleMessage["orchestrator-response"]>;
  copyRequest: QueueHandle<RoleMessage["copy-request"]>;
  copyResponse: QueueHandle<RoleMessage["copy-response"]>;
  caller: QueueHandle<RoleMessage["caller"]>;
};

export type AppQueueSet = {
  delta: QueueHandle<RoleMessage["delta"]>;
  readiness: QueueHandle<RoleMessage["readiness"]>;
  error: QueueHandle<RoleMessage["error"]>;
  apiStatePublish: QueueHandle<RoleMessage["api-state-publish"]>;
  apiDelta: QueueHandle<RoleMessage["api-delta"]>;
};

// =============================================================================
// REGISTRY
// =============================================================================

export class QueueRegistry {
  private appQueues?: AppQueueSet;
  private readonly workQueues = new Map<string, WorkQueueSet>();

  constructor(
    public readonly queues: QueuingSystem,
    public readonly queueId: string,
  ) {}

  prepare(): AppQueueSet {
    const id = this.queueId;
    this.appQueues = {
      delta: this.queues.getDeltaQueue(id),
      readiness: this.queues.getReadinessQueue(id),
      error: this.queues.getErrorQueue(id),
      apiStatePublish: this.queues.getApiStatePublishQueue(id),
      apiDelta: this.queues.getApiDeltaQueue(id),
    };
    this.workQueues.clear();
    return this.appQueues;
  }

  get app(): AppQueueSet {
    if (!this.appQueues) {
      throw new OrchestratorError("Queue registry used before prepare()");
    }
    return this.appQueues;
  }

  register(workName: string): WorkQueueSet {
    const existing = this.workQueues.get(workName);
    if (existing) return existing;

    const id = this.queueId;
    const set: WorkQueueSet = {
      request: this.queues.getOrchestratorRequestQueue(id, workName),
      response: this.queues.getOrchestratorResponseQueue(id, workName),
      copyRequest: this.queues.getCopyRequestQueue(id, workName),
      copyResponse: this.queues.getCopyResponseQueue(id, workName),
      caller: this.queues.getCallerQueue(id, workName),
    };
    this.workQueues.set(workName, set);
    return set;
  }

  get(workName: string): WorkQueueSet | undefined {
    return this.workQueues.get(workName);
  }

  has(workName: string): boolean {
    return this.workQueues.has(workName);
  }

  workNames(): string[] {
    return [...this.workQueues.keys()];
  }

  /** Discards queued traffic of a stopped work; the queues stay registered. */
  drainWork(workName: string): number {
    const set = this.workQueues.get(workName);
    if (!set) return 0;
    return (
      set.caller.drain().length +
      set.request.drain().length +
      set.response.drain().length +
      set.copyRequest.drain().length +
      set.copyResponse.drain().length
    );
  }

  unregister(workName: string): void {
    if (!this.workQueues.delete(workName)) return;
    this.queues.discardWorkQueues(this.queueId, workName);
  }

  close(): void {
    this.workQueues.clear();
    this.appQueues = undefined;
    this.queues.closeAll();
  }
}
