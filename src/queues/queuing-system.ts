/**
 * QueuingSystem resolves the named channels of the queue fabric.
 * Purpose: one handle per (queueId, role, workName) identity, typed by role.
 * Assumptions: per-work roles require a work name; app-wide roles ignore it.
 * Usage: queues.getCallerQueue(queueId, "root.trainer").push(request)
 */

import { ConfigurationError } from "../core/errors.js";
import {
  QUEUE_ROLES,
  isWorkScopedRole,
  type QueueRole,
  type RoleMessage,
} from "../protocol/messages.js";

import { MemoryQueue, type QueueHandle } from "./memory-queue.js";

// =============================================================================
// TYPES
// =============================================================================

export type QueuingSystem = {
  getQueue<R extends QueueRole>(
    role: R,
    queueId: string,
    workName?: string,
  ): QueueHandle<RoleMessage[R]>;
  getCallerQueue(queueId: string, workName: string): QueueHandle<RoleMessage["caller"]>;
  getOrchestratorRequestQueue(
    queueId: string,
    workName: string,
  ): QueueHandle<RoleMessage["orchestrator-request"]>;
  getOrchestratorResponseQueue(
    queueId: string,
    workName: string,
  ): QueueHandle<RoleMessage["orchestrator-response"]>;
  getCopyRequestQueue(queueId: string, workName: string): QueueHandle<RoleMessage["copy-request"]>;
  getCopyResponseQueue(
    queueId: string,
    workName: string,
  ): QueueHandle<RoleMessage["copy-response"]>;
  getDeltaQueue(queueId: string): QueueHandle<RoleMessage["delta"]>;
  getReadinessQueue(queueId: string): QueueHandle<RoleMessage["readiness"]>;
  getErrorQueue(queueId: string): QueueHandle<RoleMessage["error"]>;
  getApiStatePublishQueue(queueId: string): QueueHandle<RoleMessage["api-state-publish"]>;
  getApiDeltaQueue(queueId: string): QueueHandle<RoleMessage["api-delta"]>;
  /** Closes and forgets every queue of one work. */
  discardWorkQueues(queueId: string, workName: string): void;
  closeAll(): void;
};

type QueueBuckets = { [R in QueueRole]: Map<string, MemoryQueue<RoleMessage[R]>> };

// =============================================================================
// NAMING
// =============================================================================

export function queueName(role: QueueRole, queueId: string, workName?: string): string {
  if (isWorkScopedRole(role)) {
    if (!workName) {
      throw new ConfigurationError(`Queue role ${role} requires a work name`);
    }
    return `${queueId}:${role}:${workName}`;
  }
  return `${queueId}:${role}`;
}

// =============================================================================
// IN-MEMORY FABRIC
// =============================================================================

export class MemoryQueuingSystem implements QueuingSystem {
  private readonly buckets: QueueBuckets = {
    caller: new Map(),
    "orchestrator-request": new Map(),
    "orchestrator-response": new Map(),
    "copy-request": new Map(),
    "copy-response": new Map(),
    delta: new Map(),
    readiness: new Map(),
    error: new Map(),
    "api-state-publish": new Map(),
    "api-delta": new Map(),
  };

  getQueue<R extends QueueRole>(
    role: R,
    queueId: string,
    workName?: string,
  ): QueueHandle<RoleMessage[R]> {
    const name = queueName(role, queueId, workName);
    const bucket: QueueBuckets[R] = this.buckets[role];
    const existing = bucket.get(name);
    if (existing && !existing.closed) return existing;

    const created = new MemoryQueue<RoleMessage[R]>(name);
    bucket.set(name, created);
    return created;
  }

  getCallerQueue(queueId: string, workName: string): QueueHandle<RoleMessage["caller"]> {
    return this.getQueue("caller", queueId, workName);
  }

  getOrchestratorRequestQueue(
    queueId: string,
    workName: string,
  ): QueueHandle<RoleMessage["orchestrator-request"]> {
    return this.getQueue("orchestrator-request", queueId, workName);
  }

  getOrchestratorResponseQueue(
    queueId: string,
    workName: string,
  ): QueueHandle<RoleMessage["orchestrator-response"]> {
    return this.getQueue("orchestrator-response", queueId, workName);
  }

  getCopyRequestQueue(queueId: string, workName: string): QueueHandle<RoleMessage["copy-request"]> {
    return this.getQueue("copy-request", queueId, workName);
  }

  getCopyResponseQueue(
    queueId: string,
    workName: string,
  ): QueueHandle<RoleMessage["copy-response"]> {
    return this.getQueue("copy-response", queueId, workName);
  }

  getDeltaQueue(queueId: string): QueueHandle<RoleMessage["delta"]> {
    return this.getQueue("delta", queueId);
  }

  getReadinessQueue(queueId: string): QueueHandle<RoleMessage["readiness"]> {
    return this.getQueue("readiness", queueId);
  }

  getErrorQueue(queueId: string): QueueHandle<RoleMessage["error"]> {
    return this.getQueue("error", queueId);
  }

  getApiStatePublishQueue(queueId: string): QueueHandle<RoleMessage["api-state-publish"]> {
    return this.getQueue("api-state-publish", queueId);
  }

  getApiDeltaQueue(queueId: string): QueueHandle<RoleMessage["api-delta"]> {
    return this.getQueue("api-delta", queueId);
  }

  discardWorkQueues(queueId: string, workName: string): void {
    for (const role of QUEUE_ROLES) {
      if (!isWorkScopedRole(role)) continue;
      const name = queueName(role, queueId, workName);
      const bucket = this.buckets[role];
      bucket.get(name)?.close();
      bucket.delete(name);
    }
  }

  closeAll(): void {
    for (const role of QUEUE_ROLES) {
      const bucket = this.buckets[role];
      for (const queue of bucket.values()) {
        queue.close();
      }
      bucket.clear();
    }
  }
}
