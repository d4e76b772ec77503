/**
 * StateSynchronizer owns the canonical state tree and applies deltas to it.
 * Purpose: keep every work's observed state current without one work clobbering another.
 * Assumptions: the tree is `{ works: { [name]: JsonObject } }`; deltas are applied per work
 * in id order within an epoch, and a newer epoch starts over from the work's initial state.
 * Usage: sync.addWork(work.name, work.initialState); sync.sync(); sync.snapshot();
 */

import { StaleDeltaError } from "../core/errors.js";
import { logOrchestratorEvent, type JsonlLogger } from "../core/logger.js";
import { cloneJson, isJsonObject, type JsonObject } from "../protocol/json.js";
import type { CopyResponse, Delta, DeltaOp } from "../protocol/messages.js";
import type { QueueRegistry } from "../queues/registry.js";

import { applyOps } from "./state-tree.js";

// =============================================================================
// TYPES
// =============================================================================

export type DeltaOutcome = "applied" | "duplicate" | "buffered" | "stale";

export type StateSynchronizerOptions = {
  registry: QueueRegistry;
  maxBufferedDeltas?: number;
  publishSnapshots?: boolean;
  logger?: JsonlLogger;
};

type WorkTrack = {
  initialState: JsonObject;
  epoch: number;
  lastApplied: number;
  buffer: Map<number, Delta>;
  copyRequestId?: number;
};

const DEFAULT_MAX_BUFFERED_DELTAS = 64;

// =============================================================================
// SYNCHRONIZER
// =============================================================================

export class StateSynchronizer {
  private readonly registry: QueueRegistry;
  private readonly maxBuffered: number;
  private readonly publishSnapshots: boolean;
  private readonly logger?: JsonlLogger;
  private readonly tree: JsonObject = { works: {} };
  private readonly tracks = new Map<string, WorkTrack>();
  private readonly stale: StaleDeltaError[] = [];
  private treeVersion = 0;
  private nextCopyRequestId = 0;

  constructor(opts: StateSynchronizerOptions) {
    this.registry = opts.registry;
    this.maxBuffered = opts.maxBufferedDeltas ?? DEFAULT_MAX_BUFFERED_DELTAS;
    this.publishSnapshots = opts.publishSnapshots ?? true;
    this.logger = opts.logger;
  }

  get version(): number {
    return this.treeVersion;
  }

  /** Stale deltas dropped so far, oldest first. */
  get staleDeltas(): readonly StaleDeltaError[] {
    return this.stale;
  }

  addWork(workName: string, initialState: JsonObject = {}): void {
    if (this.tracks.has(workName)) return;
    this.tracks.set(workName, {
      initialState: cloneJson(initialState),
      epoch: 0,
      lastApplied: 0,
      buffer: new Map(),
    });
    this.works[workName] = cloneJson(initialState);
    this.treeVersion += 1;
  }

  removeWork(workName: string): void {
    if (!this.tracks.delete(workName)) return;
    delete this.works[workName];
    this.treeVersion += 1;
  }

  snapshot(): JsonObject {
    return cloneJson(this.tree);
  }

  workState(workName: string): JsonObject | undefined {
    const state = this.works[workName];
    return isJsonObject(state) ? cloneJson(state) : undefined;
  }

  /** One non-blocking pass over deltas, copy responses and api deltas; returns the count applied. */
  sync(): number {
    const before = this.treeVersion;
    let applied = 0;
    const appQueues = this.registry.app;

    for (const delta of appQueues.delta.drain()) {
      if (this.applyDelta(delta) === "applied") applied += 1;
    }
    for (const workName of this.tracks.keys()) {
      const queues = this.registry.get(workName);
      if (!queues) continue;
      for (const response of queues.copyResponse.drain()) {
        this.applyCopy(response);
      }
    }
    for (const apiDelta of appQueues.apiDelta.drain()) {
      this.applyApiOps(apiDelta.ops);
    }

    if (this.publishSnapshots && this.treeVersion !== before) {
      appQueues.apiStatePublish.push({ version: this.treeVersion, state: this.snapshot() });
    }
    return applied;
  }

  // ---------------------------------------------------------------------------
  // Deltas
  // ---------------------------------------------------------------------------

  applyDelta(delta: Delta): DeltaOutcome {
    const track = this.tracks.get(delta.work_name);
    if (!track) {
      this.markStale(delta, "work is not registered");
      return "stale";
    }
    if (delta.epoch < track.epoch) {
      this.markStale(delta, `epoch ${delta.epoch} is older than current epoch ${track.epoch}`);
      return "stale";
    }
    if (delta.epoch > track.epoch) {
      this.beginEpoch(delta.work_name, track, delta.epoch);
    }

    if (delta.id <= track.lastApplied || track.buffer.has(delta.id)) {
      return "duplicate";
    }

    if (delta.id > track.lastApplied + 1) {
      track.buffer.set(delta.id, delta);
      if (track.buffer.size > this.maxBuffered && track.copyRequestId === undefined) {
        this.requestCopy(delta.work_name, track);
      }
      return "buffered";
    }

    this.commit(delta.work_name, track, delta);
    this.flush(delta.work_name, track);
    return "applied";
  }

  /**
   * Replaces a work's subtree with the copy it sent back. Only the answer to the
   * outstanding request is taken, and never one that is behind the deltas already applied.
   */
  applyCopy(response: CopyResponse): boolean {
    const track = this.tracks.get(response.work_name);
    if (!track || response.epoch < track.epoch || response.request_id !== track.copyRequestId) {
      this.ignoreCopy(response, "stale");
      return false;
    }
    if (response.epoch === track.epoch && response.last_delta_id < track.lastApplied) {
      track.copyRequestId = undefined;
      this.ignoreCopy(response, "behind");
      return false;
    }

    track.epoch = response.epoch;
    track.lastApplied = response.last_delta_id;
    track.copyRequestId = undefined;
    for (const id of [...track.buffer.keys()]) {
      if (id <= track.lastApplied) track.buffer.delete(id);
    }
    this.works[response.work_name] = cloneJson(response.state);
    this.treeVersion += 1;

    logOrchestratorEvent(this.logger, "state.copy.applied", {
      workName: response.work_name,
      epoch: response.epoch,
      last_delta_id: response.last_delta_id,
    });
    this.flush(response.work_name, track);
    return true;
  }

  /** Applies ops whose paths start at the tree root. */
  applyApiOps(ops: readonly DeltaOp[]): void {
    const rejected = applyOps(this.tree, ops);
    this.reportRejected(rejected);
    if (rejected.length < ops.length) this.treeVersion += 1;
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private get works(): JsonObject {
    const existing = this.tree.works;
    if (isJsonObject(existing)) return existing;
    const created: JsonObject = {};
    this.tree.works = created;
    return created;
  }

  private commit(workName: string, track: WorkTrack, delta: Delta): void {
    const rejected = applyOps(this.subtree(workName), delta.ops);
    this.reportRejected(rejected, delta);
    track.lastApplied = delta.id;
    this.treeVersion += 1;
  }

  private flush(workName: string, track: WorkTrack): void {
    let next = track.buffer.get(track.lastApplied + 1);
    while (next) {
      track.buffer.delete(next.id);
      this.commit(workName, track, next);
      next = track.buffer.get(track.lastApplied + 1);
    }
  }

  private beginEpoch(workName: string, track: WorkTrack, epoch: number): void {
    track.epoch = epoch;
    track.lastApplied = 0;
    track.buffer.clear();
    track.copyRequestId = undefined;
    this.works[workName] = cloneJson(track.initialState);
    this.treeVersion += 1;
    logOrchestratorEvent(this.logger, "state.epoch", { workName, epoch });
  }

  private subtree(workName: string): JsonObject {
    const existing = this.works[workName];
    if (isJsonObject(existing)) return existing;
    const created: JsonObject = {};
    this.works[workName] = created;
    return created;
  }

  private requestCopy(workName: string, track: WorkTrack): void {
    const queues = this.registry.get(workName);
    if (!queues) return;
    this.nextCopyRequestId += 1;
    track.copyRequestId = this.nextCopyRequestId;
    queues.copyRequest.push({ kind: "copy", request_id: track.copyRequestId });
    logOrchestratorEvent(this.logger, "state.copy.requested", {
      workName,
      request_id: track.copyRequestId,
      buffered: track.buffer.size,
      last_applied: track.lastApplied,
    });
  }

  private ignoreCopy(response: CopyResponse, reason: "stale" | "behind"): void {
    logOrchestratorEvent(this.logger, "state.copy.ignored", {
      workName: response.work_name,
      reason,
      request_id: response.request_id,
      epoch: response.epoch,
      last_delta_id: response.last_delta_id,
    });
  }

  private reportRejected(rejected: readonly DeltaOp[], delta?: Delta): void {
    for (const op of rejected) {
      logOrchestratorEvent(this.logger, "state.op.rejected", {
        ...(delta ? { workName: delta.work_name, delta_id: delta.id } : {}),
        level: "warn",
        op: op.op,
        path: [...op.path],
      });
    }
  }

  private markStale(delta: Delta, reason: string): void {
    const error = new StaleDeltaError(delta.work_name, delta.id, reason);
    this.stale.push(error);
    logOrchestratorEvent(this.logger, "state.delta.stale", {
      workName: delta.work_name,
      level: "warn",
      delta_id: delta.id,
      epoch: delta.epoch,
      message: error.message,
    });
  }
}
