/**
 * WorkRuntime serves one work inside its execution context.
 * Purpose: turn queued call requests into run() invocations, and state changes into deltas.
 * Assumptions: calls execute one at a time in arrival order; deltas are pushed before the
 * response of the call that produced them.
 * Usage: const runtime = new WorkRuntime({ work, epoch, queues, appQueues }); runtime.start();
 */

import { formatErrorMessage, serializeError } from "../core/error-format.js";
import { QueueClosedError } from "../core/errors.js";
import { logOrchestratorEvent, type JsonlLogger } from "../core/logger.js";
import { isoNow } from "../core/utils.js";
import { JsonValueSchema, type JsonValue } from "../protocol/json.js";
import type {
  CallRequest,
  CallResponse,
  CopyRequest,
  DeltaOp,
  RemoteErrorInfo,
} from "../protocol/messages.js";
import type { QueueHandle } from "../queues/memory-queue.js";
import type { AppQueueSet, WorkQueueSet } from "../queues/registry.js";
import type { AnyWork, StateEmitter } from "../work/work.js";

// =============================================================================
// TYPES
// =============================================================================

export type RuntimeState = "idle" | "running" | "stopped" | "crashed";

export type WorkRuntimeOptions = {
  work: AnyWork;
  epoch: number;
  queues: WorkQueueSet;
  appQueues: AppQueueSet;
  logger?: JsonlLogger;
};

// =============================================================================
// RUNTIME
// =============================================================================

export class WorkRuntime {
  private readonly work: AnyWork;
  private readonly epoch: number;
  private readonly queues: WorkQueueSet;
  private readonly appQueues: AppQueueSet;
  private readonly logger?: JsonlLogger;
  private readonly abort = new AbortController();
  private runtimeState: RuntimeState = "idle";
  private lastDeltaId = 0;
  private crashError?: RemoteErrorInfo;
  private loops: Promise<void> = Promise.resolve();

  constructor(opts: WorkRuntimeOptions) {
    this.work = opts.work;
    this.epoch = opts.epoch;
    this.queues = opts.queues;
    this.appQueues = opts.appQueues;
    this.logger = opts.logger;
  }

  get state(): RuntimeState {
    return this.runtimeState;
  }

  get failure(): RemoteErrorInfo | undefined {
    return this.crashError;
  }

  /** Resolves once every serving loop has exited. */
  get done(): Promise<void> {
    return this.loops;
  }

  start(): void {
    if (this.runtimeState !== "idle") return;
    this.runtimeState = "running";

    this.work.resetState();
    this.work.bindStateEmitter(this.createEmitter());

    this.appQueues.readiness.push({
      work_name: this.work.name,
      epoch: this.epoch,
      at: isoNow(),
    });
    logOrchestratorEvent(this.logger, "runtime.start", {
      workName: this.work.name,
      epoch: this.epoch,
    });

    this.loops = Promise.all([
      this.guard(this.serveCalls()),
      this.guard(this.serveCopies()),
      this.guard(this.serveControl()),
    ]).then(() => this.finish());
  }

  async stop(): Promise<void> {
    this.abort.abort();
    await this.loops;
  }

  // ---------------------------------------------------------------------------
  // Loops
  // ---------------------------------------------------------------------------

  private async serveCalls(): Promise<void> {
    const signal = this.abort.signal;
    while (!signal.aborted) {
      const request = await this.queues.caller.pop(undefined, signal);
      if (!request) break;
      const response = await this.execute(request);
      this.pushOrStop(this.queues.response, response);
    }
  }

  private async serveCopies(): Promise<void> {
    const signal = this.abort.signal;
    while (!signal.aborted) {
      const request = await this.queues.copyRequest.pop(undefined, signal);
      if (!request) break;
      this.answerCopy(request);
    }
  }

  private async serveControl(): Promise<void> {
    const signal = this.abort.signal;
    while (!signal.aborted) {
      const message = await this.queues.request.pop(undefined, signal);
      if (!message) break;
      if (message.kind === "stop") {
        logOrchestratorEvent(this.logger, "runtime.stop.requested", {
          workName: this.work.name,
          ...(message.reason ? { reason: message.reason } : {}),
        });
        this.abort.abort();
      }
    }
  }

  // ---------------------------------------------------------------------------
  // Execution
  // ---------------------------------------------------------------------------

  private async execute(request: CallRequest): Promise<CallResponse> {
    try {
      const value: JsonValue = await this.work.run(...request.args);
      const checked = JsonValueSchema.safeParse(value);
      if (!checked.success) {
        return {
          kind: "result",
          seq: request.seq,
          ok: false,
          error: {
            name: "SerializationError",
            message: `Result of ${this.work.name} call ${request.seq} is not a JSON value`,
          },
        };
      }
      return { kind: "result", seq: request.seq, ok: true, value: checked.data };
    } catch (err) {
      return { kind: "result", seq: request.seq, ok: false, error: serializeError(err) };
    }
  }

  private answerCopy(request: CopyRequest): void {
    this.pushOrStop(this.queues.copyResponse, {
      kind: "copy",
      request_id: request.request_id,
      work_name: this.work.name,
      epoch: this.epoch,
      last_delta_id: this.lastDeltaId,
      state: this.work.currentState(),
    });
  }

  private createEmitter(): StateEmitter {
    return {
      set: (path, value) => this.emitDelta({ op: "set", path, value }),
      delete: (path) => this.emitDelta({ op: "delete", path }),
    };
  }

  private emitDelta(op: DeltaOp): void {
    this.lastDeltaId += 1;
    this.appQueues.delta.push({
      work_name: this.work.name,
      epoch: this.epoch,
      id: this.lastDeltaId,
      ops: [op],
      emitted_at: isoNow(),
    });
  }

  // ---------------------------------------------------------------------------
  // Failure handling
  // ---------------------------------------------------------------------------

  private pushOrStop<T>(queue: QueueHandle<T>, message: T): void {
    try {
      queue.push(message);
    } catch (err) {
      if (err instanceof QueueClosedError) {
        this.abort.abort();
        return;
      }
      throw err;
    }
  }

  private guard(loop: Promise<void>): Promise<void> {
    return loop.catch((err: unknown) => this.crash(err));
  }

  private crash(err: unknown): void {
    if (this.runtimeState === "crashed") return;
    this.runtimeState = "crashed";
    this.crashError = serializeError(err);
    this.abort.abort();

    logOrchestratorEvent(this.logger, "runtime.crash", {
      workName: this.work.name,
      epoch: this.epoch,
      message: formatErrorMessage(err),
    });

    try {
      this.appQueues.error.push({
        work_name: this.work.name,
        epoch: this.epoch,
        error: this.crashError,
        at: isoNow(),
      });
    } catch (pushErr) {
      logOrchestratorEvent(this.logger, "runtime.crash.unreported", {
        workName: this.work.name,
        message: formatErrorMessage(pushErr),
      });
    }
  }

  private finish(): void {
    this.work.bindStateEmitter(undefined);
    if (this.runtimeState === "running") {
      this.runtimeState = "stopped";
    }
    logOrchestratorEvent(this.logger, "runtime.exit", {
      workName: this.work.name,
      epoch: this.epoch,
      state: this.runtimeState,
    });
  }
}
