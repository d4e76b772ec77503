/**
 * Run proxy: the caller-side stand-in for a work's run().
 * Purpose: turn each call into a sequenced request and match responses back by seq.
 * Assumptions: one ProxyRun per work; it is the only consumer of the work's response queue.
 * Usage: wrapRunMethod(app, work); await work.call({ batch: 5 });
 */

import type { AppHost } from "../app/host.js";
import {
  CallCancelledError,
  CallTimeoutError,
  ConfigurationError,
  RemoteExecutionError,
  WorkFailedError,
} from "../core/errors.js";
import { logOrchestratorEvent, type JsonlLogger } from "../core/logger.js";
import { createDeferred, isoNow, type Deferred } from "../core/utils.js";
import type { JsonValue } from "../protocol/json.js";
import type { CallResponse } from "../protocol/messages.js";
import type { WorkQueueSet } from "../queues/registry.js";
import type { Work, WorkEntry } from "../work/work.js";

import { PendingCall } from "./pending-call.js";

// =============================================================================
// TYPES
// =============================================================================

export type ProxyRunOptions<TArgs extends JsonValue[], TResult extends JsonValue> = {
  work: Work<TArgs, TResult>;
  queues: WorkQueueSet;
  /** Unset means calls wait until answered or cancelled. */
  timeoutMs?: number;
  /** Brings a stopped work back up before its next call is enqueued. */
  ensureRunning?: () => Promise<void>;
  logger?: JsonlLogger;
};

type PendingEntry<TResult> = {
  deferred: Deferred<TResult>;
  timer?: NodeJS.Timeout;
};

// =============================================================================
// PROXY
// =============================================================================

export class ProxyRun<TArgs extends JsonValue[], TResult extends JsonValue>
  implements WorkEntry<TArgs, TResult>
{
  readonly wrapped = true;

  private readonly work: Work<TArgs, TResult>;
  private readonly queues: WorkQueueSet;
  private readonly timeoutMs?: number;
  private readonly ensureRunning?: () => Promise<void>;
  private readonly logger?: JsonlLogger;
  private readonly pending = new Map<number, PendingEntry<TResult>>();
  private readonly abort = new AbortController();
  private nextSeq = 0;
  private pump?: Promise<void>;

  constructor(opts: ProxyRunOptions<TArgs, TResult>) {
    this.work = opts.work;
    this.queues = opts.queues;
    this.timeoutMs = opts.timeoutMs;
    this.ensureRunning = opts.ensureRunning;
    this.logger = opts.logger;
  }

  get inFlight(): number {
    return this.pending.size;
  }

  dispatch(args: TArgs): PendingCall<TResult> {
    const workName = this.work.name;
    if (this.work.status === "failed") {
      return PendingCall.rejected(workName, new WorkFailedError(workName, this.work.lastError));
    }
    if (this.work.status === "stopped" && this.ensureRunning) {
      const restart = this.ensureRunning;
      return PendingCall.adopt(
        workName,
        restart().then(() => this.enqueue(args)),
      );
    }
    return this.enqueue(args);
  }

  private enqueue(args: TArgs): PendingCall<TResult> {
    const workName = this.work.name;
    this.nextSeq += 1;
    const seq = this.nextSeq;
    const entry: PendingEntry<TResult> = { deferred: createDeferred<TResult>() };
    this.pending.set(seq, entry);

    if (this.timeoutMs !== undefined) {
      const timeoutMs = this.timeoutMs;
      entry.timer = setTimeout(() => {
        if (!this.pending.delete(seq)) return;
        logOrchestratorEvent(this.logger, "call.timeout", { workName, seq, timeout_ms: timeoutMs });
        entry.deferred.reject(new CallTimeoutError(workName, seq, timeoutMs));
      }, timeoutMs);
    }

    try {
      this.queues.caller.push({ kind: "call", seq, args, sent_at: isoNow() });
    } catch (err) {
      this.forget(seq);
      entry.deferred.reject(err);
      return new PendingCall(workName, seq, entry.deferred.promise);
    }

    this.ensurePump();
    return new PendingCall(workName, seq, entry.deferred.promise);
  }

  /** Rejects every waiting call; returns how many were cancelled. */
  cancelAll(reason: string): number {
    const workName = this.work.name;
    const waiting = [...this.pending.entries()];
    this.pending.clear();
    for (const [seq, entry] of waiting) {
      if (entry.timer) clearTimeout(entry.timer);
      entry.deferred.reject(new CallCancelledError(workName, seq, reason));
    }
    if (waiting.length > 0) {
      logOrchestratorEvent(this.logger, "call.cancelled", {
        workName,
        count: waiting.length,
        reason,
      });
    }
    return waiting.length;
  }

  async close(): Promise<void> {
    this.abort.abort();
    this.cancelAll("proxy closed");
    await this.pump;
  }

  // ---------------------------------------------------------------------------
  // Response matching
  // ---------------------------------------------------------------------------

  private ensurePump(): void {
    if (this.pump) return;
    this.pump = this.readResponses();
  }

  private async readResponses(): Promise<void> {
    const signal = this.abort.signal;
    while (!signal.aborted) {
      const response = await this.queues.response.pop(undefined, signal);
      if (!response) break;
      this.settle(response);
    }
  }

  private settle(response: CallResponse): void {
    const entry = this.pending.get(response.seq);
    if (!entry) {
      // Late answers to timed-out or cancelled calls.
      logOrchestratorEvent(this.logger, "call.response.unmatched", {
        workName: this.work.name,
        seq: response.seq,
      });
      return;
    }

    this.forget(response.seq);
    if (response.ok) {
      entry.deferred.resolve(decodeResult<TResult>(response.value));
    } else {
      entry.deferred.reject(new RemoteExecutionError(this.work.name, response.seq, response.error));
    }
  }

  private forget(seq: number): void {
    const entry = this.pending.get(seq);
    if (entry?.timer) clearTimeout(entry.timer);
    this.pending.delete(seq);
  }
}

// Results cross a serialization boundary; the work's declared result type is trusted.
function decodeResult<TResult extends JsonValue>(value: JsonValue): TResult {
  return value as TResult;
}

// =============================================================================
// DYNAMIC BINDING
// =============================================================================

/**
 * Replaces the work's entry point with one that binds on first call: it registers the
 * work's queues, asks the backend for an execution context and installs a ProxyRun.
 * Wrapping an already wrapped work is a no-op.
 */
export function wrapRunMethod<TArgs extends JsonValue[], TResult extends JsonValue>(
  app: AppHost,
  work: Work<TArgs, TResult>,
): void {
  if (work.entryPoint.wrapped) return;

  let binding: Promise<ProxyRun<TArgs, TResult>> | undefined;
  const bind = (): Promise<ProxyRun<TArgs, TResult>> => {
    if (!binding) {
      const attempt = bindProxy(app, work);
      binding = attempt;
      void attempt.catch(() => {
        if (binding === attempt) binding = undefined;
      });
    }
    return binding;
  };

  work.useEntryPoint({
    wrapped: true,
    dispatch: (args) => {
      if (!work.name) {
        return PendingCall.rejected(
          work.name,
          new ConfigurationError(
            `Failed to create execution context for ${work.constructor.name}. ` +
              "The work was never attached to a parent Flow; attach it before calling it.",
          ),
        );
      }
      if (work.status === "failed") {
        return PendingCall.rejected(work.name, new WorkFailedError(work.name, work.lastError));
      }
      return PendingCall.adopt(
        work.name,
        bind().then((proxy) => proxy.dispatch(args)),
      );
    },
  });
}

async function bindProxy<TArgs extends JsonValue[], TResult extends JsonValue>(
  app: AppHost,
  work: Work<TArgs, TResult>,
): Promise<ProxyRun<TArgs, TResult>> {
  const queues = app.registry.register(work.name);
  await app.backend.createWork(app, work);

  const proxy = new ProxyRun<TArgs, TResult>({
    work,
    queues,
    timeoutMs: app.callTimeoutMs,
    ensureRunning: () => app.backend.createWork(app, work),
    logger: app.logger,
  });
  work.useEntryPoint(proxy);
  app.registerProxy(work.name, proxy);
  logOrchestratorEvent(app.logger, "proxy.bound", { workName: work.name, backend: app.backend.kind });
  return proxy;
}
