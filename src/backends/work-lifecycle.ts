/**
 * WorkLifecycle is the per-work state machine behind WorkManager.
 * Purpose: start, kill and restart one execution context with serialized transitions.
 * Assumptions: operations on one work never interleave; kill() always ends in "stopped".
 * Usage: const manager = new WorkLifecycle({ work, driver, queueId, queues, appQueues });
 */

import { formatErrorMessage } from "../core/error-format.js";
import { OrchestratorError, ProvisioningError } from "../core/errors.js";
import { logOrchestratorEvent, type JsonlLogger } from "../core/logger.js";
import type { AppQueueSet, QueueRegistry, WorkQueueSet } from "../queues/registry.js";
import { canTransition, type WorkStatus } from "../work/status.js";
import type { AnyWork } from "../work/work.js";

import type { WorkManager } from "./backend.js";
import type { ExecutionDriver, ProbeResult } from "./driver.js";

// =============================================================================
// TYPES
// =============================================================================

export type WorkLifecycleOptions<H> = {
  work: AnyWork;
  driver: ExecutionDriver<H>;
  queueId: string;
  queues: WorkQueueSet;
  appQueues: AppQueueSet;
  registry?: QueueRegistry;
  logger?: JsonlLogger;
};

export type TransitionListener = (from: WorkStatus, to: WorkStatus) => void;

// =============================================================================
// LIFECYCLE
// =============================================================================

export class WorkLifecycle<H> implements WorkManager {
  private readonly work: AnyWork;
  private readonly driver: ExecutionDriver<H>;
  private readonly opts: WorkLifecycleOptions<H>;
  private readonly listeners: TransitionListener[] = [];
  private handle?: H;
  private currentEpoch = 0;
  private isReady = false;
  private chain: Promise<void> = Promise.resolve();

  constructor(opts: WorkLifecycleOptions<H>) {
    this.opts = opts;
    this.work = opts.work;
    this.driver = opts.driver;
  }

  get workName(): string {
    return this.work.name;
  }

  get status(): WorkStatus {
    return this.work.status;
  }

  get lastError(): string | undefined {
    return this.work.lastError;
  }

  get epoch(): number {
    return this.currentEpoch;
  }

  get ready(): boolean {
    return this.isReady;
  }

  get activeHandle(): H | undefined {
    return this.handle;
  }

  isAlive(): boolean {
    return this.work.status === "running";
  }

  onTransition(listener: TransitionListener): void {
    this.listeners.push(listener);
  }

  start(): Promise<void> {
    return this.serialize(async () => {
      if (this.work.status === "running") return;
      await this.launch();
    });
  }

  kill(): Promise<void> {
    return this.serialize(async () => {
      if (this.work.status === "stopped") return;
      this.transition("stopping");
      await this.teardown();
      this.transition("stopped");
    });
  }

  restart(): Promise<void> {
    return this.serialize(async () => {
      this.transition("restarting");
      await this.teardown();
      await this.launch();
    });
  }

  /** Records readiness for `epoch`; false when the signal is stale. */
  markReady(epoch: number): boolean {
    const status = this.work.status;
    if (epoch !== this.currentEpoch) return false;
    // Out-of-process workers report readiness before launch() returns.
    if (status !== "running" && status !== "starting") return false;
    if (!this.isReady) {
      this.isReady = true;
      logOrchestratorEvent(this.opts.logger, "work.ready", { workName: this.workName, epoch });
    }
    return true;
  }

  /**
   * Moves the work to "failed" and releases its context. A signal carrying an older epoch,
   * or one arriving while the work is stopping or stopped, is ignored.
   */
  fail(message: string, epoch?: number): boolean {
    if (epoch !== undefined && epoch !== this.currentEpoch) return false;
    if (!canTransition(this.work.status, "failed")) return false;

    this.work.lastError = message;
    this.transition("failed");
    logOrchestratorEvent(this.opts.logger, "work.failed", {
      workName: this.workName,
      epoch: this.currentEpoch,
      message,
    });
    void this.serialize(() => this.teardown());
    return true;
  }

  /** Applies the driver's view of a running context. */
  observeExit(result: ProbeResult): void {
    if (this.work.status !== "running") return;
    if (result.state === "running") return;

    if (result.state === "missing") {
      this.fail(`Execution context of ${this.workName} disappeared`);
      return;
    }
    if (result.exitCode !== 0 || result.error) {
      this.fail(result.error ?? `Execution context of ${this.workName} exited with code ${result.exitCode}`);
      return;
    }

    this.transition("stopped");
    void this.serialize(() => this.teardown());
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private async launch(): Promise<void> {
    this.transition("starting");
    this.currentEpoch += 1;
    this.isReady = false;
    this.work.lastError = undefined;

    try {
      this.handle = await this.driver.launch({
        work: this.work,
        queueId: this.opts.queueId,
        epoch: this.currentEpoch,
        queues: this.opts.queues,
        appQueues: this.opts.appQueues,
        logger: this.opts.logger,
      });
    } catch (err) {
      const error =
        err instanceof ProvisioningError
          ? err
          : new ProvisioningError(
              `Failed to provision ${this.driver.kind} context for ${this.workName}: ${formatErrorMessage(err)}`,
              this.workName,
              err,
            );
      this.work.lastError = error.message;
      this.transition("failed");
      logOrchestratorEvent(this.opts.logger, "work.provision.failed", {
        workName: this.workName,
        backend: this.driver.kind,
        message: error.message,
      });
      throw error;
    }

    // An error signal for this epoch can land while the driver waits for readiness.
    if (this.work.status === "failed") {
      const error = new ProvisioningError(
        `Work ${this.workName} failed while starting: ${this.work.lastError ?? "unknown error"}`,
        this.workName,
      );
      logOrchestratorEvent(this.opts.logger, "work.provision.failed", {
        workName: this.workName,
        backend: this.driver.kind,
        message: error.message,
      });
      throw error;
    }

    this.transition("running");
    logOrchestratorEvent(this.opts.logger, "work.start", {
      workName: this.workName,
      backend: this.driver.kind,
      epoch: this.currentEpoch,
    });
  }

  private async teardown(): Promise<void> {
    const handle = this.handle;
    this.handle = undefined;
    this.isReady = false;

    if (handle !== undefined) {
      try {
        await this.driver.terminate(handle);
      } catch (err) {
        logOrchestratorEvent(this.opts.logger, "work.terminate.failed", {
          workName: this.workName,
          message: formatErrorMessage(err),
        });
      }
    }

    const drained = this.opts.registry?.drainWork(this.workName) ?? 0;
    if (drained > 0) {
      logOrchestratorEvent(this.opts.logger, "work.queues.drained", {
        workName: this.workName,
        count: drained,
      });
    }
  }

  private transition(to: WorkStatus): void {
    const from = this.work.status;
    if (from === to) return;
    if (!canTransition(from, to)) {
      throw new OrchestratorError(`Illegal status change for ${this.workName}: ${from} -> ${to}`);
    }
    this.work.status = to;
    for (const listener of this.listeners) {
      listener(from, to);
    }
  }

  private serialize(op: () => Promise<void>): Promise<void> {
    const next = this.chain.then(op);
    this.chain = next.catch(() => undefined);
    return next;
  }
}
