import type { AppHost } from "../app/host.js";
import type { BackendKind } from "../core/config.js";
import type { WorkStatus } from "../work/status.js";
import type { AnyWork } from "../work/work.js";

// =============================================================================
// WORK MANAGER
// =============================================================================

/** Lifecycle handle for one work's execution context. */
export type WorkManager = {
  readonly workName: string;
  readonly status: WorkStatus;
  readonly lastError?: string;
  /** Incremented on every start; signals from older epochs are stale. */
  readonly epoch: number;
  /** True once the current epoch reported readiness. */
  readonly ready: boolean;
  start(): Promise<void>;
  kill(): Promise<void>;
  restart(): Promise<void>;
  isAlive(): boolean;
  /** Records readiness for `epoch`; false when the signal is stale. */
  markReady(epoch: number): boolean;
  /** Moves the work to "failed"; false when the signal is stale or the work is stopping. */
  fail(message: string, epoch?: number): boolean;
  onTransition(listener: (from: WorkStatus, to: WorkStatus) => void): void;
};

// =============================================================================
// BACKEND
// =============================================================================

/** Provisions, monitors and tears down execution contexts for works. */
export type Backend = {
  readonly kind: BackendKind;
  createWork(app: AppHost, work: AnyWork): Promise<void>;
  updateWorkStatuses(works: readonly AnyWork[]): Promise<void>;
  stopWork(app: AppHost, work: AnyWork): Promise<void>;
  stopAllWorks(works: readonly AnyWork[]): Promise<void>;
  resolveUrl(work: AnyWork, baseUrl?: string): string | undefined;
  getManager(workName: string): WorkManager | undefined;
  /** Forgets a stopped work so its name can be provisioned again from scratch. */
  releaseWork(workName: string): void;
};
