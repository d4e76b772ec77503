/**
 * App is the root coordinator of a work tree.
 * Purpose: own the queue registry, the backend, the state synchronizer and the lifecycle
 * monitor, and drive them from one polling loop.
 * Assumptions: works are named by the root Flow before the App is constructed; the App is
 * the only writer of the queue registry.
 * Usage:
 *   const app = new App({ root, config });
 *   app.start();
 *   await trainer.call({ batch: 5 });
 *   await app.shutdown();
 */

import type { Backend, WorkManager } from "../backends/backend.js";
import { createBackend } from "../backends/index.js";
import type { ProcessSpawner } from "../backends/process-spawner.js";
import { parseAppConfig, type AppConfig } from "../core/config.js";
import { formatErrorMessage } from "../core/error-format.js";
import { ConfigurationError } from "../core/errors.js";
import { JsonlLogger, logOrchestratorEvent } from "../core/logger.js";
import { defaultLogsDir, orchestratorLogPath } from "../core/paths.js";
import { defaultQueueId } from "../core/utils.js";
import type { JsonObject } from "../protocol/json.js";
import { wrapRunMethod } from "../proxy/run-proxy.js";
import { MemoryQueuingSystem, type QueuingSystem } from "../queues/queuing-system.js";
import { QueueRegistry } from "../queues/registry.js";
import { StateSynchronizer } from "../state/state-synchronizer.js";
import type { Flow } from "../work/flow.js";
import type { WorkStatus } from "../work/status.js";
import type { AnyWork } from "../work/work.js";

import type { AppHost, CallCanceller } from "./host.js";
import { LifecycleMonitor } from "./lifecycle-monitor.js";
import { PollingLoop } from "./polling-loop.js";

// =============================================================================
// TYPES
// =============================================================================

export type AppOptions = {
  root: Flow;
  config?: AppConfig;
  /** Module exporting the App definition; needed by the process and docker backends. */
  entrypoint?: string;
  queueId?: string;
  queues?: QueuingSystem;
  backend?: Backend;
  spawner?: ProcessSpawner;
  logger?: JsonlLogger;
};

const CANCELLING_STATUSES: ReadonlySet<WorkStatus> = new Set([
  "stopping",
  "stopped",
  "restarting",
  "failed",
]);

// =============================================================================
// APP
// =============================================================================

export class App implements AppHost {
  readonly queueId: string;
  readonly config: AppConfig;
  readonly registry: QueueRegistry;
  readonly backend: Backend;
  readonly logger: JsonlLogger;
  readonly synchronizer: StateSynchronizer;
  readonly callTimeoutMs?: number;

  private readonly monitor: LifecycleMonitor;
  private readonly loop: PollingLoop;
  private readonly workMap = new Map<string, AnyWork>();
  private readonly proxies = new Map<string, CallCanceller>();
  private readonly watched = new Set<string>();
  private shutdownPromise?: Promise<void>;

  constructor(opts: AppOptions) {
    this.config = opts.config ?? parseAppConfig({});
    this.queueId = opts.queueId ?? this.config.queue_id ?? defaultQueueId();
    this.callTimeoutMs = this.config.call.timeout_ms;
    this.logger =
      opts.logger ??
      new JsonlLogger(orchestratorLogPath(this.config.logs_dir ?? defaultLogsDir(), this.queueId), {
        queueId: this.queueId,
      });

    this.registry = new QueueRegistry(opts.queues ?? new MemoryQueuingSystem(), this.queueId);
    this.registry.prepare();

    this.backend =
      opts.backend ??
      createBackend({
        config: this.config,
        entrypoint: opts.entrypoint,
        logger: this.logger,
        spawner: opts.spawner,
      });
    this.synchronizer = new StateSynchronizer({
      registry: this.registry,
      maxBufferedDeltas: this.config.state.max_buffered_deltas,
      publishSnapshots: this.config.state.publish_snapshots,
      logger: this.logger,
    });
    this.monitor = new LifecycleMonitor(this.registry, this.backend, this.logger);
    this.loop = new PollingLoop(this.config.poll_interval_ms, () => this.tick());

    for (const work of opts.root.works()) {
      this.attach(work);
    }

    logOrchestratorEvent(this.logger, "app.init", {
      backend: this.backend.kind,
      works: [...this.workMap.keys()],
    });
  }

  get works(): AnyWork[] {
    return [...this.workMap.values()];
  }

  /** Deep copy of the canonical state tree. */
  get state(): JsonObject {
    return this.synchronizer.snapshot();
  }

  work(name: string): AnyWork | undefined {
    return this.workMap.get(name);
  }

  manager(name: string): WorkManager | undefined {
    return this.backend.getManager(name);
  }

  start(): void {
    this.loop.start();
    logOrchestratorEvent(this.logger, "app.start", { poll_interval_ms: this.config.poll_interval_ms });
  }

  /** One scheduling pass: lifecycle signals, state deltas, then backend status probes. */
  async tick(): Promise<void> {
    await this.phase("monitor", () => {
      this.monitor.poll();
    });
    await this.phase("sync", () => {
      this.synchronizer.sync();
    });
    await this.phase("probe", () => this.backend.updateWorkStatuses(this.works));
  }

  registerProxy(workName: string, proxy: CallCanceller): void {
    this.proxies.set(workName, proxy);
    if (this.watched.has(workName)) return;

    const manager = this.backend.getManager(workName);
    if (!manager) return;
    this.watched.add(workName);
    manager.onTransition((_from, to) => {
      if (!CANCELLING_STATUSES.has(to)) return;
      this.proxies.get(workName)?.cancelAll(`work ${workName} is ${to}`);
    });
  }

  async removeWork(name: string): Promise<void> {
    const work = this.workMap.get(name);
    if (!work) return;

    await this.backend.stopWork(this, work);
    await this.proxies.get(name)?.close();
    this.proxies.delete(name);
    this.watched.delete(name);
    this.backend.releaseWork(name);
    this.registry.unregister(name);
    this.synchronizer.removeWork(name);
    this.workMap.delete(name);
    logOrchestratorEvent(this.logger, "app.work.removed", { workName: name });
  }

  /** Stores each work's reachable endpoint in `work.url`. */
  resolveUrls(baseUrl?: string): Record<string, string> {
    const urls: Record<string, string> = {};
    for (const work of this.workMap.values()) {
      work.url = this.backend.resolveUrl(work, baseUrl);
      if (work.url) urls[work.name] = work.url;
    }
    return urls;
  }

  shutdown(): Promise<void> {
    this.shutdownPromise ??= this.stopEverything();
    return this.shutdownPromise;
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private attach(work: AnyWork): void {
    if (!work.name) {
      throw new ConfigurationError(`${work.constructor.name} reached the App without a name`);
    }
    this.workMap.set(work.name, work);
    wrapRunMethod(this, work);
    this.synchronizer.addWork(work.name, work.initialState);
  }

  private async phase(name: string, fn: () => Promise<void> | void): Promise<void> {
    try {
      await fn();
    } catch (err) {
      logOrchestratorEvent(this.logger, "app.tick.failed", {
        phase: name,
        message: formatErrorMessage(err),
      });
    }
  }

  private async stopEverything(): Promise<void> {
    await this.loop.stop();
    await this.backend.stopAllWorks(this.works);
    await Promise.all([...this.proxies.values()].map((proxy) => proxy.close()));
    this.proxies.clear();
    this.registry.close();
    logOrchestratorEvent(this.logger, "app.shutdown", { works: this.workMap.size });
    this.logger.close();
  }
}
