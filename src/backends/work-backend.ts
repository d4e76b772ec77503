/**
 * WorkBackend implements Backend once, on top of an ExecutionDriver.
 * Purpose: keep lifecycle bookkeeping identical across local, process and docker contexts.
 * Assumptions: one WorkLifecycle per work name, created on first createWork().
 */

import type { AppHost } from "../app/host.js";
import type { BackendKind } from "../core/config.js";
import { logOrchestratorEvent, type JsonlLogger } from "../core/logger.js";
import type { AnyWork } from "../work/work.js";

import type { Backend } from "./backend.js";
import type { ExecutionDriver } from "./driver.js";
import { WorkLifecycle } from "./work-lifecycle.js";

export class WorkBackend<H> implements Backend {
  private readonly managers = new Map<string, WorkLifecycle<H>>();

  constructor(
    public readonly driver: ExecutionDriver<H>,
    private readonly logger?: JsonlLogger,
  ) {}

  get kind(): BackendKind {
    return this.driver.kind;
  }

  async createWork(app: AppHost, work: AnyWork): Promise<void> {
    let manager = this.managers.get(work.name);
    if (!manager) {
      manager = new WorkLifecycle<H>({
        work,
        driver: this.driver,
        queueId: app.queueId,
        queues: app.registry.register(work.name),
        appQueues: app.registry.app,
        registry: app.registry,
        logger: app.logger ?? this.logger,
      });
      this.managers.set(work.name, manager);
    }

    if (manager.isAlive()) return;
    await manager.start();
  }

  async updateWorkStatuses(works: readonly AnyWork[]): Promise<void> {
    const tracked: Array<{ manager: WorkLifecycle<H>; handle: H }> = [];
    for (const work of works) {
      const manager = this.managers.get(work.name);
      const handle = manager?.activeHandle;
      if (manager && handle !== undefined && manager.isAlive()) {
        tracked.push({ manager, handle });
      }
    }
    if (tracked.length === 0) return;

    const results = await this.driver.probe(tracked.map((entry) => entry.handle));
    tracked.forEach((entry, index) => {
      const result = results[index];
      if (result) entry.manager.observeExit(result);
    });
  }

  async stopWork(_app: AppHost, work: AnyWork): Promise<void> {
    const manager = this.managers.get(work.name);
    if (!manager) return;
    await manager.kill();
    logOrchestratorEvent(this.logger, "work.stop", { workName: work.name });
  }

  async stopAllWorks(works: readonly AnyWork[]): Promise<void> {
    await Promise.all(
      works.map(async (work) => {
        await this.managers.get(work.name)?.kill();
      }),
    );
  }

  resolveUrl(work: AnyWork, baseUrl?: string): string | undefined {
    if (work.port === undefined) return undefined;
    if (baseUrl) {
      return `${baseUrl.replace(/\/+$/, "")}/${work.name}`;
    }
    const handle = this.managers.get(work.name)?.activeHandle;
    if (handle === undefined) return undefined;
    return this.driver.address(handle, work.port);
  }

  getManager(workName: string): WorkLifecycle<H> | undefined {
    return this.managers.get(workName);
  }

  releaseWork(workName: string): void {
    this.managers.delete(workName);
  }
}
