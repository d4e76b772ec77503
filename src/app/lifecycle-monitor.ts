import type { Backend } from "../backends/backend.js";
import { logOrchestratorEvent, type JsonlLogger } from "../core/logger.js";
import type { QueueRegistry } from "../queues/registry.js";

export type MonitorPass = {
  ready: number;
  failed: number;
  stale: number;
};

/**
 * Consumes readiness and error signals exactly once and applies them to the owning
 * work's manager. Signals from an older epoch are ignored.
 */
export class LifecycleMonitor {
  constructor(
    private readonly registry: QueueRegistry,
    private readonly backend: Backend,
    private readonly logger?: JsonlLogger,
  ) {}

  poll(): MonitorPass {
    const pass: MonitorPass = { ready: 0, failed: 0, stale: 0 };
    const queues = this.registry.app;

    for (const signal of queues.readiness.drain()) {
      const manager = this.backend.getManager(signal.work_name);
      if (manager?.markReady(signal.epoch)) {
        pass.ready += 1;
        continue;
      }
      pass.stale += 1;
      logOrchestratorEvent(this.logger, "lifecycle.signal.stale", {
        workName: signal.work_name,
        signal: "readiness",
        epoch: signal.epoch,
      });
    }

    for (const signal of queues.error.drain()) {
      const manager = this.backend.getManager(signal.work_name);
      const message = `${signal.error.name}: ${signal.error.message}`;
      if (manager?.fail(message, signal.epoch)) {
        pass.failed += 1;
        continue;
      }
      pass.stale += 1;
      logOrchestratorEvent(this.logger, "lifecycle.signal.stale", {
        workName: signal.work_name,
        signal: "error",
        epoch: signal.epoch,
        message,
      });
    }

    return pass;
  }
}
