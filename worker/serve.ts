/**
 * Serves one work of an App definition inside a worker process.
 * Purpose: rebuild the work's queues locally and bridge them to the App over a transport.
 * Assumptions: the transport's far end is the App-side bridge of the same work and epoch.
 */

import type { AppDefinition } from "../src/app/definition.js";
import { ConfigurationError } from "../src/core/errors.js";
import { MemoryQueuingSystem } from "../src/queues/queuing-system.js";
import { QueueRegistry } from "../src/queues/registry.js";
import { WorkRuntime } from "../src/runtime/work-runtime.js";
import { QueueBridge } from "../src/transport/queue-bridge.js";
import { workSideRoutes } from "../src/transport/routes.js";
import type { FrameTransport } from "../src/transport/transport.js";

import type { WorkerSettings } from "./config.js";
import type { WorkerLogger } from "./logging.js";

export type WorkerSession = {
  runtime: WorkRuntime;
  /** Resolves when the runtime stops on its own (stop message or crash). */
  done: Promise<void>;
  stop(): Promise<void>;
};

export function serveWork(opts: {
  settings: WorkerSettings;
  definition: AppDefinition;
  transport: FrameTransport;
  logger: WorkerLogger;
}): WorkerSession {
  const { settings, definition, transport, logger } = opts;
  const work = definition.root.findWork(settings.workName);
  if (!work) {
    throw new ConfigurationError(
      `Work ${settings.workName} is not part of the app defined in ${settings.entrypoint}`,
    );
  }

  const registry = new QueueRegistry(new MemoryQueuingSystem(), settings.queueId);
  const appQueues = registry.prepare();
  const queues = registry.register(work.name);

  const bridge = new QueueBridge({
    transport,
    ...workSideRoutes(queues, appQueues),
    eagerOutbound: true,
    workName: work.name,
  });
  bridge.start();

  const runtime = new WorkRuntime({ work, epoch: settings.epoch, queues, appQueues });
  runtime.start();
  logger.log({ type: "worker.serve", payload: { epoch: settings.epoch } });

  let stopping: Promise<void> | undefined;
  const stop = (): Promise<void> => {
    stopping ??= (async () => {
      await runtime.stop();
      await bridge.stop();
      transport.close();
      registry.close();
      logger.log({
        type: "worker.stop",
        payload: { state: runtime.state, dropped_frames: bridge.dropped },
      });
    })();
    return stopping;
  };

  return { runtime, done: runtime.done, stop };
}
