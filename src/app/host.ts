import type { Backend } from "../backends/backend.js";
import type { JsonlLogger } from "../core/logger.js";
import type { QueueRegistry } from "../queues/registry.js";

/** A bound proxy the App cancels when its work stops or fails. */
export type CallCanceller = {
  cancelAll(reason: string): number;
  close(): Promise<void>;
};

/** The slice of the App that proxies and backends depend on. */
export type AppHost = {
  readonly queueId: string;
  readonly registry: QueueRegistry;
  readonly backend: Backend;
  readonly logger?: JsonlLogger;
  readonly callTimeoutMs?: number;
  registerProxy(workName: string, proxy: CallCanceller): void;
};
