export { App, type AppOptions } from "./app/app.js";
export { defineApp, loadAppDefinition, type AppDefinition } from "./app/definition.js";
export {
  createBackend,
  WorkBackend,
  WorkLifecycle,
  type Backend,
  type ExecutionDriver,
  type LaunchTarget,
  type ProbeResult,
  type WorkManager,
} from "./backends/index.js";
export { parseAppConfig, loadAppConfig, type AppConfig, type BackendKind } from "./core/config.js";
export {
  CallCancelledError,
  CallTimeoutError,
  ConfigurationError,
  OrchestratorError,
  ProvisioningError,
  QueueClosedError,
  RemoteExecutionError,
  StaleDeltaError,
  WorkFailedError,
} from "./core/errors.js";
export type { JsonObject, JsonValue } from "./protocol/json.js";
export { PendingCall } from "./proxy/pending-call.js";
export { wrapRunMethod } from "./proxy/run-proxy.js";
export { MemoryQueuingSystem, type QueuingSystem } from "./queues/queuing-system.js";
export type { QueueHandle } from "./queues/memory-queue.js";
export { Flow } from "./work/flow.js";
export type { WorkStatus } from "./work/status.js";
export { Work, type AnyWork, type WorkOptions } from "./work/work.js";
