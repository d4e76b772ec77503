import type { JsonObject } from "../src/protocol/json.js";

// =============================================================================
// TYPES
// =============================================================================

export type WorkerLogEventInput = {
  type: string;
  payload?: JsonObject;
  ts?: string | Date;
};

export type WorkerLogEvent = {
  ts: string;
  type: string;
  work_name?: string;
  payload?: JsonObject;
};

export type WorkerLogger = {
  log: (event: WorkerLogEventInput) => void;
};

// =============================================================================
// LOGGING
// =============================================================================

/**
 * JSON-lines logger on stderr. Stdout is reserved for transport frames when the worker
 * serves over stdio; the App re-logs these lines into its own event log.
 */
export function createStderrLogger(
  defaults: { workName?: string } = {},
  write: (line: string) => void = (line) => {
    process.stderr.write(line);
  },
): WorkerLogger {
  return {
    log(event: WorkerLogEventInput) {
      write(`${JSON.stringify(normalizeEvent(event, defaults))}\n`);
    },
  };
}

export function normalizeEvent(
  event: WorkerLogEventInput,
  defaults: { workName?: string },
): WorkerLogEvent {
  const ts =
    typeof event.ts === "string"
      ? event.ts
      : event.ts instanceof Date
        ? event.ts.toISOString()
        : new Date().toISOString();

  const normalized: WorkerLogEvent = { ts, type: event.type };
  if (defaults.workName) {
    normalized.work_name = defaults.workName;
  }
  if (event.payload && Object.keys(event.payload).length > 0) {
    normalized.payload = event.payload;
  }
  return normalized;
}
