import fs from "node:fs";
import path from "node:path";

import fse from "fs-extra";

import { JsonObjectSchema, type JsonObject } from "../protocol/json.js";

import { formatErrorLines, formatErrorMessage } from "./error-format.js";
import { isoNow } from "./utils.js";

export type { JsonArray, JsonObject, JsonValue } from "../protocol/json.js";

// =============================================================================
// TYPES
// =============================================================================

export type LogEvent = JsonObject & {
  ts: string;
  type: string;
  queue_id: string;
  work_name?: string;
  payload?: JsonObject;
};

export type LogEventInput = JsonObject & {
  type: string;
  queueId?: string;
  workName?: string;
  payload?: JsonObject;
  ts?: string | Date;
};

type EventDefaults = {
  queueId?: string;
  workName?: string;
};

type LogFailureAction = "write" | "close";

// =============================================================================
// LOGGER
// =============================================================================

export class JsonlLogger {
  private readonly fileDescriptor: number;
  private readonly isDebugEnabled: boolean;
  private closed = false;

  constructor(
    public readonly filePath: string,
    private readonly defaults: EventDefaults = {},
  ) {
    fse.ensureDirSync(path.dirname(filePath));
    this.fileDescriptor = fs.openSync(filePath, "a");
    this.isDebugEnabled = resolveLoggerDebugEnabled();
  }

  log(event: LogEventInput): void {
    const normalized = eventWithTs(event, this.defaults);
    this.append(normalized);
  }

  close(): void {
    if (this.closed) return;
    try {
      fs.fsyncSync(this.fileDescriptor);
      fs.closeSync(this.fileDescriptor);
    } catch (err) {
      console.warn(formatLogFailureWarning("close", this.filePath, err, this.isDebugEnabled));
    } finally {
      this.closed = true;
    }
  }

  private append(event: LogEvent): void {
    if (this.closed) return;
    try {
      fs.writeSync(this.fileDescriptor, `${JSON.stringify(event)}\n`);
      fs.fsyncSync(this.fileDescriptor);
    } catch (err) {
      console.warn(formatLogFailureWarning("write", this.filePath, err, this.isDebugEnabled));
    }
  }
}

// =============================================================================
// EVENT HELPERS
// =============================================================================

export function eventWithTs(event: LogEventInput, defaults: EventDefaults = {}): LogEvent {
  const { queueId: providedQueueId, workName, payload, ts, type, ...rest } = event;

  const queueId = providedQueueId ?? defaults.queueId;
  if (!queueId) {
    throw new Error("queue_id is required for log events");
  }

  const normalizedTs =
    typeof ts === "string" ? ts : ts instanceof Date ? ts.toISOString() : isoNow();

  const resolvedWorkName = workName ?? defaults.workName;

  const result: LogEvent = {
    ...rest,
    ts: normalizedTs,
    type,
    queue_id: queueId,
  };

  if (resolvedWorkName) {
    result.work_name = resolvedWorkName;
  }
  if (payload && Object.keys(payload).length > 0) {
    result.payload = payload;
  }

  return result;
}

export function logOrchestratorEvent(
  logger: JsonlLogger | undefined,
  type: string,
  fields: JsonObject & { workName?: string; ts?: string | Date } = {},
): void {
  if (!logger) return;

  const { workName, ts, ...rest } = fields;
  const event: LogEventInput = { type, ...rest };

  if (workName !== undefined) {
    event.workName = workName;
  }
  if (ts !== undefined) {
    event.ts = ts;
  }

  logger.log(event);
}

export function logJsonLineOrRaw(
  logger: JsonlLogger,
  line: string,
  stream: "stdout" | "stderr",
  fallbackType = "work.log",
  workName?: string,
): void {
  try {
    const parsed: unknown = JSON.parse(line);
    if (isTypedRecord(parsed)) {
      const { type, ts, ...rest } = parsed;
      const fields = JsonObjectSchema.safeParse(rest);
      const payload: JsonObject = fields.success
        ? { ...fields.data, stream }
        : { stream, raw: line };
      const event: LogEventInput = { type, payload };
      if (typeof ts === "string") {
        event.ts = ts;
      }
      if (workName) event.workName = workName;
      logger.log(event);
      return;
    }
  } catch {
    // fall through to raw logging
  }

  const event: LogEventInput = { type: fallbackType, payload: { stream, raw: line } };
  if (workName) event.workName = workName;
  logger.log(event);
}

// =============================================================================
// INTERNALS
// =============================================================================

function isTypedRecord(value: unknown): value is Record<string, unknown> & { type: string } {
  return (
    typeof value === "object" &&
    value !== null &&
    !Array.isArray(value) &&
    "type" in value &&
    typeof value.type === "string"
  );
}

function formatLogFailureWarning(
  action: LogFailureAction,
  filePath: string,
  error: unknown,
  isDebugEnabled: boolean,
): string {
  const summary = formatErrorMessage(error);
  const actionLabel =
    action === "write" ? `write log event to ${filePath}` : `close log file ${filePath}`;
  const message = `Warning: failed to ${actionLabel}: ${summary}`;

  if (!isDebugEnabled) {
    return message;
  }

  const stack = resolveDebugStack(error);
  if (!stack) {
    return message;
  }

  return `${message}\n${stack}`;
}

function resolveDebugStack(error: unknown): string | undefined {
  const lines = formatErrorLines(error, { mode: "debug" });
  const stackLine = lines.find((line) => line.kind === "stack");
  return stackLine?.text;
}

function resolveLoggerDebugEnabled(): boolean {
  const argvFlag = resolveDebugFlagFromArgv(process.argv);
  return argvFlag ?? false;
}

export function resolveDebugFlagFromArgv(argv: string[]): boolean | undefined {
  let debugFlag: boolean | undefined;

  for (const arg of argv) {
    if (arg === "--") {
      break;
    }

    if (arg === "--debug") {
      debugFlag = true;
    }

    if (arg === "--no-debug") {
      debugFlag = false;
    }
  }

  return debugFlag;
}
