import path from "node:path";

// =============================================================================
// TYPES
// =============================================================================

export type WorkerTransportKind = "ipc" | "stdio";

export type CliOptions = {
  workName?: string;
  entrypoint?: string;
  queueId?: string;
  epoch?: number;
  transport?: string;
  workdir?: string;
};

export type WorkerSettings = {
  workName: string;
  entrypoint: string;
  queueId: string;
  epoch: number;
  transport: WorkerTransportKind;
};

// =============================================================================
// CONFIG BUILDING
// =============================================================================

export function buildWorkerSettings(opts: CliOptions): WorkerSettings {
  const workingDirectory = resolvePath(opts.workdir ?? process.cwd(), process.cwd());

  return {
    workName: requireString(opts.workName, "WORKMESH_WORK_NAME", "--work-name"),
    entrypoint: resolvePath(
      requireString(opts.entrypoint, "WORKMESH_ENTRYPOINT", "--entrypoint"),
      workingDirectory,
    ),
    queueId: requireString(opts.queueId, "WORKMESH_QUEUE_ID", "--queue-id"),
    epoch: resolveEpoch(opts),
    transport: resolveTransport(opts),
  };
}

// =============================================================================
// RESOLUTION HELPERS
// =============================================================================

function normalizeOptionalString(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function requireString(cliValue: string | undefined, envName: string, flag: string): string {
  const value = normalizeOptionalString(cliValue ?? envOrUndefined(envName));
  if (!value) {
    throw new Error(`${envName} is required (set ${envName} or pass ${flag}).`);
  }
  return value;
}

function resolveEpoch(opts: CliOptions): number {
  const epoch = getIntOption(opts.epoch, envOrUndefined("WORKMESH_EPOCH"), "WORKMESH_EPOCH") ?? 1;
  if (epoch < 1) {
    throw new Error("WORKMESH_EPOCH must be a positive integer.");
  }
  return epoch;
}

function resolveTransport(opts: CliOptions): WorkerTransportKind {
  const raw = normalizeOptionalString(opts.transport ?? envOrUndefined("WORKMESH_TRANSPORT")) ?? "ipc";
  if (raw === "ipc" || raw === "stdio") return raw;
  throw new Error(`WORKMESH_TRANSPORT must be ipc or stdio (got ${raw}).`);
}

// =============================================================================
// OPTION PARSING
// =============================================================================

function getIntOption(
  cliValue: number | undefined,
  envValue: string | undefined,
  label: string,
): number | undefined {
  if (cliValue !== undefined) {
    if (!Number.isInteger(cliValue)) {
      throw new Error(`${label} must be an integer.`);
    }
    return cliValue;
  }
  if (envValue !== undefined) {
    const parsed = Number(envValue);
    if (!Number.isInteger(parsed)) {
      throw new Error(`${label} must be an integer.`);
    }
    return parsed;
  }
  return undefined;
}

function envOrUndefined(name: string): string | undefined {
  const value = process.env[name];
  return value === undefined || value === "" ? undefined : value;
}

function resolvePath(value: string, base: string): string {
  return path.isAbsolute(value) ? value : path.resolve(base, value);
}
