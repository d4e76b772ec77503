import os from "node:os";
import path from "node:path";

// =============================================================================
// TYPES
// =============================================================================

export type PathsContext = {
  workmeshHome: string;
};

export type ResolveWorkmeshHomeOptions = {
  workmeshHome?: string;
};

// =============================================================================
// CONTEXT
// =============================================================================

export function resolveWorkmeshHome(opts: ResolveWorkmeshHomeOptions = {}): string {
  if (opts.workmeshHome) {
    return path.resolve(opts.workmeshHome);
  }

  if (process.env.WORKMESH_HOME) {
    return path.resolve(process.env.WORKMESH_HOME);
  }

  return path.join(os.homedir(), ".workmesh");
}

// =============================================================================
// PATH HELPERS
// =============================================================================

export function defaultLogsDir(paths?: PathsContext): string {
  return path.join(resolveWorkmeshHome({ workmeshHome: paths?.workmeshHome }), "logs");
}

function queueLogsDir(logsDir: string, queueId: string): string {
  return path.join(logsDir, queueId);
}

export function orchestratorLogPath(logsDir: string, queueId: string): string {
  return path.join(queueLogsDir(logsDir, queueId), "orchestrator.jsonl");
}
