import { execaNode } from "execa";

import type { IpcChannel } from "../transport/ipc-transport.js";
import { pipeLines } from "../transport/lines.js";

// =============================================================================
// TYPES
// =============================================================================

export type WorkProcessSpec = {
  script: string;
  args: string[];
  env: Record<string, string>;
  nodeOptions: string[];
};

export type WorkProcessExit = {
  exitCode: number;
  signal?: string;
};

export type OutputListener = (line: string, stream: "stdout" | "stderr") => void;

/** A spawned worker process; `exited` never rejects. */
export type WorkProcess = {
  readonly pid?: number;
  readonly channel: IpcChannel;
  readonly exited: Promise<WorkProcessExit>;
  onOutput(listener: OutputListener): void;
  kill(signal?: NodeJS.Signals): void;
};

export type ProcessSpawner = (spec: WorkProcessSpec) => WorkProcess;

// =============================================================================
// EXECA SPAWNER
// =============================================================================

export const execaSpawner: ProcessSpawner = (spec) => {
  const child = execaNode(spec.script, spec.args, {
    env: spec.env,
    nodeOptions: spec.nodeOptions,
    stdin: "ignore",
    buffer: false,
    reject: false,
  });

  const exited: Promise<WorkProcessExit> = child.then(
    (result) => ({
      exitCode: typeof result.exitCode === "number" ? result.exitCode : 1,
      ...(result.signal ? { signal: result.signal } : {}),
    }),
    () => ({ exitCode: 1 }),
  );

  return {
    pid: child.pid,
    exited,
    channel: {
      send: (message) => {
        if (child.connected) child.send(message);
      },
      onMessage: (listener) => {
        child.on("message", listener);
        return () => {
          child.off("message", listener);
        };
      },
    },
    onOutput: (listener) => {
      if (child.stdout) pipeLines(child.stdout, (line) => listener(line, "stdout"));
      if (child.stderr) pipeLines(child.stderr, (line) => listener(line, "stderr"));
    },
    kill: (signal) => {
      child.kill(signal ?? "SIGTERM");
    },
  };
};
