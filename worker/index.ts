import { Command } from "commander";

import { loadAppDefinition } from "../src/app/definition.js";
import { formatErrorMessage } from "../src/core/error-format.js";
import { IpcTransport, parentProcessChannel } from "../src/transport/ipc-transport.js";
import { LineTransport } from "../src/transport/line-transport.js";
import { pipeLines } from "../src/transport/lines.js";
import type { FrameTransport } from "../src/transport/transport.js";

import { buildWorkerSettings, type CliOptions, type WorkerSettings } from "./config.js";
import { createStderrLogger, type WorkerLogger } from "./logging.js";
import { serveWork } from "./serve.js";

function parseCli(argv: string[]): CliOptions {
  const program = new Command()
    .name("workmesh-worker")
    .description("Serve one work of a workmesh app")
    .option("--work-name <name>", "Dotted name of the work to serve")
    .option("--entrypoint <path>", "Module exporting the app definition")
    .option("--queue-id <id>", "Queue id of the owning app")
    .option("--epoch <n>", "Lifecycle epoch of this execution context", (v) => Number(v))
    .option("--transport <kind>", "ipc or stdio")
    .option("--workdir <path>", "Base directory for relative paths")
    .allowUnknownOption(false);

  program.parse(argv);
  return program.opts<CliOptions>();
}

function createTransport(settings: WorkerSettings, logger: WorkerLogger): {
  transport: FrameTransport;
  release: () => void;
} {
  if (settings.transport === "ipc") {
    return {
      transport: new IpcTransport(parentProcessChannel()),
      release: () => process.disconnect?.(),
    };
  }

  const transport = new LineTransport({
    writeLine: (line) => {
      process.stdout.write(line);
    },
    onText: (line) => logger.log({ type: "worker.stdin.ignored", payload: { line } }),
  });
  const detach = pipeLines(process.stdin, (line) => {
    transport.acceptLine(line);
  });
  return {
    transport,
    release: () => {
      detach();
      process.stdin.pause();
    },
  };
}

async function main(): Promise<void> {
  const settings = buildWorkerSettings(parseCli(process.argv));
  const logger = createStderrLogger({ workName: settings.workName });
  const definition = await loadAppDefinition(settings.entrypoint);
  const { transport, release } = createTransport(settings, logger);

  const session = serveWork({ settings, definition, transport, logger });
  const shutdown = (): void => {
    void session.stop();
  };
  process.once("SIGTERM", shutdown);
  process.once("SIGINT", shutdown);
  if (settings.transport === "ipc") {
    process.once("disconnect", shutdown);
  } else {
    process.stdin.once("end", shutdown);
  }

  await session.done;
  await session.stop();
  release();
  process.exitCode = session.runtime.state === "crashed" ? 1 : 0;
}

main().catch((err: unknown) => {
  createStderrLogger().log({
    type: "worker.error",
    payload: { message: formatErrorMessage(err) },
  });
  process.exitCode = 1;
  process.disconnect?.();
});
