import path from "node:path";

import { App } from "../app/app.js";
import { loadAppDefinition } from "../app/definition.js";
import { createDeferred } from "../core/utils.js";

import { loadConfigForCli, type ConfigOverrides } from "./config.js";

export type RunCommandOptions = ConfigOverrides;

type SignalSource = Pick<NodeJS.Process, "once" | "off">;

/**
 * Starts the App defined by `entrypoint`. With a `main` the command ends when it returns;
 * without one it serves until SIGINT/SIGTERM. Every work is stopped before returning.
 */
export async function runCommand(
  entrypoint: string,
  opts: RunCommandOptions,
  signals: SignalSource = process,
): Promise<void> {
  const config = loadConfigForCli(opts);
  const modulePath = path.resolve(entrypoint);
  const definition = await loadAppDefinition(modulePath);

  const app = new App({ root: definition.root, config, entrypoint: modulePath });
  console.log(`workmesh: queue ${app.queueId} on ${app.backend.kind} backend`);
  console.log(`workmesh: logs at ${app.logger.filePath}`);

  const interrupted = createDeferred<NodeJS.Signals>();
  const onSigint = (): void => interrupted.resolve("SIGINT");
  const onSigterm = (): void => interrupted.resolve("SIGTERM");
  signals.once("SIGINT", onSigint);
  signals.once("SIGTERM", onSigterm);

  app.start();
  try {
    if (definition.main) {
      const main = Promise.resolve(definition.main(app));
      // Rejections after a signal has won the race are ignored.
      void main.catch(() => undefined);
      const outcome = await Promise.race([
        main.then(() => "done" as const),
        interrupted.promise,
      ]);
      if (outcome !== "done") {
        console.log(`workmesh: received ${outcome}, stopping works`);
      }
    } else {
      const signal = await interrupted.promise;
      console.log(`workmesh: received ${signal}, stopping works`);
    }
  } finally {
    signals.off("SIGINT", onSigint);
    signals.off("SIGTERM", onSigterm);
    await app.shutdown();
  }
}
