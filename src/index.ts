import type { Command } from "commander";

import { exitCodeFor, isHelpOrVersionExit, renderCliError } from "./cli/error-format.js";
import { buildCli } from "./cli/index.js";
import { resolveDebugFlagFromArgv } from "./core/logger.js";

/** Runs the workmesh CLI and records the outcome in `process.exitCode`. */
export async function main(argv: string[], program: Command = buildCli()): Promise<void> {
  try {
    await program.parseAsync(argv);
  } catch (error) {
    process.exitCode = exitCodeFor(error);
    if (isHelpOrVersionExit(error)) return;

    const debug =
      resolveDebugFlagFromArgv(argv) ?? Boolean(program.opts<{ debug?: boolean }>().debug);
    console.error(renderCliError(error, { debug }));
  }
}
