import { Command } from "commander";

import { configCommand } from "./config.js";
import { runCommand } from "./run.js";

export function buildCli(): Command {
  const program = new Command();

  program
    .name("workmesh")
    .description("Run a tree of named works on local, process or docker backends")
    .version("0.1.0")
    .option("--config <path>", "Path to a workmesh YAML config (defaults apply when omitted)")
    .option("--debug", "Show stack traces and causes for errors")
    .option("--no-debug", "Hide stack traces for errors")
    // Subcommands copy these when created; main() renders and maps every error.
    .exitOverride()
    .configureOutput({ outputError: () => undefined });

  program
    .command("run")
    .description("Start the app defined by <entrypoint> and run its main, if any")
    .argument("<entrypoint>", "Module whose default export is defineApp({ root, main })")
    .option("--backend <type>", "Override backend.type (local, process, docker)")
    .option("--queue-id <id>", "Override the queue id (defaults to a timestamped id)")
    .action(async (entrypoint: string, opts: { backend?: string; queueId?: string }) => {
      const globals = program.opts<{ config?: string }>();
      await runCommand(entrypoint, { ...opts, config: globals.config });
    });

  program
    .command("config")
    .description("Print the resolved configuration")
    .option("--backend <type>", "Override backend.type (local, process, docker)")
    .action((opts: { backend?: string }) => {
      const globals = program.opts<{ config?: string }>();
      configCommand({ ...opts, config: globals.config });
    });

  return program;
}
