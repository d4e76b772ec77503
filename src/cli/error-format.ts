/*
Purpose: render orchestration errors for the terminal and map them to exit codes.
Assumptions: stderr is the default stream; non-TTY output should disable color.
Usage: console.error(renderCliError(err, { debug })); process.exitCode = exitCodeFor(err);
*/

import { CommanderError } from "commander";

import {
  createAnsiFormatter,
  formatErrorLines,
  resolveColorEnabled,
  type AnsiFormatter,
  type ErrorFormatLine,
  type ErrorFormatMode,
} from "../core/error-format.js";
import {
  ConfigurationError,
  DockerError,
  OrchestratorError,
  ProvisioningError,
  RemoteExecutionError,
} from "../core/errors.js";
import { dockerHint } from "../docker/docker.js";

// =============================================================================
// TYPES
// =============================================================================

export type CliErrorFormatOptions = {
  debug?: boolean;
  useColor?: boolean;
  stream?: { isTTY?: boolean };
};

export type CliErrorLine =
  | ErrorFormatLine
  | { kind: "work" | "remote" | "remote-stack" | "hint"; text: string };

export const EXIT_CODES = {
  failure: 1,
  configuration: 2,
  provisioning: 3,
} as const;

const CONFIG_HINT = "Run `workmesh config` to print the resolved configuration.";

// =============================================================================
// OUTPUT
// =============================================================================

export function renderCliError(error: unknown, options: CliErrorFormatOptions = {}): string {
  const mode: ErrorFormatMode = options.debug ? "debug" : "short";
  const stream = options.stream ?? process.stderr;
  const format = createAnsiFormatter(resolveColorEnabled({ stream, useColor: options.useColor }));

  return describeCliError(error, mode)
    .map((line) => renderLine(line, format))
    .join("\n");
}

/** Title and code first, then what failed and where, then debug detail. */
export function describeCliError(error: unknown, mode: ErrorFormatMode): CliErrorLine[] {
  const base = formatErrorLines(error, { mode });
  const head = base.filter((line) => line.kind === "title" || line.kind === "code");
  const detail = base.filter((line) => line.kind !== "title" && line.kind !== "code");

  const context: CliErrorLine[] = [];
  const workName = readWorkName(error);
  if (workName) context.push({ kind: "work", text: workName });

  if (error instanceof RemoteExecutionError) {
    const code = error.remoteCode ? ` (${error.remoteCode})` : "";
    context.push({ kind: "remote", text: `${error.remoteName}${code}` });
  }

  const hint = resolveHint(error);
  if (hint) context.push({ kind: "hint", text: hint });

  const remoteStack: CliErrorLine[] =
    mode === "debug" && error instanceof RemoteExecutionError && error.remoteStack
      ? [{ kind: "remote-stack", text: error.remoteStack }]
      : [];

  return [...head, ...context, ...detail, ...remoteStack];
}

// =============================================================================
// EXIT CODES
// =============================================================================

export function isHelpOrVersionExit(error: unknown): boolean {
  if (!(error instanceof CommanderError)) return false;
  return (
    error.code === "commander.helpDisplayed" ||
    error.code === "commander.version" ||
    error.code === "commander.help"
  );
}

export function exitCodeFor(error: unknown): number {
  if (error instanceof CommanderError) return error.exitCode;
  if (error instanceof ConfigurationError) return EXIT_CODES.configuration;
  if (error instanceof ProvisioningError || error instanceof DockerError) {
    return EXIT_CODES.provisioning;
  }
  return EXIT_CODES.failure;
}

// =============================================================================
// INTERNALS
// =============================================================================

function readWorkName(error: unknown): string | undefined {
  if (!(error instanceof OrchestratorError) || !("workName" in error)) return undefined;
  return typeof error.workName === "string" ? error.workName : undefined;
}

function resolveHint(error: unknown): string | undefined {
  if (error instanceof DockerError) return dockerHint(error);
  if (error instanceof ConfigurationError) return CONFIG_HINT;
  return undefined;
}

function renderLine(line: CliErrorLine, format: AnsiFormatter): string {
  switch (line.kind) {
    case "title":
      return `${format("Error:", ["red", "bold"])} ${format(line.text, ["bold"])}`;
    case "message":
      return line.text;
    case "work":
      return `${format("Work:", ["cyan"])} ${line.text}`;
    case "remote":
      return `${format("Raised:", ["cyan"])} ${line.text}`;
    case "hint":
      return `${format("Hint:", ["yellow"])} ${line.text}`;
    case "code":
    case "name":
    case "cause":
      return `${format(`${capitalize(line.kind)}:`, ["dim"])} ${format(line.text, ["dim"])}`;
    case "stack":
    case "remote-stack":
      return `${format(line.kind === "stack" ? "Stack:" : "Remote stack:", ["dim"])}\n${format(
        indent(line.text),
        ["dim"],
      )}`;
  }
}

function capitalize(value: string): string {
  return `${value.charAt(0).toUpperCase()}${value.slice(1)}`;
}

function indent(value: string): string {
  return value
    .split("\n")
    .map((line) => `  ${line}`)
    .join("\n");
}
