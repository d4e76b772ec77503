/*
Purpose: turn unknown thrown values into strings, display lines and wire-safe records.
Assumptions: thrown values may be anything; only Error instances carry stacks.
Usage: formatErrorLines(err, { mode: "debug" }), serializeError(err).
*/

import type { RemoteErrorInfo } from "../protocol/messages.js";

// =============================================================================
// TYPES
// =============================================================================

export type ErrorFormatMode = "short" | "debug";

export type ErrorFormatLine = {
  kind: "title" | "message" | "name" | "code" | "cause" | "stack";
  text: string;
};

export type AnsiStyle = "red" | "yellow" | "cyan" | "dim" | "bold";
export type AnsiFormatter = (text: string, styles: AnsiStyle[]) => string;

const ANSI_CODES: Record<AnsiStyle, [number, number]> = {
  red: [31, 39],
  yellow: [33, 39],
  cyan: [36, 39],
  dim: [2, 22],
  bold: [1, 22],
};

// =============================================================================
// MESSAGES
// =============================================================================

export function formatErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

export function serializeError(error: unknown): RemoteErrorInfo {
  if (error instanceof Error) {
    const info: RemoteErrorInfo = { name: error.name || "Error", message: error.message };
    if (error.stack) info.stack = error.stack;
    const code = readErrorCode(error);
    if (code) info.code = code;
    return info;
  }

  return { name: "NonError", message: String(error) };
}

export function formatErrorLines(
  error: unknown,
  opts: { mode: ErrorFormatMode },
): ErrorFormatLine[] {
  if (!(error instanceof Error)) {
    return [{ kind: "title", text: String(error) }];
  }

  const lines: ErrorFormatLine[] = [{ kind: "title", text: error.message }];
  const code = readErrorCode(error);
  if (code) lines.push({ kind: "code", text: code });

  if (opts.mode === "debug") {
    lines.push({ kind: "name", text: error.name });
    const cause = readCause(error);
    if (cause !== undefined) {
      lines.push({ kind: "cause", text: formatErrorMessage(cause) });
    }
    if (error.stack) lines.push({ kind: "stack", text: error.stack });
  }

  return lines;
}

// =============================================================================
// COLOR
// =============================================================================

export function resolveColorEnabled(opts: {
  stream: { isTTY?: boolean };
  useColor?: boolean;
}): boolean {
  if (opts.useColor !== undefined) return opts.useColor;
  if (process.env.NO_COLOR !== undefined) return false;
  return Boolean(opts.stream.isTTY);
}

export function createAnsiFormatter(useColor: boolean): AnsiFormatter {
  return (text, styles) => {
    if (!useColor || styles.length === 0) return text;
    return styles.reduce((acc, style) => {
      const [open, close] = ANSI_CODES[style];
      return `\u001b[${open}m${acc}\u001b[${close}m`;
    }, text);
  };
}

// =============================================================================
// INTERNALS
// =============================================================================

function readErrorCode(error: Error): string | undefined {
  if (!("code" in error)) return undefined;
  const code = error.code;
  if (typeof code === "string") return code;
  if (typeof code === "number") return String(code);
  return undefined;
}

function readCause(error: Error): unknown {
  return "cause" in error ? error.cause : undefined;
}
