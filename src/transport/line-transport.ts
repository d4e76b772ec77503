/**
 * LineTransport frames messages as JSON lines over a byte stream.
 * Purpose: carry queue traffic over a container's attached stdin/stdout, where other output
 * (logs, prints) shares the stream.
 * Assumptions: a line is a frame only if it parses as `{ role, message }` with a known role.
 */

import { TransportFrameSchema, type TransportFrame } from "../protocol/messages.js";

import type { FrameTransport } from "./transport.js";

export type LineTransportOptions = {
  writeLine: (line: string) => void;
  /** Receives lines that are not frames. */
  onText?: (line: string) => void;
};

export class LineTransport implements FrameTransport {
  private readonly listeners = new Set<(frame: unknown) => void>();
  private closed = false;

  constructor(private readonly opts: LineTransportOptions) {}

  send(frame: TransportFrame): void {
    if (this.closed) return;
    this.opts.writeLine(`${JSON.stringify(frame)}\n`);
  }

  onFrame(listener: (frame: unknown) => void): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** Feeds one received line; returns true when it was a frame. */
  acceptLine(line: string): boolean {
    const frame = parseFrameLine(line);
    if (!frame) {
      this.opts.onText?.(line);
      return false;
    }
    for (const listener of this.listeners) listener(frame);
    return true;
  }

  close(): void {
    this.closed = true;
    this.listeners.clear();
  }
}

export function parseFrameLine(line: string): TransportFrame | null {
  const trimmed = line.trim();
  if (!trimmed.startsWith("{")) return null;
  let parsed: unknown;
  try {
    parsed = JSON.parse(trimmed);
  } catch {
    return null;
  }
  const frame = TransportFrameSchema.safeParse(parsed);
  return frame.success && "message" in frame.data ? frame.data : null;
}
