import type { TransportFrame } from "../protocol/messages.js";

import type { FrameTransport } from "./transport.js";

/** The message-passing side of a Node IPC channel (a child process, or `process` in the child). */
export type IpcChannel = {
  send(message: TransportFrame): void;
  onMessage(listener: (message: unknown) => void): () => void;
};

export class IpcTransport implements FrameTransport {
  private readonly unsubscribers: Array<() => void> = [];
  private closed = false;

  constructor(private readonly channel: IpcChannel) {}

  send(frame: TransportFrame): void {
    if (this.closed) return;
    this.channel.send(frame);
  }

  onFrame(listener: (frame: unknown) => void): () => void {
    const off = this.channel.onMessage(listener);
    this.unsubscribers.push(off);
    return off;
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const off of this.unsubscribers.splice(0)) off();
  }
}

/** Adapts the current process's IPC channel; only valid in a child spawned with one. */
export function parentProcessChannel(): IpcChannel {
  return {
    send: (message) => {
      if (!process.send) {
        throw new Error("No IPC channel to the parent process");
      }
      process.send(message);
    },
    onMessage: (listener) => {
      process.on("message", listener);
      return () => {
        process.off("message", listener);
      };
    },
  };
}
