import type { TransportFrame } from "../protocol/messages.js";

/** A bidirectional channel of role-tagged frames between the App and one work context. */
export type FrameTransport = {
  send(frame: TransportFrame): void;
  /** Registers the receiver of unvalidated inbound frames; returns an unsubscribe. */
  onFrame(listener: (frame: unknown) => void): () => void;
  close(): void;
};
