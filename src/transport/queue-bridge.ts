/**
 * QueueBridge joins local queues to a FrameTransport.
 * Purpose: let a work's queues span a process or container boundary unchanged.
 * Assumptions: the bridge is the only consumer of its outbound queues; outbound forwarding
 * starts once the far side has sent its first frame, so nothing is written before it listens.
 * Usage: const bridge = new QueueBridge({ transport, outbound, inbound }); bridge.start();
 */

import { formatErrorMessage } from "../core/error-format.js";
import { logOrchestratorEvent, type JsonlLogger } from "../core/logger.js";
import { createDeferred } from "../core/utils.js";
import {
  TransportFrameSchema,
  parseRoleMessage,
  type QueueRole,
  type RoleMessage,
} from "../protocol/messages.js";
import type { QueueHandle } from "../queues/memory-queue.js";

import type { FrameTransport } from "./transport.js";

// =============================================================================
// TYPES
// =============================================================================

export type OutboundRoute = {
  [R in QueueRole]: { role: R; queue: QueueHandle<RoleMessage[R]> };
}[QueueRole];

export type InboundRoutes = { [R in QueueRole]?: QueueHandle<RoleMessage[R]> };

export type QueueBridgeOptions = {
  transport: FrameTransport;
  outbound: OutboundRoute[];
  inbound: InboundRoutes;
  /** Forward outbound traffic immediately instead of waiting for the first inbound frame. */
  eagerOutbound?: boolean;
  logger?: JsonlLogger;
  workName?: string;
};

// =============================================================================
// BRIDGE
// =============================================================================

export class QueueBridge {
  private readonly abort = new AbortController();
  private readonly connectedSignal = createDeferred<void>();
  private unsubscribe?: () => void;
  private pumps: Promise<void> = Promise.resolve();
  private isConnected = false;
  private droppedFrames = 0;

  constructor(private readonly opts: QueueBridgeOptions) {}

  /** Resolves when the first valid inbound frame arrives. */
  get connected(): Promise<void> {
    return this.connectedSignal.promise;
  }

  get dropped(): number {
    return this.droppedFrames;
  }

  start(): void {
    if (this.unsubscribe) return;
    this.unsubscribe = this.opts.transport.onFrame((frame) => this.receive(frame));
    if (this.opts.eagerOutbound) {
      this.markConnected();
    }
  }

  async stop(): Promise<void> {
    this.abort.abort();
    this.unsubscribe?.();
    this.unsubscribe = undefined;
    await this.pumps;
  }

  // ---------------------------------------------------------------------------
  // Inbound
  // ---------------------------------------------------------------------------

  private receive(raw: unknown): void {
    const frame = TransportFrameSchema.safeParse(raw);
    if (!frame.success) {
      this.drop("frame.invalid", undefined);
      return;
    }
    if (!this.route(frame.data.role, frame.data.message)) return;
    this.markConnected();
  }

  private route<R extends QueueRole>(role: R, message: unknown): boolean {
    const queue = this.opts.inbound[role];
    if (!queue) {
      this.drop("frame.unrouted", role);
      return false;
    }
    const parsed = parseRoleMessage(role, message);
    if (!parsed) {
      this.drop("frame.invalid", role);
      return false;
    }
    if (queue.closed) {
      this.drop("frame.closed", role);
      return false;
    }
    queue.push(parsed);
    return true;
  }

  private drop(reason: string, role: QueueRole | undefined): void {
    this.droppedFrames += 1;
    logOrchestratorEvent(this.opts.logger, "transport.frame.dropped", {
      ...(this.opts.workName ? { workName: this.opts.workName } : {}),
      reason,
      role: role ?? null,
    });
  }

  // ---------------------------------------------------------------------------
  // Outbound
  // ---------------------------------------------------------------------------

  private markConnected(): void {
    if (this.isConnected) return;
    this.isConnected = true;
    this.connectedSignal.resolve();
    this.pumps = Promise.all(this.opts.outbound.map((route) => this.forward(route))).then(
      () => undefined,
    );
  }

  private async forward(route: OutboundRoute): Promise<void> {
    const signal = this.abort.signal;
    while (!signal.aborted) {
      const message = await route.queue.pop(undefined, signal);
      if (message === null) break;
      try {
        this.opts.transport.send({ role: route.role, message });
      } catch (err) {
        logOrchestratorEvent(this.opts.logger, "transport.send.failed", {
          ...(this.opts.workName ? { workName: this.opts.workName } : {}),
          role: route.role,
          message: formatErrorMessage(err),
        });
        this.abort.abort();
      }
    }
  }
}
