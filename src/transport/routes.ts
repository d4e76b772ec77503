import type { AppQueueSet, WorkQueueSet } from "../queues/registry.js";

import type { InboundRoutes, OutboundRoute } from "./queue-bridge.js";

export type BridgeRoutes = {
  outbound: OutboundRoute[];
  inbound: InboundRoutes;
};

/** App side: requests flow out; responses, deltas and lifecycle signals flow in. */
export function appSideRoutes(work: WorkQueueSet, app: AppQueueSet): BridgeRoutes {
  return {
    outbound: [
      { role: "caller", queue: work.caller },
      { role: "orchestrator-request", queue: work.request },
      { role: "copy-request", queue: work.copyRequest },
    ],
    inbound: {
      "orchestrator-response": work.response,
      "copy-response": work.copyResponse,
      delta: app.delta,
      readiness: app.readiness,
      error: app.error,
    },
  };
}

/** Work side: the mirror image of appSideRoutes. */
export function workSideRoutes(work: WorkQueueSet, app: AppQueueSet): BridgeRoutes {
  return {
    outbound: [
      { role: "readiness", queue: app.readiness },
      { role: "orchestrator-response", queue: work.response },
      { role: "copy-response", queue: work.copyResponse },
      { role: "delta", queue: app.delta },
      { role: "error", queue: app.error },
    ],
    inbound: {
      caller: work.caller,
      "orchestrator-request": work.request,
      "copy-request": work.copyRequest,
    },
  };
}
