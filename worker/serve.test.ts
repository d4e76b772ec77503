import { describe, expect, it } from "vitest";

import { createChannelPair } from "../src/__tests__/helpers/paired-channel.js";
import { ConfigurationError } from "../src/core/errors.js";
import { IpcTransport } from "../src/transport/ipc-transport.js";
import { Flow } from "../src/work/flow.js";
import { Work } from "../src/work/work.js";

import type { WorkerSettings } from "./config.js";
import type { WorkerLogEventInput } from "./logging.js";
import { serveWork } from "./serve.js";

class Counter extends Work<[], number> {
  run(): number {
    const next = Number(this.getState("count") ?? 0) + 1;
    this.setState("count", next);
    return next;
  }
}

const SETTINGS: WorkerSettings = {
  workName: "root.counter",
  entrypoint: "/app/entry/app.js",
  queueId: "q1",
  epoch: 2,
  transport: "ipc",
};

describe("serveWork", () => {
  it("announces readiness, answers calls and streams deltas over the transport", async () => {
    const pair = createChannelPair();
    const events: WorkerLogEventInput[] = [];
    const received: unknown[] = [];
    pair.app.onMessage((message) => received.push(message));

    const session = serveWork({
      settings: SETTINGS,
      definition: { root: new Flow().add("counter", new Counter()) },
      transport: new IpcTransport(pair.worker),
      logger: { log: (event) => events.push(event) },
    });

    pair.app.send({
      role: "caller",
      message: { kind: "call", seq: 1, args: [], sent_at: "2026-01-01T00:00:00.000Z" },
    });
    await waitFor(() => received.length >= 3);

    expect(received).toHaveLength(3);
    expect(received).toContainEqual(
      expect.objectContaining({
        role: "readiness",
        message: expect.objectContaining({ work_name: "root.counter", epoch: 2 }),
      }),
    );
    expect(received).toContainEqual(
      expect.objectContaining({
        role: "delta",
        message: expect.objectContaining({
          id: 1,
          ops: [{ op: "set", path: ["count"], value: 1 }],
        }),
      }),
    );
    expect(received).toContainEqual({
      role: "orchestrator-response",
      message: { kind: "result", seq: 1, ok: true, value: 1 },
    });

    await session.stop();
    expect(events.map((event) => event.type)).toEqual(["worker.serve", "worker.stop"]);
  });

  it("stops when the App sends a stop request", async () => {
    const pair = createChannelPair();
    const session = serveWork({
      settings: SETTINGS,
      definition: { root: new Flow().add("counter", new Counter()) },
      transport: new IpcTransport(pair.worker),
      logger: { log: () => undefined },
    });

    pair.app.send({ role: "orchestrator-request", message: { kind: "stop" } });
    await session.done;

    expect(session.runtime.state).toBe("stopped");
    await session.stop();
  });

  it("rejects a work name missing from the definition", () => {
    const pair = createChannelPair();
    expect(() =>
      serveWork({
        settings: { ...SETTINGS, workName: "root.missing" },
        definition: { root: new Flow().add("counter", new Counter()) },
        transport: new IpcTransport(pair.worker),
        logger: { log: () => undefined },
      }),
    ).toThrow(ConfigurationError);
  });
});

async function waitFor(predicate: () => boolean, timeoutMs = 1_000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!predicate()) {
    if (Date.now() > deadline) throw new Error("condition not met in time");
    await new Promise((resolve) => setTimeout(resolve, 5));
  }
}
