import path from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { buildWorkerSettings } from "./config.js";

const ENV_KEYS = [
  "WORKMESH_WORK_NAME",
  "WORKMESH_ENTRYPOINT",
  "WORKMESH_QUEUE_ID",
  "WORKMESH_EPOCH",
  "WORKMESH_TRANSPORT",
];

let saved: Record<string, string | undefined> = {};

beforeEach(() => {
  saved = Object.fromEntries(ENV_KEYS.map((key) => [key, process.env[key]]));
  for (const key of ENV_KEYS) delete process.env[key];
});

afterEach(() => {
  for (const key of ENV_KEYS) {
    const value = saved[key];
    if (value === undefined) {
      delete process.env[key];
    } else {
      process.env[key] = value;
    }
  }
});

describe("buildWorkerSettings", () => {
  it("reads settings from the environment", () => {
    process.env.WORKMESH_WORK_NAME = "root.trainer";
    process.env.WORKMESH_ENTRYPOINT = "/app/entry/app.js";
    process.env.WORKMESH_QUEUE_ID = "q1";
    process.env.WORKMESH_EPOCH = "4";
    process.env.WORKMESH_TRANSPORT = "stdio";

    expect(buildWorkerSettings({})).toEqual({
      workName: "root.trainer",
      entrypoint: "/app/entry/app.js",
      queueId: "q1",
      epoch: 4,
      transport: "stdio",
    });
  });

  it("prefers flags and resolves the entrypoint against the workdir", () => {
    process.env.WORKMESH_WORK_NAME = "root.ignored";

    const settings = buildWorkerSettings({
      workName: "root.flagged",
      entrypoint: "app.js",
      queueId: "q2",
      workdir: "/srv/project",
    });

    expect(settings).toEqual({
      workName: "root.flagged",
      entrypoint: path.resolve("/srv/project", "app.js"),
      queueId: "q2",
      epoch: 1,
      transport: "ipc",
    });
  });

  it("requires a work name", () => {
    expect(() => buildWorkerSettings({ entrypoint: "/a.js", queueId: "q" })).toThrow(
      "WORKMESH_WORK_NAME is required (set WORKMESH_WORK_NAME or pass --work-name).",
    );
  });

  it("rejects bad epochs and transports", () => {
    const base = { workName: "root.a", entrypoint: "/a.js", queueId: "q" };

    expect(() => buildWorkerSettings({ ...base, epoch: 0 })).toThrow(
      "WORKMESH_EPOCH must be a positive integer.",
    );
    expect(() => buildWorkerSettings({ ...base, epoch: 1.5 })).toThrow(
      "WORKMESH_EPOCH must be an integer.",
    );
    expect(() => buildWorkerSettings({ ...base, transport: "tcp" })).toThrow(
      "WORKMESH_TRANSPORT must be ipc or stdio (got tcp).",
    );
  });
});
