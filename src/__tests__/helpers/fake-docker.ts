import { Duplex } from "node:stream";

import type Docker from "dockerode";

type ContainerInfo = { Id: string; State: string; Status: string; Labels: Record<string, string> };

/** Both ends of an attached container stream: writes are stdin, pushes are stdout. */
export class FakeStdio extends Duplex {
  readonly written: string[] = [];
  onWrite?: (text: string) => void;

  _read(): void {}

  _write(chunk: Buffer, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    const text = chunk.toString("utf8");
    this.written.push(text);
    this.onWrite?.(text);
    callback();
  }
}

export class FakeContainer {
  readonly stdio = new FakeStdio();
  state = "created";
  status = "Created";
  started = false;
  stopped = false;
  removed = false;
  /** Answer readiness on start, the way the worker entrypoint does. */
  announceReady = true;

  constructor(
    readonly id: string,
    readonly options: Docker.ContainerCreateOptions,
  ) {}

  env(name: string): string | undefined {
    const entry = (this.options.Env ?? []).find((item) => item.startsWith(`${name}=`));
    return entry?.slice(name.length + 1);
  }

  async attach(): Promise<FakeStdio> {
    return this.stdio;
  }

  async start(): Promise<void> {
    this.started = true;
    this.state = "running";
    this.status = "Up 1 second";
    if (!this.announceReady) return;
    this.stdio.push("worker booting\n");
    const readiness = {
      role: "readiness",
      message: {
        work_name: this.env("WORKMESH_WORK_NAME"),
        epoch: Number(this.env("WORKMESH_EPOCH")),
        at: "2026-01-01T00:00:00.000Z",
      },
    };
    this.stdio.push(`${JSON.stringify(readiness)}\n`);
  }

  async stop(): Promise<void> {
    this.stopped = true;
    this.state = "exited";
    this.status = "Exited (0) 1 second ago";
    this.stdio.push(null);
  }

  async remove(): Promise<void> {
    this.removed = true;
  }

  async inspect(): Promise<{ NetworkSettings: { IPAddress: string; Networks: Record<string, { IPAddress: string }> } }> {
    return { NetworkSettings: { IPAddress: "", Networks: { bridge: { IPAddress: "172.17.0.9" } } } };
  }
}

export class FakeDocker {
  readonly images = new Set<string>();
  readonly containers: FakeContainer[] = [];
  onCreate?: (container: FakeContainer) => void;

  getImage(name: string): { inspect: () => Promise<{ Id: string }> } {
    return {
      inspect: async () => {
        if (this.images.has(name)) return { Id: `sha256:${name}` };
        throw Object.assign(new Error(`No such image: ${name}`), { statusCode: 404 });
      },
    };
  }

  async createContainer(options: Docker.ContainerCreateOptions): Promise<FakeContainer> {
    const container = new FakeContainer(`container-${this.containers.length + 1}`, options);
    this.containers.push(container);
    this.onCreate?.(container);
    return container;
  }

  async listContainers(opts: { filters: { label: string[] } }): Promise<ContainerInfo[]> {
    const wanted = opts.filters.label.map((label) => label.split("="));
    return this.containers
      .filter((container) => !container.removed)
      .map((container) => ({
        Id: container.id,
        State: container.state,
        Status: container.status,
        Labels: container.options.Labels ?? {},
      }))
      .filter((info) => wanted.every(([key = "", value]) => info.Labels[key] === value));
  }
}

/** The fake only covers the dockerode calls the manager makes. */
export function asDocker(fake: FakeDocker): Docker {
  return fake as unknown as Docker;
}
