import { PassThrough } from "node:stream";

import type Docker from "dockerode";

import { pipeLines } from "../transport/lines.js";

export type StreamLineHandler = (line: string, stream: "stdout" | "stderr") => void;

export type AttachedStream = {
  /** Writes reach the container's stdin. */
  input: NodeJS.WritableStream;
  detach: () => void;
  completed: Promise<void>;
};

type Demuxer = {
  demuxStream(
    stream: NodeJS.ReadableStream,
    stdout: NodeJS.WritableStream,
    stderr: NodeJS.WritableStream,
  ): void;
};

export async function attachWorkStream(
  container: Docker.Container,
  onLine: StreamLineHandler,
): Promise<AttachedStream> {
  const raw = await container.attach({
    stream: true,
    stdin: true,
    stdout: true,
    stderr: true,
    hijack: true,
  });
  return { input: raw, ...demuxDockerStream(raw, container, onLine) };
}

function demuxDockerStream(
  stream: NodeJS.ReadableStream,
  container: Docker.Container,
  onLine: StreamLineHandler,
): Omit<AttachedStream, "input"> {
  const stdout = new PassThrough();
  const stderr = new PassThrough();

  const modem: unknown = container.modem;
  if (isDemuxer(modem)) {
    modem.demuxStream(stream, stdout, stderr);
  } else {
    stream.pipe(stdout);
  }

  const cleaners: Array<() => void> = [];
  cleaners.push(pipeLines(stdout, (l) => onLine(l, "stdout")));
  cleaners.push(pipeLines(stderr, (l) => onLine(l, "stderr")));

  // The demuxer never ends its outputs; the attached stream ends when the container exits.
  const completed = waitForStreamEnd(stream);

  return {
    detach: () => {
      for (const c of cleaners) c();
      // Late output is discarded once nobody listens for lines.
      stdout.resume();
      stderr.resume();
    },
    completed,
  };
}

function isDemuxer(value: unknown): value is Demuxer {
  return (
    typeof value === "object" &&
    value !== null &&
    "demuxStream" in value &&
    typeof value.demuxStream === "function"
  );
}

function waitForStreamEnd(stream: NodeJS.ReadableStream): Promise<void> {
  return new Promise((resolve) => {
    const cleanup = (): void => {
      stream.off("end", onEnd);
      stream.off("close", onEnd);
      stream.off("error", onEnd);
    };

    const onEnd = (): void => {
      cleanup();
      resolve();
    };

    stream.on("end", onEnd);
    stream.on("close", onEnd);
    stream.on("error", onEnd);
  });
}
