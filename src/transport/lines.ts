/** Calls `onLine` for every non-empty line of `stream`; returns a detach function. */
export function pipeLines(
  stream: NodeJS.ReadableStream,
  onLine: (line: string) => void,
): () => void {
  let buf = "";
  const onData = (chunk: Buffer | string): void => {
    buf += typeof chunk === "string" ? chunk : chunk.toString("utf8");
    let idx: number;
    while ((idx = buf.indexOf("\n")) >= 0) {
      const line = buf.slice(0, idx);
      buf = buf.slice(idx + 1);
      const trimmed = line.trimEnd();
      if (trimmed.length > 0) onLine(trimmed);
    }
  };

  stream.on("data", onData);

  return () => {
    stream.off("data", onData);
  };
}
