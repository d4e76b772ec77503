import { sleep } from "../core/utils.js";

/** Runs `tick` every `intervalMs` until stopped; `tick` must not reject. */
export class PollingLoop {
  private abort?: AbortController;
  private running: Promise<void> = Promise.resolve();

  constructor(
    private readonly intervalMs: number,
    private readonly tick: () => Promise<void>,
  ) {}

  get active(): boolean {
    return this.abort !== undefined && !this.abort.signal.aborted;
  }

  start(): void {
    if (this.active) return;
    const abort = new AbortController();
    this.abort = abort;
    this.running = this.run(abort.signal);
  }

  async stop(): Promise<void> {
    this.abort?.abort();
    await this.running;
  }

  private async run(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      await this.tick();
      await sleep(this.intervalMs, signal);
    }
  }
}
