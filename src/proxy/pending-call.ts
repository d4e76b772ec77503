/**
 * PendingCall is the handle returned by a work's future-mode entry point.
 * Purpose: expose the call's sequence number and settlement without forcing an await.
 * Assumptions: a handle never rejects unobserved; result() re-exposes the outcome.
 * Usage: const pending = work.submit(5); await pending.result();
 */

export type CallState = "pending" | "fulfilled" | "rejected";

export class PendingCall<T> {
  private currentState: CallState = "pending";
  private settledValue?: T;
  private settledError?: unknown;
  private inner?: PendingCall<T>;
  private readonly promise: Promise<T>;

  constructor(
    public readonly workName: string,
    private readonly ownSeq: number | undefined,
    source: Promise<T>,
  ) {
    this.promise = source.then(
      (value) => {
        this.currentState = "fulfilled";
        this.settledValue = value;
        return value;
      },
      (error: unknown) => {
        this.currentState = "rejected";
        this.settledError = error;
        throw error;
      },
    );
    // Callers in future mode may never await; the outcome stays available via result().
    void this.promise.catch(() => undefined);
  }

  /** A handle whose call is enqueued once `inner` resolves (first-call binding). */
  static adopt<T>(workName: string, inner: Promise<PendingCall<T>>): PendingCall<T> {
    let outer: PendingCall<T> | undefined;
    const source = inner.then((call) => {
      if (outer) outer.inner = call;
      return call.result();
    });
    outer = new PendingCall<T>(workName, undefined, source);
    return outer;
  }

  static resolved<T>(workName: string, value: T): PendingCall<T> {
    return new PendingCall<T>(workName, undefined, Promise.resolve(value));
  }

  static rejected<T>(workName: string, error: unknown): PendingCall<T> {
    return new PendingCall<T>(workName, undefined, Promise.reject(error));
  }

  /** Sequence number on the caller queue; undefined until enqueued. */
  get seq(): number | undefined {
    return this.ownSeq ?? this.inner?.seq;
  }

  get state(): CallState {
    return this.currentState;
  }

  get value(): T | undefined {
    return this.settledValue;
  }

  get error(): unknown {
    return this.settledError;
  }

  result(): Promise<T> {
    return this.promise;
  }
}
