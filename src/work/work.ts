/**
 * Work is a named, stateful unit of remotely executable behavior.
 * Purpose: give callers one programming model whether the work runs here or elsewhere.
 * Assumptions: arguments and results are JSON values; names are assigned by a parent Flow.
 * Usage:
 *   class Trainer extends Work<[{ batch: number }], { loss: number }> {
 *     run({ batch }) { this.setState("progress", batch); return { loss: 0.42 }; }
 *   }
 */

import { ConfigurationError } from "../core/errors.js";
import { cloneJson, type JsonObject, type JsonValue } from "../protocol/json.js";
import { PendingCall } from "../proxy/pending-call.js";
import { deleteAt, getAt, normalizePath, setAt, type StatePath } from "../state/state-tree.js";

import type { WorkStatus } from "./status.js";

// =============================================================================
// TYPES
// =============================================================================

export type WorkOptions = {
  /** Port the work serves on inside its execution context, if any. */
  port?: number;
  initialState?: JsonObject;
};

/** The active entry point behind `call`/`submit`. */
export type WorkEntry<TArgs extends JsonValue[], TResult extends JsonValue> = {
  /** True once a proxy (or the dynamic binder) replaced direct execution. */
  readonly wrapped: boolean;
  dispatch(args: TArgs): PendingCall<TResult>;
};

/** Receives state mutations while the work executes inside a runtime. */
export type StateEmitter = {
  set(path: string[], value: JsonValue): void;
  delete(path: string[]): void;
};

// =============================================================================
// WORK
// =============================================================================

export abstract class Work<
  TArgs extends JsonValue[] = JsonValue[],
  TResult extends JsonValue = JsonValue,
> {
  status: WorkStatus = "created";
  lastError?: string;
  url?: string;

  readonly port?: number;
  readonly initialState: JsonObject;

  private assignedName = "";
  private entry: WorkEntry<TArgs, TResult>;
  private emitter?: StateEmitter;
  private localState: JsonObject;

  constructor(options: WorkOptions = {}) {
    this.port = options.port;
    this.initialState = cloneJson(options.initialState ?? {});
    this.localState = cloneJson(this.initialState);
    this.entry = {
      wrapped: false,
      dispatch: (args) => this.runDirect(args),
    };
  }

  abstract run(...args: TArgs): TResult | Promise<TResult>;

  get name(): string {
    return this.assignedName;
  }

  /** Assigned once by the parent Flow; renaming an attached work is rejected. */
  assignName(name: string): void {
    if (!name) {
      throw new ConfigurationError(`Cannot assign an empty name to ${this.constructor.name}`);
    }
    if (this.assignedName && this.assignedName !== name) {
      throw new ConfigurationError(
        `Work ${this.assignedName} is already attached and cannot be renamed to ${name}`,
      );
    }
    this.assignedName = name;
  }

  call(...args: TArgs): Promise<TResult> {
    return this.entry.dispatch(args).result();
  }

  submit(...args: TArgs): PendingCall<TResult> {
    return this.entry.dispatch(args);
  }

  get entryPoint(): WorkEntry<TArgs, TResult> {
    return this.entry;
  }

  useEntryPoint(entry: WorkEntry<TArgs, TResult>): void {
    this.entry = entry;
  }

  // ---------------------------------------------------------------------------
  // Observable state
  // ---------------------------------------------------------------------------

  bindStateEmitter(emitter: StateEmitter | undefined): void {
    this.emitter = emitter;
  }

  /** The state as seen from inside the execution context. */
  currentState(): JsonObject {
    return cloneJson(this.localState);
  }

  resetState(): void {
    this.localState = cloneJson(this.initialState);
  }

  protected getState(path: string | StatePath): JsonValue | undefined {
    return getAt(this.localState, normalizePath(path));
  }

  protected setState(path: string | StatePath, value: JsonValue): void {
    const segments = normalizePath(path);
    setAt(this.localState, segments, value);
    this.emitter?.set(segments, value);
  }

  protected deleteState(path: string | StatePath): void {
    const segments = normalizePath(path);
    if (deleteAt(this.localState, segments)) {
      this.emitter?.delete(segments);
    }
  }

  private runDirect(args: TArgs): PendingCall<TResult> {
    const source = Promise.resolve().then(() => this.run(...args));
    return new PendingCall<TResult>(this.assignedName, undefined, source);
  }
}

export type AnyWork = Work<JsonValue[], JsonValue>;
