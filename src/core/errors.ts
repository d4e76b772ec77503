import type { RemoteErrorInfo } from "../protocol/messages.js";

export class OrchestratorError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = "OrchestratorError";
  }
}

export class ConfigurationError extends OrchestratorError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ConfigurationError";
  }
}

export class ProvisioningError extends OrchestratorError {
  constructor(
    message: string,
    public readonly workName: string,
    cause?: unknown,
  ) {
    super(message, cause);
    this.name = "ProvisioningError";
  }
}

export class RemoteExecutionError extends OrchestratorError {
  readonly remoteName: string;
  readonly remoteMessage: string;
  readonly remoteStack?: string;
  readonly remoteCode?: string;

  constructor(
    public readonly workName: string,
    public readonly seq: number,
    remote: RemoteErrorInfo,
  ) {
    super(`${remote.name}: ${remote.message}`);
    this.name = "RemoteExecutionError";
    this.remoteName = remote.name;
    this.remoteMessage = remote.message;
    this.remoteStack = remote.stack;
    this.remoteCode = remote.code;
  }
}

export class CallTimeoutError extends OrchestratorError {
  constructor(
    public readonly workName: string,
    public readonly seq: number,
    public readonly timeoutMs: number,
  ) {
    super(`Call ${seq} to work ${workName} timed out after ${timeoutMs}ms`);
    this.name = "CallTimeoutError";
  }
}

export class CallCancelledError extends OrchestratorError {
  constructor(
    public readonly workName: string,
    public readonly seq: number,
    reason: string,
  ) {
    super(`Call ${seq} to work ${workName} was cancelled: ${reason}`);
    this.name = "CallCancelledError";
  }
}

export class WorkFailedError extends OrchestratorError {
  constructor(
    public readonly workName: string,
    lastError?: string,
  ) {
    super(
      lastError
        ? `Work ${workName} has failed and does not accept calls: ${lastError}`
        : `Work ${workName} has failed and does not accept calls`,
    );
    this.name = "WorkFailedError";
  }
}

export class StaleDeltaError extends OrchestratorError {
  constructor(
    public readonly workName: string,
    public readonly deltaId: number,
    reason: string,
  ) {
    super(`Dropped delta ${deltaId} from work ${workName}: ${reason}`);
    this.name = "StaleDeltaError";
  }
}

export class QueueClosedError extends OrchestratorError {
  constructor(public readonly queueName: string) {
    super(`Queue ${queueName} is closed`);
    this.name = "QueueClosedError";
  }
}

export class DockerError extends OrchestratorError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "DockerError";
  }
}
