import path from "node:path";

import Docker from "dockerode";

import { DockerError } from "../core/errors.js";

export const DEFAULT_CPU_PERIOD = 100_000;

export type ContainerSpec = {
  name: string;
  image: string;
  env: Record<string, string | undefined>;
  binds: Array<{ hostPath: string; containerPath: string; mode: "rw" | "ro" }>;
  workdir: string;
  labels?: Record<string, string>;
  cmd?: string[];
  user?: string;
  networkMode?: "bridge" | "none";
  /** Keeps stdin open so frames can be written to the attached stream. */
  openStdin?: boolean;
  resources?: {
    memoryBytes?: number;
    cpuQuota?: number;
    cpuPeriod?: number;
    pidsLimit?: number;
  };
};

export function dockerClient(): Docker {
  return new Docker();
}

export async function imageExists(docker: Docker, imageName: string): Promise<boolean> {
  try {
    await docker.getImage(imageName).inspect();
    return true;
  } catch (err) {
    if (dockerStatusCode(err) === 404) return false;
    throw dockerFailure(`Failed to inspect image ${imageName}`, err);
  }
}

export async function createContainer(
  docker: Docker,
  spec: ContainerSpec,
): Promise<Docker.Container> {
  try {
    const Env = Object.entries(spec.env)
      .filter(([, v]) => v !== undefined)
      .map(([k, v]) => `${k}=${v}`);

    const Binds = spec.binds.map((b) => `${path.resolve(b.hostPath)}:${b.containerPath}:${b.mode}`);

    const hostConfig: Docker.ContainerCreateOptions["HostConfig"] = {
      Binds,
      NetworkMode: spec.networkMode ?? "bridge",
      AutoRemove: false,
    };

    if (spec.resources?.memoryBytes !== undefined) {
      hostConfig.Memory = spec.resources.memoryBytes;
    }
    if (spec.resources?.cpuQuota !== undefined) {
      hostConfig.CpuQuota = spec.resources.cpuQuota;
      hostConfig.CpuPeriod = spec.resources.cpuPeriod ?? DEFAULT_CPU_PERIOD;
    }
    if (spec.resources?.pidsLimit !== undefined) {
      hostConfig.PidsLimit = spec.resources.pidsLimit;
    }

    const stdin = spec.openStdin ?? false;
    return await docker.createContainer({
      Image: spec.image,
      name: spec.name,
      Env,
      WorkingDir: spec.workdir,
      Cmd: spec.cmd,
      Labels: spec.labels,
      User: spec.user,
      OpenStdin: stdin,
      StdinOnce: false,
      AttachStdin: stdin,
      AttachStdout: true,
      AttachStderr: true,
      Tty: false,
      HostConfig: hostConfig,
    });
  } catch (err) {
    throw dockerFailure(`Failed to create container ${spec.name}`, err);
  }
}

export async function startContainer(container: Docker.Container): Promise<void> {
  try {
    await container.start();
  } catch (err) {
    throw dockerFailure("Failed to start container", err);
  }
}

/** Stops a container; one that is already stopped (304) or gone (404) is not an error. */
export async function stopContainer(
  container: Docker.Container,
  timeoutSeconds: number,
): Promise<void> {
  try {
    await container.stop({ t: timeoutSeconds });
  } catch (err) {
    const status = dockerStatusCode(err);
    if (status === 304 || status === 404) return;
    throw dockerFailure("Failed to stop container", err);
  }
}

export async function removeContainer(container: Docker.Container): Promise<void> {
  try {
    await container.remove({ force: true });
  } catch (err) {
    if (dockerStatusCode(err) === 404) return;
    throw dockerFailure("Failed to remove container", err);
  }
}

export async function containerAddress(container: Docker.Container): Promise<string | undefined> {
  const info = await container.inspect();
  const direct = info.NetworkSettings?.IPAddress;
  if (direct) return direct;
  for (const network of Object.values(info.NetworkSettings?.Networks ?? {})) {
    if (network.IPAddress) return network.IPAddress;
  }
  return undefined;
}

// =============================================================================
// ERROR HELPERS
// =============================================================================

export const DOCKER_UNAVAILABLE_HINT =
  "Start the Docker daemon and retry, or set backend.type to local or process.";

export const DOCKER_RUN_HINT =
  "Check that the worker image and docker settings are valid, then retry.";

type DockerErrorDetails = {
  message: string;
  code?: string;
  reason?: string;
  statusCode?: number;
};

export function dockerStatusCode(err: unknown): number | undefined {
  return resolveDockerErrorDetails(err).statusCode;
}

export function dockerHint(err: unknown): string {
  const details = resolveDockerErrorDetails(err instanceof DockerError ? err.cause : err);
  return isDockerUnavailableError(details) ? DOCKER_UNAVAILABLE_HINT : DOCKER_RUN_HINT;
}

function dockerFailure(prefix: string, err: unknown): DockerError {
  const details = resolveDockerErrorDetails(err);
  const detail = details.reason || details.message || "Unknown docker error.";
  return new DockerError(`${prefix}: ${detail}`, err);
}

function resolveDockerErrorDetails(err: unknown): DockerErrorDetails {
  if (!err || typeof err !== "object") {
    return { message: String(err) };
  }

  const message = "message" in err && typeof err.message === "string" ? err.message : String(err);
  const code = "code" in err && typeof err.code === "string" ? err.code : undefined;
  const reason = "reason" in err && typeof err.reason === "string" ? err.reason : undefined;
  const statusCode =
    "statusCode" in err && typeof err.statusCode === "number" ? err.statusCode : undefined;

  return { message, code, reason, statusCode };
}

function isDockerUnavailableError(details: DockerErrorDetails): boolean {
  if (details.code === "ENOENT" || details.code === "ECONNREFUSED") {
    return true;
  }

  const text = `${details.message}\n${details.reason ?? ""}`.toLowerCase();
  return (
    text.includes("cannot connect to the docker daemon") ||
    text.includes("is the docker daemon running") ||
    text.includes("error during connect") ||
    text.includes("docker.sock") ||
    text.includes("connect econnrefused") ||
    text.includes("connect enoent")
  );
}
