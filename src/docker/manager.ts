import Docker from "dockerode";

import {
  type ContainerSpec,
  containerAddress,
  createContainer as createDockerContainer,
  dockerClient,
  imageExists,
  removeContainer as removeDockerContainer,
  startContainer as startDockerContainer,
  stopContainer as stopDockerContainer,
} from "./docker.js";
import { MANAGED_LABEL, QUEUE_ID_LABEL } from "./names.js";
import { attachWorkStream, type AttachedStream, type StreamLineHandler } from "./streams.js";

export type ManagedContainerState = {
  id: string;
  state: string;
  status: string;
};

export class DockerManager {
  private readonly docker: Docker;

  constructor(opts: { docker?: Docker } = {}) {
    this.docker = opts.docker ?? dockerClient();
  }

  async imageExists(image: string): Promise<boolean> {
    return imageExists(this.docker, image);
  }

  async createContainer(spec: ContainerSpec): Promise<Docker.Container> {
    return createDockerContainer(this.docker, spec);
  }

  async startContainer(container: Docker.Container): Promise<void> {
    await startDockerContainer(container);
  }

  async attach(container: Docker.Container, onLine: StreamLineHandler): Promise<AttachedStream> {
    return attachWorkStream(container, onLine);
  }

  async stopContainer(container: Docker.Container, timeoutSeconds: number): Promise<void> {
    await stopDockerContainer(container, timeoutSeconds);
  }

  async removeContainer(container: Docker.Container): Promise<void> {
    await removeDockerContainer(container);
  }

  async address(container: Docker.Container): Promise<string | undefined> {
    return containerAddress(container);
  }

  /** One listing call for every container this App instance manages. */
  async listManagedContainers(queueId: string): Promise<ManagedContainerState[]> {
    const containers = await this.docker.listContainers({
      all: true,
      filters: { label: [`${MANAGED_LABEL}=true`, `${QUEUE_ID_LABEL}=${queueId}`] },
    });
    return containers.map((c) => ({ id: c.Id, state: c.State, status: c.Status }));
  }
}
