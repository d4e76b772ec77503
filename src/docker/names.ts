/*
Purpose: Docker naming and labelling for work containers.
Assumptions: the queue id makes names unique per App instance; names must be Docker-friendly.
Usage: buildWorkContainerName({ queueId, workName, epoch }).
*/

const CONTAINER_NAME_LIMIT = 120;

export const MANAGED_LABEL = "workmesh.managed";
export const QUEUE_ID_LABEL = "workmesh.queue_id";
export const WORK_NAME_LABEL = "workmesh.work_name";

export type WorkContainerNameInput = {
  queueId: string;
  workName: string;
  epoch: number;
};

export function buildWorkContainerName(values: WorkContainerNameInput): string {
  const raw = `wm-${values.queueId}-${values.workName}-e${values.epoch}`;
  return raw.replace(/[^a-zA-Z0-9_.-]/g, "-").slice(0, CONTAINER_NAME_LIMIT);
}

export function buildWorkContainerLabels(queueId: string, workName: string): Record<string, string> {
  return {
    [MANAGED_LABEL]: "true",
    [QUEUE_ID_LABEL]: queueId,
    [WORK_NAME_LABEL]: workName,
  };
}
